/**
 * Transport seam between a shard and the network.
 * Shards only see this interface; `WsTransport` is the production
 * implementation and tests substitute an in-process fake.
 */

import WebSocket from 'ws';
import { GatewayError } from '../shared/errors.js';
import { AsyncChannel } from '../shared/channel.js';
import { logger } from '../shared/logger.js';
import { SocketCloseCodes } from './close-codes.js';

export type TransportEvent =
  | { type: 'message'; data: Buffer | string }
  /** `code` is absent when the connection dropped without a close frame. */
  | { type: 'close'; code?: number; reason: string };

export interface GatewayTransport {
  send(data: string): Promise<void>;
  /**
   * Next inbound event. After a `close` event no further events arrive.
   * @throws the signal's reason when aborted first.
   */
  receive(signal?: AbortSignal): Promise<TransportEvent>;
  /** Close the connection. Safe to call more than once. */
  close(code: number, reason?: string): void;
}

/** Opens a transport to `url`, resolving once it is open. */
export type TransportFactory = (url: string, signal?: AbortSignal) => Promise<GatewayTransport>;

const log = logger.child({ component: 'transport' });

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** `ws`-backed transport. */
export class WsTransport implements GatewayTransport {
  private readonly events = new AsyncChannel<TransportEvent>();
  private closed = false;

  private constructor(private readonly socket: WebSocket) {
    socket.on('message', (data, isBinary) => {
      this.events.push({ type: 'message', data: isBinary ? toBuffer(data) : toBuffer(data).toString('utf8') });
    });
    socket.on('close', (code, reason) => {
      this.closed = true;
      this.events.push({
        type: 'close',
        code: code === SocketCloseCodes.Abnormal ? undefined : code,
        reason: reason.toString('utf8'),
      });
    });
    socket.on('error', (err) => {
      log.warn({ err }, 'WebSocket error');
    });
  }

  /** Open a socket and resolve once the handshake completed. */
  static open(url: string, signal?: AbortSignal): Promise<GatewayTransport> {
    signal?.throwIfAborted();
    return new Promise<GatewayTransport>((resolve, reject) => {
      const socket = new WebSocket(url, { perMessageDeflate: false });
      const onAbort = () => {
        socket.terminate();
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const onError = (err: Error) => {
        signal?.removeEventListener('abort', onAbort);
        reject(new GatewayError(`Failed to open gateway connection: ${err.message}`));
      };
      socket.once('error', onError);
      socket.once('open', () => {
        signal?.removeEventListener('abort', onAbort);
        socket.off('error', onError);
        resolve(new WsTransport(socket));
      });
    });
  }

  send(data: string): Promise<void> {
    if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new GatewayError('Cannot send on a closed gateway connection'));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  receive(signal?: AbortSignal): Promise<TransportEvent> {
    return this.events.next(signal);
  }

  close(code: number, reason: string = ''): void {
    if (this.closed) return;
    this.closed = true;
    if (this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.terminate();
      return;
    }
    this.socket.close(code, reason);
  }
}

export const wsTransportFactory: TransportFactory = (url, signal) => WsTransport.open(url, signal);

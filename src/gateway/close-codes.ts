/**
 * Close code classification.
 * Each known code maps to what the shard does next; adding a code is a
 * table entry, not a new branch.
 */

import { GatewayCloseCodes } from 'discord-api-types/v10';
import {
  DisallowedIntentsError,
  InvalidApiVersionError,
  InvalidIntentsError,
  InvalidShardCountError,
  InvalidTokenError,
  UnhandledCloseCodeError,
  type DisconnectError,
} from '../shared/errors.js';

export type CloseAction =
  | { kind: 'resume' }
  | { kind: 'reidentify' }
  | { kind: 'fatal'; error: (code: number, reason: string) => DisconnectError };

/** WebSocket close codes (RFC 6455) the server or network may produce. */
export const SocketCloseCodes = {
  Normal: 1000,
  GoingAway: 1001,
  NoStatus: 1005,
  Abnormal: 1006,
} as const;

const RESUME: CloseAction = { kind: 'resume' };
const REIDENTIFY: CloseAction = { kind: 'reidentify' };

export const CLOSE_CODE_ACTIONS: ReadonlyMap<number, CloseAction> = new Map<number, CloseAction>([
  [SocketCloseCodes.Normal, RESUME],
  [SocketCloseCodes.GoingAway, RESUME],
  [SocketCloseCodes.NoStatus, RESUME],
  [SocketCloseCodes.Abnormal, RESUME],
  [GatewayCloseCodes.UnknownError, RESUME],
  [GatewayCloseCodes.UnknownOpcode, RESUME],
  [GatewayCloseCodes.DecodeError, RESUME],
  [GatewayCloseCodes.NotAuthenticated, REIDENTIFY],
  [GatewayCloseCodes.AuthenticationFailed, { kind: 'fatal', error: (code, reason) => new InvalidTokenError(code, reason) }],
  [GatewayCloseCodes.AlreadyAuthenticated, REIDENTIFY],
  [GatewayCloseCodes.InvalidSeq, REIDENTIFY],
  [GatewayCloseCodes.RateLimited, RESUME],
  [GatewayCloseCodes.SessionTimedOut, REIDENTIFY],
  [GatewayCloseCodes.InvalidShard, { kind: 'fatal', error: (code, reason) => new InvalidShardCountError(code, reason) }],
  [GatewayCloseCodes.ShardingRequired, { kind: 'fatal', error: (code, reason) => new InvalidShardCountError(code, reason) }],
  [GatewayCloseCodes.InvalidAPIVersion, { kind: 'fatal', error: (code, reason) => new InvalidApiVersionError(code, reason) }],
  [GatewayCloseCodes.InvalidIntents, { kind: 'fatal', error: (code, reason) => new InvalidIntentsError(code, reason) }],
  [GatewayCloseCodes.DisallowedIntents, { kind: 'fatal', error: (code, reason) => new DisallowedIntentsError(code, reason) }],
]);

/** Result of classifying a close. */
export interface CloseClassification {
  /** Whether the next connection may resume the session. */
  resumable: boolean;
  /** Not retryable; the shard goes terminal. */
  fatal: boolean;
  /** Present for fatal and unrecognised codes. */
  error?: DisconnectError;
}

/**
 * Classify a close code. Unknown codes are retried with a fresh identify
 * and reported as UnhandledCloseCodeError.
 */
export function classifyClose(code: number, reason: string = ''): CloseClassification {
  const action = CLOSE_CODE_ACTIONS.get(code);

  if (!action) {
    return { resumable: false, fatal: false, error: new UnhandledCloseCodeError(code, reason) };
  }

  switch (action.kind) {
    case 'resume':
      return { resumable: true, fatal: false };
    case 'reidentify':
      return { resumable: false, fatal: false };
    case 'fatal':
      return { resumable: false, fatal: true, error: action.error(code, reason) };
  }
}

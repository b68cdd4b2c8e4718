/**
 * Custom error classes for chatwire.
 * REST failures carry the route and status; gateway failures carry the close
 * code that caused them so owners can decide whether to intervene.
 */

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A rate limit gate would have suspended, but the caller asked not to wait.
 * `retryAfterMs` is how long the caller would have been suspended.
 */
export class RateLimitedError extends Error {
  public readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(`Rate limited, retry after ${Math.ceil(retryAfterMs)}ms`);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** Non-OK REST response. */
export class HttpError extends Error {
  public readonly status: number;
  public readonly route: string;
  public readonly body: string;

  constructor(route: string, status: number, body: string) {
    super(`${route} returned ${status}`);
    this.name = 'HttpError';
    this.route = route;
    this.status = status;
    this.body = body;
  }
}

/** A 429 that was still being returned after every retry was spent. */
export class RateLimitExceededError extends HttpError {
  public readonly retryAfterMs: number;
  public readonly global: boolean;

  constructor(route: string, retryAfterMs: number, global: boolean, body: string = '') {
    super(route, 429, body);
    this.name = 'RateLimitExceededError';
    this.message = `${route} is still rate limited${global ? ' (global)' : ''} after retrying, retry after ${Math.ceil(retryAfterMs)}ms`;
    this.retryAfterMs = retryAfterMs;
    this.global = global;
  }
}

/** Base class for gateway failures. */
export class GatewayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GatewayError';
  }
}

/** A lifecycle operation was called in a state that does not allow it. */
export class ShardStateError extends GatewayError {
  constructor(shardId: number, operation: string, state: string) {
    super(`Cannot ${operation} shard ${shardId} while it is ${state}`);
    this.name = 'ShardStateError';
  }
}

/** The gateway closed the connection with a code that has a known meaning. */
export class DisconnectError extends GatewayError {
  public readonly code: number;
  public readonly reason: string;

  constructor(code: number, reason: string, message?: string) {
    super(message ?? `Gateway closed with code ${code}${reason ? `: ${reason}` : ''}`);
    this.name = 'DisconnectError';
    this.code = code;
    this.reason = reason;
  }
}

/** The token was rejected. Not retryable. */
export class InvalidTokenError extends DisconnectError {
  constructor(code: number, reason: string) {
    super(code, reason, 'The gateway rejected the token');
    this.name = 'InvalidTokenError';
  }
}

/** The intents bitmask is malformed. Not retryable. */
export class InvalidIntentsError extends DisconnectError {
  constructor(code: number, reason: string) {
    super(code, reason, 'The intents bitmask sent in identify is invalid');
    this.name = 'InvalidIntentsError';
  }
}

/** The bot asked for privileged intents it is not approved for. Not retryable. */
export class DisallowedIntentsError extends DisconnectError {
  constructor(code: number, reason: string) {
    super(code, reason, 'The identify requested intents the bot is not allowed to use');
    this.name = 'DisallowedIntentsError';
  }
}

/** The gateway does not support the requested API version. Not retryable. */
export class InvalidApiVersionError extends DisconnectError {
  constructor(code: number, reason: string) {
    super(code, reason, 'The gateway does not accept the requested API version');
    this.name = 'InvalidApiVersionError';
  }
}

/** The shard count was rejected (invalid shard or sharding required). Not retryable. */
export class InvalidShardCountError extends DisconnectError {
  constructor(code: number, reason: string) {
    super(code, reason, `The gateway rejected the shard configuration (code ${code})`);
    this.name = 'InvalidShardCountError';
  }
}

/** A close code this client has no entry for. Retried with a fresh identify. */
export class UnhandledCloseCodeError extends DisconnectError {
  constructor(code: number, reason: string) {
    super(code, reason, `Unhandled gateway close code ${code}${reason ? `: ${reason}` : ''}`);
    this.name = 'UnhandledCloseCodeError';
  }
}

/** The reconnect-eligibility check refused another attempt. */
export class ReconnectCheckFailedError extends GatewayError {
  public readonly attempt: number;

  constructor(shardId: number, attempt: number) {
    super(`Reconnect check refused attempt ${attempt} for shard ${shardId}`);
    this.name = 'ReconnectCheckFailedError';
    this.attempt = attempt;
  }
}

/** True for the rejection produced by an aborted signal. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

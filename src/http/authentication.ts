/**
 * Credentials for authenticated REST calls.
 * Rate limits are tracked per key, so two tokens never share buckets.
 */

export interface Authentication {
  /** Value of the Authorization header. */
  readonly header: string;
  /** Key under which rate limit state is stored for this credential. */
  readonly rateLimitKey: string;
}

/** Bot token authentication (`Authorization: Bot <token>`). */
export class BotAuthentication implements Authentication {
  private readonly token: string;

  constructor(token: string) {
    this.token = token;
  }

  get header(): string {
    return `Bot ${this.token}`;
  }

  get rateLimitKey(): string {
    return this.token;
  }

  /** The raw token, for the gateway identify payload. */
  get rawToken(): string {
    return this.token;
  }

  toString(): string {
    return 'BotAuthentication([REDACTED])';
  }

  toJSON(): string {
    return this.toString();
  }
}

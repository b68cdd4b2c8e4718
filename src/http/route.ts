/**
 * A REST route: method, path template and the parameters that fill it.
 * The template (not the filled path) identifies the route class for rate
 * limiting; major parameters split one class into independent buckets.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type RouteParams = Record<string, string | number | bigint>;

/** Parameters the server rate limits independently of the template. */
export const MAJOR_PARAMS = ['guild_id', 'channel_id', 'webhook_id', 'webhook_token'] as const;

export interface RouteOptions {
  /** Skip the process-wide limiter (e.g. unauthenticated endpoints). */
  ignoreGlobal?: boolean;
}

const PLACEHOLDER = /\{([a-z_]+)\}/g;

export class Route {
  public readonly method: HttpMethod;
  public readonly template: string;
  public readonly path: string;
  public readonly ignoreGlobal: boolean;
  public readonly routeKey: string;
  public readonly majorParams: string;

  constructor(method: HttpMethod, template: string, params: RouteParams = {}, options: RouteOptions = {}) {
    this.method = method;
    this.template = template;
    this.ignoreGlobal = options.ignoreGlobal ?? false;
    this.routeKey = `${method} ${template}`;

    this.path = template.replace(PLACEHOLDER, (_match, name: string) => {
      const value = params[name];
      if (value === undefined) {
        throw new TypeError(`Route ${this.routeKey} is missing parameter "${name}"`);
      }
      return encodeURIComponent(String(value));
    });

    this.majorParams = MAJOR_PARAMS.map((name) => params[name])
      .filter((value) => value !== undefined)
      .map(String)
      .join(':');
  }

  toString(): string {
    return `${this.method} ${this.path}`;
  }
}

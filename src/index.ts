/**
 * chatwire public API.
 */

export { RestClient, type RestClientOptions, type RequestOptions } from './http/rest-client.js';
export { Route, MAJOR_PARAMS, type HttpMethod, type RouteParams } from './http/route.js';
export { BotAuthentication, type Authentication } from './http/authentication.js';
export { parseRateLimitHeaders, type RateLimitHeaders } from './http/headers.js';
export {
  getGateway,
  getGatewayBot,
  type GatewayInfo,
  type GatewayBotInfo,
  type GatewayBotOptions,
} from './http/gateway-endpoints.js';

export { Bucket } from './ratelimit/bucket.js';
export { BucketMetadata } from './ratelimit/metadata.js';
export { WindowLimiter } from './ratelimit/window-limiter.js';
export { RateLimitStorage, type RateLimitedRoute } from './ratelimit/storage.js';
export type { AcquireOptions, BucketMetadataInit, BucketSnapshot } from './ratelimit/types.js';

export { Shard, SEND_LIMIT, SEND_WINDOW_MS, DEFAULT_RECONNECT_POLICY, type ShardOptions } from './gateway/shard.js';
export {
  ShardManager,
  shardIdForGuild,
  DEFAULT_IDENTIFY_WINDOW_MS,
  type ShardManagerOptions,
  type ShardPlan,
} from './gateway/shard-manager.js';
export { Decompressor, ZLIB_SUFFIX } from './gateway/decompressor.js';
export { classifyClose, CLOSE_CODE_ACTIONS, type CloseAction, type CloseClassification } from './gateway/close-codes.js';
export {
  WsTransport,
  wsTransportFactory,
  type GatewayTransport,
  type TransportEvent,
  type TransportFactory,
} from './gateway/transport.js';
export { decodePayload, encodePayload, type GatewayPayload, type GatewaySendPayload } from './gateway/codec.js';
export type {
  GatewaySink,
  IdentifyThrottle,
  PresenceActivity,
  PresenceData,
  ReconnectCheck,
  ReconnectContext,
  ReconnectPolicy,
  ShardLifecycleEvent,
  ShardState,
  ShardStatus,
} from './gateway/types.js';

export { loadConfig, resolveConfigPath } from './config/loader.js';
export type { Config, GatewayConfig, HttpConfig } from './config/types.js';
export { startRunner, managerOptionsFromConfig, createLoggingSink } from './app.js';

export * from './shared/errors.js';
export { logger, type Logger } from './shared/logger.js';

/**
 * Application bootstrap: turns a validated config into a running shard
 * manager that logs what the gateway sends, and shuts it down on signals.
 */

import { existsSync, mkdirSync, copyFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';
import { logger, type Logger } from './shared/logger.js';
import { ConfigError } from './shared/errors.js';
import { loadConfig } from './config/loader.js';
import { RestClient } from './http/rest-client.js';
import { ShardManager, type ShardManagerOptions } from './gateway/shard-manager.js';
import type { GatewaySink } from './gateway/types.js';
import type { Config } from './config/types.js';

/** Hooks for replacing the network-facing parts of the runner. */
export type RunnerOverrides = Pick<ShardManagerOptions, 'transportFactory' | 'rest' | 'random'>;

export function restClientFromConfig(config: Config): RestClient {
  return new RestClient(config.http);
}

export function managerOptionsFromConfig(config: Config, overrides: RunnerOverrides = {}): ShardManagerOptions {
  const { gateway } = config;
  return {
    token: config.token,
    intents: gateway.intents,
    gatewayUrl: gateway.url,
    shardCount: gateway.shardCount,
    shardIds: gateway.shardIds,
    maxConcurrency: gateway.maxConcurrency,
    apiVersion: config.http.apiVersion,
    compress: gateway.compress,
    largeThreshold: gateway.largeThreshold,
    presence: gateway.presence,
    identifyWindowMs: gateway.identifyWindowMs,
    reconnect: gateway.reconnect,
    rest: overrides.rest ?? restClientFromConfig(config),
    transportFactory: overrides.transportFactory,
    random: overrides.random,
  };
}

/** Sink that logs lifecycle events and the name of every dispatch. */
export function createLoggingSink(log: Logger = logger.child({ component: 'events' })): GatewaySink {
  return {
    onPayload(shardId, payload) {
      log.debug({ shardId, event: payload.t, seq: payload.s }, `Shard ${shardId} received ${payload.t ?? `op ${payload.op}`}`);
    },
    onLifecycle(shardId, event) {
      switch (event.type) {
        case 'connected':
          log.info({ shardId, heartbeatIntervalMs: event.heartbeatIntervalMs }, `Shard ${shardId} connected`);
          break;
        case 'identified':
          log.info({ shardId, sessionId: event.sessionId }, `Shard ${shardId} identified`);
          break;
        case 'resumed':
          log.info({ shardId, sessionId: event.sessionId }, `Shard ${shardId} resumed`);
          break;
        case 'disconnected':
          if (event.willReconnect) {
            log.warn(
              { shardId, code: event.code, resumable: event.resumable },
              `Shard ${shardId} disconnected: ${event.reason}`,
            );
          } else {
            log.error({ shardId, code: event.code, err: event.error }, `Shard ${shardId} stopped: ${event.reason}`);
          }
          break;
      }
    },
  };
}

/**
 * Apply the config's log level, then connect every configured shard.
 * @returns The running manager.
 */
export async function startRunner(config: Config, overrides: RunnerOverrides = {}): Promise<ShardManager> {
  logger.level = config.logLevel;
  logger.info('chatwire v0.1.0 starting...');

  const manager = new ShardManager(managerOptionsFromConfig(config, overrides), createLoggingSink());
  await manager.connect();

  logger.info({ shards: manager.status().length, shardCount: manager.shardCount }, 'Ready');
  return manager;
}

/** Path of the example config shipped beside the sources. */
export function exampleConfigPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, '..', 'config', 'config.example.yaml');
}

/**
 * Copy the example config to `<cwd>/config/config.yaml`.
 * @returns The path written.
 * @throws ConfigError when the target already exists or the example is missing.
 */
export function initConfig(cwd: string, sourcePath: string = exampleConfigPath()): string {
  const targetPath = resolve(cwd, 'config', 'config.yaml');

  if (existsSync(targetPath)) {
    throw new ConfigError(`Config file already exists at ${targetPath}`);
  }
  if (!existsSync(sourcePath)) {
    throw new ConfigError('Example config not found (package may be corrupted)');
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  copyFileSync(sourcePath, targetPath);
  return targetPath;
}

/** Load the config, run until SIGINT or SIGTERM, then close every shard. */
export async function runApp(configPath: string): Promise<void> {
  const config = loadConfig(configPath);
  const manager = await startRunner(config);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down...');
    manager.close().then(
      () => {
        logger.info('All shards closed');
        process.exit(0);
      },
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}

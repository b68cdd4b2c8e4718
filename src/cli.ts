#!/usr/bin/env node
/**
 * CLI entry point for chatwire.
 * Handles argument parsing and the --init command, then delegates to the
 * application bootstrap.
 */

import { parseArgs } from 'node:util';
import { resolveConfigPath } from './config/loader.js';
import { ConfigError } from './shared/errors.js';
import { initConfig, runApp } from './app.js';

const { values } = parseArgs({
  options: {
    config: {
      type: 'string',
      short: 'c',
    },
    init: {
      type: 'boolean',
    },
    help: {
      type: 'boolean',
      short: 'h',
    },
  },
  strict: false,
});

if (values.help) {
  console.log(`
chatwire - sharded gateway runner with REST rate limiting

Usage:
  chatwire [options]

Options:
  -c, --config <path>   Path to config file (default: $CHATWIRE_CONFIG or ./config/config.yaml)
  --init                Initialize config file in current directory
  -h, --help            Show this help message

Environment:
  CHATWIRE_TOKEN        Bot token, overrides the config file
  LOG_LEVEL             Log level before the config is loaded
  LOG_FORMAT            json | pretty
`);
  process.exit(0);
}

if (values.init) {
  try {
    const targetPath = initConfig(process.cwd());
    console.log(`Created config file: ${targetPath}`);
    console.log('');
    console.log('Next steps:');
    console.log('  1. Put your bot token and intents in the config file');
    console.log('  2. Run: chatwire');
    console.log('');
    process.exit(0);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

const configPath = resolveConfigPath(typeof values.config === 'string' ? values.config : undefined);

try {
  await runApp(configPath);
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`\n${err.message}\n`);
    console.error('To create a config file, run:');
    console.error('  chatwire --init\n');
  } else {
    console.error(err);
  }
  process.exit(1);
}

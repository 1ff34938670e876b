#!/usr/bin/env -S node --import tsx
/**
 * CLI for the Chronicle gateway
 */

import { ValidationError, toError } from '@chronicle/core';
import { type ConfigKey, type GatewayConfig, VERSION, configSchema, envName, flagName, loadConfig, parseArgs } from './config.js';
import { createGateway } from './gateway.js';

/**
 * Print help message
 */
function printHelp(): void {
  const keys = Object.keys(configSchema.shape).filter((key): key is ConfigKey => key in configSchema.shape);
  const options = keys.map((key) => `  --${flagName(key).padEnd(24)}${envName(key)}`).join('\n');

  console.log(`
Chronicle - telemetry persistence and live-query gateway

Usage: chronicle [options]

Options (each also read from the environment variable beside it):
${options}

  -p <port>, -h <host>, -d     Short forms of --port, --host and --debug
  --help                       Show this help message
  --version                    Show version

Examples:
  chronicle                                    Start with defaults
  chronicle --port 3000 --debug                Start on port 3000 with debug logging
  chronicle --backend memory --bus memory      Run without external services
`);
}

/**
 * Print version
 */
function printVersion(): void {
  console.log(`chronicle v${VERSION}`);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args['help']) {
    printHelp();
    process.exit(0);
  }

  if (args['version']) {
    printVersion();
    process.exit(0);
  }

  let config: GatewayConfig;
  try {
    config = loadConfig(process.env, process.argv.slice(2));
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const gateway = createGateway({ config });

  const shutdown = async (): Promise<void> => {
    await gateway.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  try {
    await gateway.start();
  } catch (error) {
    console.error('Failed to start gateway:', toError(error).message);
    process.exit(1);
  }
}

void main();

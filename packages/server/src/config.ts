/**
 * Gateway configuration
 *
 * Read once at startup from `CHRONICLE_*` environment variables, overridden by
 * command line flags. Every key maps to `CHRONICLE_<SNAKE_CASE>` and
 * `--<kebab-case>`, so `flushIntervalMs` is `CHRONICLE_FLUSH_INTERVAL_MS` or
 * `--flush-interval-ms`.
 */

import { z } from 'zod';
import {
  DEFAULT_DURATION_MS,
  MINIMUM_STEP_MS,
  ValidationError,
  toValidationIssues,
} from '@chronicle/core';

export const VERSION = '0.1.0';

const ENV_PREFIX = 'CHRONICLE_';

const flag = z.preprocess(
  (value) => (typeof value === 'string' ? ['1', 'true', 'yes', 'on'].includes(value.toLowerCase()) : value),
  z.boolean()
);

const positiveInt = z.coerce.number().int().positive();

export const configSchema = z.object({
  name: z.string().min(1).default('history'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(5000),
  debug: flag.default(false),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logFormat: z.enum(['text', 'json']).default('text'),
  bus: z.enum(['mqtt', 'memory']).default('mqtt'),
  busUrl: z.string().url().default('mqtt://eventbus:1883'),
  historyTopic: z.string().min(1).default('telemetry/history'),
  datastoreTopic: z.string().min(1).default('telemetry/datastore'),
  backend: z.enum(['victoria', 'memory']).default('victoria'),
  victoriaUrl: z.string().url().default('http://victoria:8428/victoria'),
  datastore: z.enum(['redis', 'memory']).default('redis'),
  redisUrl: z.string().url().default('redis://redis'),
  flushIntervalMs: positiveInt.default(1000),
  flushThreshold: positiveInt.default(1000),
  maxPendingRecords: positiveInt.default(100_000),
  minimumStepMs: positiveInt.default(MINIMUM_STEP_MS),
  defaultDurationMs: positiveInt.default(DEFAULT_DURATION_MS),
  maxSinkBufferBytes: positiveInt.default(1024 * 1024),
  metricsIntervalMs: positiveInt.default(10_000),
});

export type GatewayConfig = z.infer<typeof configSchema>;

export type ConfigKey = keyof GatewayConfig;

const CONFIG_KEYS = Object.keys(configSchema.shape).filter(
  (key): key is ConfigKey => key in configSchema.shape
);

/** `flushIntervalMs` → `CHRONICLE_FLUSH_INTERVAL_MS` */
export function envName(key: ConfigKey): string {
  return ENV_PREFIX + key.replace(/[A-Z]/g, (letter) => `_${letter}`).toUpperCase();
}

/** `flushIntervalMs` → `flush-interval-ms` */
export function flagName(key: ConfigKey): string {
  return key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

/** Single-letter aliases */
const SHORT_FLAGS: Record<string, string> = {
  p: 'port',
  h: 'host',
  d: 'debug',
};

/**
 * Parse command line arguments into `--key value` / `--flag` pairs.
 */
export function parseArgs(args: readonly string[]): Record<string, string | boolean> {
  const result: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('-')) continue;

    let key = arg.startsWith('--') ? arg.slice(2) : arg.slice(1);
    let inline: string | undefined;
    const equals = key.indexOf('=');
    if (equals !== -1) {
      inline = key.slice(equals + 1);
      key = key.slice(0, equals);
    }
    key = SHORT_FLAGS[key] ?? key;

    const next = args[i + 1];
    if (inline !== undefined) {
      result[key] = inline;
    } else if (next !== undefined && !next.startsWith('-')) {
      result[key] = next;
      i++;
    } else {
      result[key] = true;
    }
  }

  return result;
}

/**
 * Resolve the gateway configuration.
 *
 * @throws ValidationError (CHRONICLE_V302) listing every offending key
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  argv: readonly string[] = process.argv.slice(2)
): GatewayConfig {
  const args = parseArgs(argv);
  const raw: Record<string, unknown> = {};

  for (const key of CONFIG_KEYS) {
    const fromArgs = args[flagName(key)];
    const fromEnv = env[envName(key)];
    if (fromArgs !== undefined) {
      raw[key] = fromArgs;
    } else if (fromEnv !== undefined && fromEnv !== '') {
      raw[key] = fromEnv;
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error), 'CHRONICLE_V302');
  }
  return parsed.data;
}


/**
 * VictoriaMetrics backend over its HTTP API.
 *
 * Writes use the Influx line protocol on `/write`. The database must run with
 * `-influxMeasurementFieldSeparator=/` so series are named `measurement/field`.
 */

import {
  BackendUnavailableError,
  type ErrorCode,
  type Logger,
  SECOND_MS,
  type TelemetryRecord,
  createQuietLogger,
  toError,
  toNumeric,
} from '@chronicle/core';
import { z } from 'zod';
import type { BackendQuery, BackendRow, TimeSeriesBackend } from './types.js';

/** Subset of `fetch` used by the backend */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface VictoriaBackendConfig {
  /** Base URL, e.g. `http://victoria:8428/victoria` */
  url: string;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  logger?: Logger;
}

const FORM_HEADERS = {
  'Content-Type': 'application/x-www-form-urlencoded',
};

const exportLineSchema = z.object({
  metric: z.record(z.string()),
  values: z.array(z.number().nullable()),
  timestamps: z.array(z.number()),
});

const rangeResponseSchema = z.object({
  status: z.literal('success'),
  data: z.object({
    result: z.array(
      z.object({
        metric: z.record(z.string()),
        values: z.array(z.tuple([z.number(), z.string()])),
      })
    ),
  }),
});

const seriesResponseSchema = z.object({
  status: z.literal('success'),
  data: z.array(z.object({ __name__: z.string() }).passthrough()),
});

function escapeMeasurement(value: string): string {
  return value.replace(/[\\, ]/g, (char) => `\\${char}`);
}

function escapeKey(value: string): string {
  return value.replace(/[\\,= ]/g, (char) => `\\${char}`);
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, (char) => `\\${char}`);
}

function escapeLabel(value: string): string {
  return value.replace(/[\\"]/g, (char) => `\\${char}`);
}

/**
 * Encode one record as an Influx line. Fields are sorted by name, booleans
 * become 1/0, numeric strings are parsed and other strings are skipped.
 * Returns null when no field is numeric.
 */
export function toLineProtocol(record: TelemetryRecord): string | null {
  const fields: string[] = [];
  for (const field of Object.keys(record.fields).sort()) {
    const raw = record.fields[field];
    if (raw === undefined) continue;
    const value = toNumeric(raw);
    if (value === null) continue;
    fields.push(`${escapeKey(field)}=${value}`);
  }

  if (fields.length === 0) return null;

  const tags = record.source ? `,source=${escapeKey(record.source)}` : '';
  const nanos = `${Math.trunc(record.timestamp)}000000`;
  return `${escapeMeasurement(record.measurement)}${tags} ${fields.join(',')} ${nanos}`;
}

/**
 * Series selector matching every metric a set of selectors names.
 *
 * @example
 * ```typescript
 * toSeriesSelector(['cpu', 'mem/free', 'disk/sd*']);
 * // {__name__=~"cpu/.+|mem/free|disk/sd.*"}
 * ```
 */
export function toSeriesSelector(selectors: readonly string[]): string {
  const patterns = selectors.map((selector) => {
    if (selector.endsWith('*')) return `${escapeRegex(selector.slice(0, -1))}.*`;
    if (selector.includes('/')) return escapeRegex(selector);
    return `${escapeRegex(selector)}/.+`;
  });
  return `{__name__=~"${escapeLabel(patterns.join('|'))}"}`;
}

function toSeconds(ms: number): string {
  return String(ms / SECOND_MS);
}

/**
 * VictoriaMetrics backend.
 *
 * Downsampled reads run `avg_over_time` over `query_range`. A point at `t`
 * averages `(t - step, t]`, so the request starts one step late and every point
 * is reported at the start of its bucket.
 */
export class VictoriaBackend implements TimeSeriesBackend {
  private readonly url: string;
  private readonly fetch: FetchLike;
  private readonly logger: Logger;

  constructor(config: VictoriaBackendConfig) {
    this.url = config.url.replace(/\/+$/, '');
    this.fetch = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('victoria');
  }

  async write(records: readonly TelemetryRecord[]): Promise<void> {
    const lines: string[] = [];
    for (const record of records) {
      const line = toLineProtocol(record);
      if (line !== null) lines.push(line);
    }
    if (lines.length === 0) return;

    await this.request('/write', { method: 'POST', body: lines.join('\n') }, 'CHRONICLE_B201');
    this.logger.debug('Wrote lines', { lines: lines.length });
  }

  async query(query: BackendQuery): Promise<BackendRow[]> {
    return query.interval === undefined
      ? this.exportRaw(query)
      : this.queryRange(query, query.interval);
  }

  async fields(start: number): Promise<string[]> {
    const body = new URLSearchParams({ 'match[]': '{__name__!=""}', start: toSeconds(start) });
    const response = await this.request(
      '/api/v1/series',
      { method: 'POST', headers: FORM_HEADERS, body: body.toString() },
      'CHRONICLE_B202'
    );
    const parsed = this.parse(seriesResponseSchema, await this.readJson(response));
    return [...new Set(parsed.data.map((series) => series.__name__))].sort();
  }

  async ping(): Promise<void> {
    const response = await this.request('/health', { method: 'GET' }, 'CHRONICLE_B200');
    const status = (await response.text()).trim();
    if (status !== 'OK') {
      throw new BackendUnavailableError('CHRONICLE_B200', `Database ping returned "${status}"`);
    }
  }

  async close(): Promise<void> {
    // Stateless HTTP client
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async exportRaw(query: BackendQuery): Promise<BackendRow[]> {
    const body = new URLSearchParams({
      'match[]': toSeriesSelector(query.selectors),
      start: toSeconds(query.start),
    });
    if (query.end !== undefined) {
      body.set('end', toSeconds(query.end));
    }

    const response = await this.request(
      '/api/v1/export',
      { method: 'POST', headers: FORM_HEADERS, body: body.toString() },
      'CHRONICLE_B202'
    );

    const rows: BackendRow[] = [];
    for (const line of (await response.text()).split('\n')) {
      if (line.trim() === '') continue;
      const chunk = this.parse(exportLineSchema, this.parseJson(line));
      const metric = chunk.metric['__name__'];
      if (metric === undefined) continue;
      const source = chunk.metric['source'] ?? '';

      chunk.timestamps.forEach((timestamp, index) => {
        const value = chunk.values[index];
        if (value === undefined || value === null) return;
        rows.push({ source, metric, timestamp, value });
      });
    }
    return rows;
  }

  private async queryRange(query: BackendQuery, interval: number): Promise<BackendRow[]> {
    const step = `${Math.max(Math.round(interval), 1)}ms`;
    const body = new URLSearchParams({
      query: `avg_over_time(${toSeriesSelector(query.selectors)}[${step}])`,
      start: toSeconds(query.start + interval),
      step,
    });
    if (query.end !== undefined) {
      body.set('end', toSeconds(query.end));
    }

    const response = await this.request(
      '/api/v1/query_range',
      { method: 'POST', headers: FORM_HEADERS, body: body.toString() },
      'CHRONICLE_B202'
    );
    const parsed = this.parse(rangeResponseSchema, await this.readJson(response));

    const rows: BackendRow[] = [];
    for (const series of parsed.data.result) {
      const metric = series.metric['__name__'];
      if (metric === undefined) continue;
      const source = series.metric['source'] ?? '';

      for (const [seconds, text] of series.values) {
        const value = Number(text);
        if (!Number.isFinite(value)) continue;
        rows.push({ source, metric, timestamp: Math.round(seconds * SECOND_MS) - interval, value });
      }
    }
    return rows;
  }

  private async request(path: string, init: RequestInit, code: ErrorCode): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetch(`${this.url}${path}`, init);
    } catch (error) {
      throw new BackendUnavailableError('CHRONICLE_B200', undefined, { path }, toError(error));
    }

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      throw new BackendUnavailableError(code, `${path} returned ${response.status}: ${detail}`, {
        path,
        status: response.status,
      });
    }

    return response;
  }

  private async readJson(response: Response): Promise<unknown> {
    return this.parseJson(await response.text());
  }

  private parseJson(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new BackendUnavailableError('CHRONICLE_B203', undefined, undefined, toError(error));
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new BackendUnavailableError('CHRONICLE_B203', undefined, {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }
}

export function createVictoriaBackend(config: VictoriaBackendConfig): VictoriaBackend {
  return new VictoriaBackend(config);
}

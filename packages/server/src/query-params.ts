/**
 * Translation of request parameters into query descriptors
 */

import { z } from 'zod';
import {
  type QueryDescriptor,
  type TimeRange,
  ValidationError,
  createQueryDescriptor,
  parseDuration,
  selectTimeframe,
  suggestStep,
} from '@chronicle/core';

const instant = z.union([z.string(), z.number()]);

/** Query object of a stream `subscribe` command */
export const queryInputSchema = z.object({
  metrics: z.array(z.string()),
  start: instant.optional(),
  end: instant.optional(),
  duration: instant.optional(),
  /** A duration, or `auto` to pick a step from the range */
  interval: instant.optional(),
});

export type QueryInput = z.infer<typeof queryInputSchema>;

export interface QueryDefaults {
  now: number;
  minimumStepMs: number;
  defaultDurationMs: number;
}

function isSet(value: string | number | undefined): value is string | number {
  return value !== undefined && value !== '';
}

/**
 * Build a descriptor from request parameters. Without start, end or duration
 * the range stays open, which the query engine resolves to its default window
 * and the live stream treats as "live only".
 *
 * @throws ValidationError
 */
export function toQueryDescriptor(input: QueryInput, defaults: QueryDefaults): QueryDescriptor {
  const { now, minimumStepMs, defaultDurationMs } = defaults;
  const hasFrame = isSet(input.start) || isSet(input.end) || isSet(input.duration);
  const range: TimeRange = hasFrame
    ? selectTimeframe({ start: input.start, end: input.end, duration: input.duration }, now, defaultDurationMs)
    : {};

  let interval: number | undefined;
  if (input.interval === 'auto') {
    const start = range.start ?? (range.end ?? now) - defaultDurationMs;
    interval = suggestStep({ start, end: range.end }, now, minimumStepMs);
  } else if (isSet(input.interval)) {
    const parsed = parseDuration(input.interval);
    if (parsed === null || parsed <= 0) {
      throw new ValidationError([{ path: 'interval', message: 'invalid duration' }], 'CHRONICLE_V301');
    }
    interval = parsed;
  }

  return createQueryDescriptor({ selectors: input.metrics, range, interval });
}

/** Read query inputs from URL search parameters */
export function queryInputFromSearch(params: URLSearchParams): QueryInput {
  const optional = (name: string): string | undefined => params.get(name) ?? undefined;
  return {
    metrics: params.getAll('metric'),
    start: optional('start'),
    end: optional('end'),
    duration: optional('duration'),
    interval: optional('interval'),
  };
}

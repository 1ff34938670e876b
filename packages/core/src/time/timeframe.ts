/**
 * Parsing of user-supplied instants, durations and start/duration/end time frames.
 */

import { ValidationError } from '../errors/chronicle-error.js';

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

/** Default span when a time frame leaves both ends implicit */
export const DEFAULT_DURATION_MS = DAY_MS;

/** Target number of buckets for an automatically chosen downsampling step */
export const DESIRED_POINTS = 1000;

/** Smallest automatically chosen downsampling step */
export const MINIMUM_STEP_MS = 10 * SECOND_MS;

/**
 * Epoch values above this are taken as milliseconds, below as seconds.
 * 10e10 ms falls in 1973 while 10e10 s falls in the year 5138.
 */
const MILLISECONDS_THRESHOLD = 10e10;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: SECOND_MS,
  m: MINUTE_MS,
  h: HOUR_MS,
  d: DAY_MS,
  w: WEEK_MS,
};

const DURATION_PART = /(\d+(?:\.\d+)?)\s*(ms|s|m|h|d|w)/gy;
const NUMERIC = /^-?\d+(?:\.\d+)?$/;

/** Anything accepted as an instant */
export type InstantInput = string | number | Date | null | undefined;

/**
 * Parse a duration into milliseconds.
 *
 * Plain numbers (or numeric strings) are seconds; otherwise one or more
 * `<amount><unit>` parts such as `10s`, `5m`, `1h30m` or `1w`.
 * Returns null for anything else.
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value * SECOND_MS : null;
  }

  const text = value.trim();
  if (text === '') return null;
  if (NUMERIC.test(text)) return Number(text) * SECOND_MS;

  let total = 0;
  let consumed = 0;
  DURATION_PART.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = DURATION_PART.exec(text)) !== null) {
    const amount = match[1];
    const unit = match[2];
    if (amount === undefined || unit === undefined) return null;
    total += Number(amount) * (UNIT_MS[unit] ?? 0);
    consumed = DURATION_PART.lastIndex;
    while (text[consumed] === ' ') consumed++;
    DURATION_PART.lastIndex = consumed;
  }

  return consumed === text.length ? total : null;
}

/**
 * Parse an instant into epoch milliseconds.
 *
 * Numbers are epoch seconds or milliseconds (guessed by magnitude), strings are
 * numeric epochs or ISO-8601. Empty input yields undefined, invalid input null.
 */
export function parseDatetime(value: InstantInput): number | undefined | null {
  if (value === null || value === undefined || value === '') return undefined;

  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return value > MILLISECONDS_THRESHOLD ? Math.trunc(value) : Math.trunc(value * SECOND_MS);
  }

  const text = value.trim();
  if (NUMERIC.test(text)) return parseDatetime(Number(text));

  const parsed = Date.parse(text);
  return Number.isNaN(parsed) ? null : parsed;
}

/** Time frame inputs; at most two of the three may be set */
export interface TimeframeInput {
  start?: InstantInput;
  duration?: string | number | null;
  end?: InstantInput;
}

/** Resolved `[start, end)` frame; a missing end means "open ended" */
export interface Timeframe {
  start: number;
  end?: number;
}

/**
 * Resolve start/duration/end into a concrete frame.
 *
 * | Given            | Frame                         |
 * |------------------|-------------------------------|
 * | nothing          | `[now - default, open)`       |
 * | start + duration | `[start, start + duration)`   |
 * | start + end      | `[start, end)`                |
 * | duration + end   | `[end - duration, end)`       |
 * | start            | `[start, open)`               |
 * | duration         | `[now - duration, open)`      |
 * | end              | `[end - default, end)`        |
 *
 * @throws ValidationError for unparseable values or when all three are set
 */
export function selectTimeframe(
  input: TimeframeInput,
  now: number = Date.now(),
  defaultDurationMs: number = DEFAULT_DURATION_MS
): Timeframe {
  const issues: { path: string; message: string }[] = [];

  const start = parseDatetime(input.start);
  if (start === null) issues.push({ path: 'start', message: 'invalid date/time' });

  const end = parseDatetime(input.end);
  if (end === null) issues.push({ path: 'end', message: 'invalid date/time' });

  const duration = parseOptionalDuration(input.duration);
  if (duration === null) issues.push({ path: 'duration', message: 'invalid duration' });

  if (issues.length > 0) {
    throw new ValidationError(issues, 'CHRONICLE_V301');
  }

  const hasStart = typeof start === 'number';
  const hasEnd = typeof end === 'number';
  const hasDuration = typeof duration === 'number';

  if (hasStart && hasEnd && hasDuration) {
    throw new ValidationError(
      [{ path: '', message: 'at most two out of start, duration and end can be provided' }],
      'CHRONICLE_V301'
    );
  }

  if (hasStart && hasDuration) return { start, end: start + duration };
  if (hasStart && hasEnd) return { start, end };
  if (hasDuration && hasEnd) return { start: end - duration, end };
  if (hasStart) return { start };
  if (hasDuration) return { start: now - duration };
  if (hasEnd) return { start: end - defaultDurationMs, end };
  return { start: now - defaultDurationMs };
}

function parseOptionalDuration(value: TimeframeInput['duration']): number | undefined | null {
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = parseDuration(value);
  return parsed === null || parsed <= 0 ? null : parsed;
}

/**
 * Pick a downsampling step that yields roughly {@link DESIRED_POINTS} buckets,
 * never smaller than the minimum step. Rounded down to whole seconds.
 */
export function suggestStep(
  frame: Timeframe,
  now: number = Date.now(),
  minimumStepMs: number = MINIMUM_STEP_MS
): number {
  const span = Math.max((frame.end ?? now) - frame.start, 0);
  const desired = Math.floor(span / DESIRED_POINTS / SECOND_MS) * SECOND_MS;
  return Math.max(desired, minimumStepMs);
}

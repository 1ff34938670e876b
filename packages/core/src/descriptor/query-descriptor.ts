/**
 * Query descriptor: the normalized, immutable form of a historical or live query.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../errors/chronicle-error.js';

/** Half-open time range `[start, end)`; either end may be open */
export interface TimeRange {
  /** Inclusive start, epoch milliseconds */
  readonly start?: number;
  /** Exclusive end, epoch milliseconds */
  readonly end?: number;
}

/**
 * Normalized query parameters shared by the query engine (one-shot) and the
 * live query stream (repeated).
 */
export interface QueryDescriptor {
  /** Metric selectors, sorted and de-duplicated */
  readonly selectors: readonly string[];
  /** Requested time range */
  readonly range: TimeRange;
  /** Downsampling bucket size in milliseconds; raw points when absent */
  readonly interval?: number;
}

/** Loose input accepted by {@link createQueryDescriptor} */
export interface QueryDescriptorInit {
  selectors: Iterable<string>;
  range?: { start?: number; end?: number };
  interval?: number;
}

const descriptorSchema = z
  .object({
    selectors: z
      .array(z.string().trim().min(1, 'selector must not be empty'))
      .min(1, 'at least one metric selector is required'),
    range: z
      .object({
        start: z.number().finite().optional(),
        end: z.number().finite().optional(),
      })
      .default({}),
    interval: z.number().finite().positive('interval must be positive').optional(),
  })
  .superRefine((value, ctx) => {
    const { start, end } = value.range;
    if (start !== undefined && end !== undefined && start > end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['range'],
        message: 'start must not be after end',
      });
    }
  });

/** Convert zod issues into field-level validation issues */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate and freeze a query descriptor.
 *
 * @throws ValidationError when the selector set is empty, start is after end,
 *   or the interval is not positive
 */
export function createQueryDescriptor(init: QueryDescriptorInit): QueryDescriptor {
  const parsed = descriptorSchema.safeParse({
    selectors: [...init.selectors],
    range: init.range,
    interval: init.interval,
  });

  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error), 'CHRONICLE_V301');
  }

  const { selectors, range, interval } = parsed.data;
  const normalizedRange: TimeRange = Object.freeze({
    ...(range.start !== undefined ? { start: range.start } : {}),
    ...(range.end !== undefined ? { end: range.end } : {}),
  });

  return Object.freeze({
    selectors: Object.freeze([...new Set(selectors)].sort()),
    range: normalizedRange,
    ...(interval !== undefined ? { interval } : {}),
  });
}

/**
 * Re-check a descriptor that may not have come through {@link createQueryDescriptor}.
 *
 * @throws ValidationError
 */
export function validateQueryDescriptor(descriptor: QueryDescriptor): void {
  createQueryDescriptor(descriptor);
}

/** Copy of a descriptor with a different range */
export function withRange(descriptor: QueryDescriptor, range: TimeRange): QueryDescriptor {
  return createQueryDescriptor({
    selectors: descriptor.selectors,
    range,
    interval: descriptor.interval,
  });
}

/**
 * Stable hash of the query parameters. Two descriptors with the same selectors,
 * range and interval share a fingerprint regardless of selector order.
 */
export function fingerprintOf(descriptor: QueryDescriptor): string {
  const canonical = JSON.stringify([
    [...new Set(descriptor.selectors)].sort(),
    descriptor.range.start ?? null,
    descriptor.range.end ?? null,
    descriptor.interval ?? null,
  ]);
  return createHash('sha1').update(canonical).digest('hex');
}

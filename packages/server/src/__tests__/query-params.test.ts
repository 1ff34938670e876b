import { describe, expect, it } from 'vitest';
import { ValidationError } from '@chronicle/core';
import { queryInputFromSearch, toQueryDescriptor } from '../query-params.js';

const defaults = { now: 10_000_000, minimumStepMs: 10_000, defaultDurationMs: 86_400_000 };

const HOUR_START = '2024-01-01T00:00:00Z';
const HOUR_END = '2024-01-01T01:00:00Z';

describe('toQueryDescriptor', () => {
  it('should leave the range open without start, end or duration', () => {
    expect(toQueryDescriptor({ metrics: ['cpu/load'] }, defaults)).toEqual({ selectors: ['cpu/load'], range: {} });
  });

  it('should count a duration back from now', () => {
    const descriptor = toQueryDescriptor({ metrics: ['cpu'], duration: '1h' }, defaults);
    expect(descriptor.range).toEqual({ start: 6_400_000 });
  });

  it('should pick an automatic interval from the range', () => {
    const descriptor = toQueryDescriptor({ metrics: ['cpu'], start: HOUR_START, end: HOUR_END, interval: 'auto' }, defaults);

    expect(descriptor.range).toEqual({ start: 1_704_067_200_000, end: 1_704_070_800_000 });
    expect(descriptor.interval).toBe(10_000);
  });

  it('should parse an explicit interval', () => {
    expect(toQueryDescriptor({ metrics: ['cpu'], interval: '5m' }, defaults).interval).toBe(300_000);
  });

  it.each(['soon', 0])('should reject the interval %s', (interval) => {
    expect(() => toQueryDescriptor({ metrics: ['cpu'], interval }, defaults)).toThrow(ValidationError);
  });

  it('should reject start, end and duration together', () => {
    expect(() =>
      toQueryDescriptor({ metrics: ['cpu'], start: HOUR_START, end: HOUR_END, duration: '1h' }, defaults)
    ).toThrow('at most two out of start, duration and end can be provided');
  });

  it('should reject an empty metric list', () => {
    expect(() => toQueryDescriptor({ metrics: [] }, defaults)).toThrow(ValidationError);
  });
});

describe('queryInputFromSearch', () => {
  it('should collect repeated metric parameters', () => {
    const input = queryInputFromSearch(new URLSearchParams('metric=a&metric=b&duration=5m'));

    expect(input.metrics).toEqual(['a', 'b']);
    expect(input.duration).toBe('5m');
    expect(input.start).toBeUndefined();
    expect(input.interval).toBeUndefined();
  });
});

export {
  createQueryDescriptor,
  fingerprintOf,
  toValidationIssues,
  validateQueryDescriptor,
  withRange,
  type QueryDescriptor,
  type QueryDescriptorInit,
  type TimeRange,
} from './query-descriptor.js';

export { RecordMatcher, inRange, matchesSelector } from './record-matcher.js';

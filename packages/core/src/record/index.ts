export {
  METRIC_SEPARATOR,
  createRecord,
  isFieldValue,
  metricName,
  sortByTimestamp,
  splitMetricName,
  toNumeric,
  type FieldMap,
  type FieldValue,
  type RecordInit,
  type TelemetryRecord,
} from './record.js';

export {
  DAY_MS,
  DEFAULT_DURATION_MS,
  DESIRED_POINTS,
  HOUR_MS,
  MINIMUM_STEP_MS,
  MINUTE_MS,
  SECOND_MS,
  WEEK_MS,
  parseDatetime,
  parseDuration,
  selectTimeframe,
  suggestStep,
  type InstantInput,
  type Timeframe,
  type TimeframeInput,
} from './timeframe.js';

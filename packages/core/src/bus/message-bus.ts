/**
 * Publish/subscribe message bus contract
 */

/** Raw message payload as delivered by the bus */
export type BusPayload = Uint8Array;

/** Receives every message published to a topic matching the subscription filter */
export type MessageHandler = (topic: string, payload: BusPayload) => void;

/**
 * Topic based publish/subscribe transport.
 *
 * Topic filters follow MQTT rules: `+` matches one level, a trailing `#`
 * matches any number of levels including none.
 */
export interface MessageBus {
  /** Register a handler for a topic filter; the first handler subscribes the filter */
  subscribe(filter: string, handler: MessageHandler): Promise<void>;

  /** Remove a handler; the last handler unsubscribes the filter */
  unsubscribe(filter: string, handler: MessageHandler): Promise<void>;

  /** Publish a payload; strings are sent as UTF-8 */
  publish(topic: string, payload: string | BusPayload): Promise<void>;

  /** Release the transport. Further calls fail. */
  close(): Promise<void>;
}

const TOPIC_SEPARATOR = '/';

/**
 * Match a concrete topic against an MQTT topic filter.
 *
 * @example
 * ```typescript
 * topicMatches('telemetry/history/#', 'telemetry/history/rack1/temp'); // true
 * topicMatches('telemetry/+/temp', 'telemetry/rack1/temp');            // true
 * topicMatches('telemetry/+', 'telemetry/rack1/temp');                 // false
 * ```
 */
export function topicMatches(filter: string, topic: string): boolean {
  const filterLevels = filter.split(TOPIC_SEPARATOR);
  const topicLevels = topic.split(TOPIC_SEPARATOR);

  for (let i = 0; i < filterLevels.length; i++) {
    const level = filterLevels[i];
    if (level === '#') return i === filterLevels.length - 1;
    if (i >= topicLevels.length) return false;
    if (level !== '+' && level !== topicLevels[i]) return false;
  }

  return filterLevels.length === topicLevels.length;
}

/**
 * Check a topic filter is well formed: `#` only as the last level,
 * wildcards only as whole levels.
 */
export function isValidTopicFilter(filter: string): boolean {
  if (filter === '') return false;
  const levels = filter.split(TOPIC_SEPARATOR);
  return levels.every((level, index) => {
    if (level === '#') return index === levels.length - 1;
    if (level === '+') return true;
    return !level.includes('#') && !level.includes('+');
  });
}

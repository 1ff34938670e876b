/**
 * Datastore key helpers
 */

/** Allowed characters for namespaces and ids */
export const KEY_PATTERN = /^[\w\-.:~ ()]*$/;

/** Storage key of a value: `namespace:id`, or just `id` without a namespace */
export function storageKey(namespace: string, id: string): string {
  return namespace ? `${namespace}:${id}` : id;
}

/** First segment of a storage key, used as the change topic suffix */
export function topLevelNamespace(key: string): string {
  const separator = key.indexOf(':');
  return separator === -1 ? key : key.slice(0, separator);
}

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

/**
 * Translate a Redis glob into an anchored regular expression.
 *
 * Supports `*`, `?`, character classes (`[abc]`, `[^a]`, `[a-z]`) and
 * backslash escapes. An unterminated `[` matches itself.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);

    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '\\' && i + 1 < pattern.length) {
      i++;
      source += pattern.charAt(i).replace(REGEX_SPECIAL, '\\$&');
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, close);
      const negated = body.startsWith('^');
      if (negated) body = body.slice(1);
      source += `[${negated ? '^' : ''}${body.replace(/[\\\]]/g, '\\$&')}]`;
      i = close;
    } else {
      source += char.replace(REGEX_SPECIAL, '\\$&');
    }
  }

  return new RegExp(`^${source}$`, 's');
}

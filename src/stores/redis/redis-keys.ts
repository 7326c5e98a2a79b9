/**
 * Redis key layout for stored Results: `<prefix><key>`, the prefix
 * defaulting to `faultline:result:`.
 *
 * @module redis-keys
 */

export const DEFAULT_KEY_PREFIX = 'faultline:result:';

/**
 * @example
 * ```typescript
 * getResultKey('order-7')          // => "faultline:result:order-7"
 * getResultKey('order-7', 'app:')  // => "app:order-7"
 * ```
 */
export function getResultKey(key: string, prefix: string = DEFAULT_KEY_PREFIX): string {
  return `${prefix}${key}`;
}

/**
 * Run a step that may or may not suspend and expose it as a Promise.
 *
 * Synchronous throws become rejections, so a failing step behaves the same
 * whether it was written sync or async.
 */
export function settle<T>(run: () => T | PromiseLike<T>): Promise<T> {
  return new Promise<T>((resolve) => resolve(run()));
}

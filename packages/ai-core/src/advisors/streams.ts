/**
 * Stream Helpers
 *
 * Composable wrappers around lazy async sequences. Each wrapper forwards
 * elements as they are pulled and never reads ahead of its consumer.
 */

export interface StreamHooks<T> {
  /** Called for every element, before it is handed downstream */
  onItem?: (item: T) => void | Promise<void>;
  /**
   * Called once, after the upstream sequence ends and the consumer pulls past
   * its last element. Not called when the consumer stops early or the
   * upstream sequence fails.
   */
  onComplete?: () => void | Promise<void>;
}

/**
 * Forward `source` untouched while observing it.
 */
export async function* tapStream<T>(
  source: AsyncIterable<T>,
  hooks: StreamHooks<T>
): AsyncGenerator<T, void, undefined> {
  for await (const item of source) {
    if (hooks.onItem) {
      await hooks.onItem(item);
    }
    yield item;
  }
  if (hooks.onComplete) {
    await hooks.onComplete();
  }
}

/**
 * Transform each element of `source` as it is pulled.
 */
export async function* mapStream<T, U>(
  source: AsyncIterable<T>,
  fn: (item: T) => U | Promise<U>
): AsyncGenerator<U, void, undefined> {
  for await (const item of source) {
    yield await fn(item);
  }
}

/**
 * Wrap `source` so that it can be drained at most once.
 * A second iteration ends immediately without touching `source`.
 */
export function singleUse<T>(source: AsyncIterable<T>): AsyncGenerator<T, void, undefined> {
  return (async function* () {
    yield* source;
  })();
}

/**
 * Drain a sequence into an array.
 */
export async function collectStream<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

const tails = new Map<string, Promise<unknown>>();

/**
 * Runs `fn` after every earlier call holding the same key has settled.
 * Different keys never wait on each other.
 */
export async function withKeyLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const previous = tails.get(key) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const tail = run.then(
    () => undefined,
    () => undefined,
  );
  tails.set(key, tail);
  try {
    return await run;
  } finally {
    if (tails.get(key) === tail) {
      tails.delete(key);
    }
  }
}

export function pendingLockCount() {
  return tails.size;
}

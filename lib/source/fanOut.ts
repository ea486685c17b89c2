/**
 * Index-addressed result slots shared by the concurrent tasks of one tile.
 * Each write is a single synchronous step, so no two writers interleave;
 * once sealed, further writes are dropped.
 */
export class SlotCollector<T> {
  private readonly slots: (T | null)[];
  private sealed = false;

  constructor(size: number) {
    this.slots = new Array<T | null>(size).fill(null);
  }

  /** Returns false when the write arrived after sealing or out of range. */
  fill(index: number, value: T | null): boolean {
    if (this.sealed) return false;
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) return false;
    this.slots[index] = value;
    return true;
  }

  seal(): (T | null)[] {
    this.sealed = true;
    return [...this.slots];
  }
}

export type FanOutTask<L, T> = (location: L, index: number) => Promise<T | null>;

/**
 * Starts one task per location and waits for all of them or for the
 * deadline, whichever comes first. Results keep location order; a task that
 * failed or is still running at the deadline leaves its slot null.
 */
export async function fanOut<L, T>(
  locations: readonly L[],
  task: FanOutTask<L, T>,
  deadlineMs: number,
): Promise<(T | null)[]> {
  const collector = new SlotCollector<T>(locations.length);

  const running = locations.map((location, index) =>
    task(location, index).then(
      (value) => {
        collector.fill(index, value);
      },
      (error: unknown) => {
        console.warn(`[tile-fetch] Layer ${index} task failed:`, error);
      },
    ),
  );

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<"deadline">((resolve) => {
    timer = setTimeout(() => resolve("deadline"), deadlineMs);
  });

  try {
    const finished = await Promise.race([Promise.all(running).then(() => "done" as const), deadline]);
    if (finished === "deadline") {
      console.warn(`[tile-fetch] Fan-out deadline of ${Math.round(deadlineMs)}ms reached; compositing available layers`);
    }
  } finally {
    clearTimeout(timer);
  }

  return collector.seal();
}

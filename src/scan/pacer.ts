export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };

    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Spaces out the starts of consecutive operations by a fixed interval,
 * measured start to start. Slots are reserved in call order, so callers are
 * released in the order they asked. The first caller goes immediately.
 */
export class Pacer {
  readonly intervalMs: number;
  private nextStartAt: number;

  constructor(intervalMs: number) {
    this.intervalMs = Math.max(0, intervalMs);
    this.nextStartAt = 0;
  }

  /** Resolves true when the slot is reached, false when aborted while waiting */
  async wait(signal?: AbortSignal): Promise<boolean> {
    const now = Date.now();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + this.intervalMs;

    await sleep(startAt - now, signal);
    return !signal?.aborted;
  }
}

export default Pacer;

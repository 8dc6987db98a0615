/**
 * One-shot completion signal.
 *
 * Written once by a single producer, awaited by any number of readers. Later
 * writes are ignored and reported through the return value of `settle`.
 */

export type WaitOutcome<T> = { settled: true; value: T } | { settled: false };

export class CompletionSignal<T> {
  private value: { current: T } | null = null;
  private readonly promise: Promise<T>;
  private readonly resolvePromise: (value: T) => void;
  private readonly listeners = new Set<(value: T) => void>();

  constructor() {
    let resolvePromise: (value: T) => void = () => undefined;
    this.promise = new Promise<T>((resolve) => {
      resolvePromise = resolve;
    });
    this.resolvePromise = resolvePromise;
  }

  get isSettled(): boolean {
    return this.value !== null;
  }

  /** The settled value, if any. */
  peek(): T | undefined {
    return this.value?.current;
  }

  /**
   * Populate the signal. Returns false, leaving the first value in place, if
   * it was already settled.
   */
  settle(value: T): boolean {
    if (this.value !== null) {
      return false;
    }
    this.value = { current: value };
    this.resolvePromise(value);
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener(value);
    }
    return true;
  }

  /**
   * Call `listener` once when the signal settles, or right away if it already
   * has. Returns a function that detaches the listener.
   */
  subscribe(listener: (value: T) => void): () => void {
    if (this.value !== null) {
      listener(this.value.current);
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  wait(): Promise<T> {
    return this.promise;
  }

  /**
   * Wait at most `timeoutMs` for the signal.
   */
  async waitFor(timeoutMs: number): Promise<WaitOutcome<T>> {
    if (this.value !== null) {
      return { settled: true, value: this.value.current };
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<WaitOutcome<T>>((resolve) => {
      timer = setTimeout(() => resolve({ settled: false }), timeoutMs);
    });

    try {
      return await Promise.race([
        this.promise.then((value): WaitOutcome<T> => ({ settled: true, value })),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

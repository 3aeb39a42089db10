/**
 * Cooperative pause checkpoint. The run loop calls `wait()` at well-defined
 * points; `pause()` never interrupts work already in flight.
 */
export class PauseGate {
  private paused = false;
  private waiters = new Set<() => void>();

  get isPaused(): boolean {
    return this.paused;
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const release of waiters) release();
  }

  /**
   * Resolves immediately when not paused; otherwise once `resume()` is called
   * or `signal` aborts.
   */
  wait(signal?: AbortSignal): Promise<void> {
    if (!this.paused || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const release = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      const onAbort = () => {
        this.waiters.delete(release);
        resolve();
      };
      this.waiters.add(release);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

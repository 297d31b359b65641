interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Tracks which sessions have a run in progress in this process. At most one
 * run per session; different sessions never contend. Synchronous, in-memory.
 */
export class SessionGate {
  private readonly active = new Map<string, ActiveRun>();

  /**
   * Runs `fn` as the session's only active run. Returns null, without calling
   * `fn`, when the session already has one. `fn` is called synchronously, so
   * it sees an `abort()` issued right after `run` returns.
   */
  run<T>(sessionId: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> | null {
    if (this.active.has(sessionId)) {
      return null;
    }
    const controller = new AbortController();
    let result: Promise<T>;
    try {
      result = fn(controller.signal);
    } catch (err) {
      result = Promise.reject(err);
    }
    const entry: ActiveRun = {
      controller,
      done: result.then(
        () => undefined,
        () => undefined,
      ),
    };
    this.active.set(sessionId, entry);
    void entry.done.then(() => {
      if (this.active.get(sessionId) === entry) {
        this.active.delete(sessionId);
      }
    });
    return result;
  }

  /** Signals the session's run to stop. Returns false when nothing is running. */
  abort(sessionId: string): boolean {
    const entry = this.active.get(sessionId);
    if (!entry) return false;
    entry.controller.abort();
    return true;
  }

  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  /** Resolves once the session has no run in progress. */
  async whenIdle(sessionId: string): Promise<void> {
    let entry = this.active.get(sessionId);
    while (entry) {
      await entry.done;
      // Let the cleanup callback registered in run() settle first.
      await Promise.resolve();
      entry = this.active.get(sessionId);
    }
  }

  activeSessionIds(): string[] {
    return [...this.active.keys()];
  }
}

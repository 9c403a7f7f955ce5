/**
 * Lets any number of callers of the same phase run together while keeping the
 * phases apart: while a `write` holder runs no `read` starts, and the other way
 * round. Waiters are admitted in arrival order, each batch taking every queued
 * caller of its phase up to the first caller of the other phase.
 */
export type Phase = 'read' | 'write';

interface Waiter {
  phase: Phase;
  admit: () => void;
}

export class PhaseLock {
  private active: Phase | null = null;
  private holders = 0;
  private queue: Waiter[] = [];

  async run<T>(phase: Phase, fn: () => Promise<T>): Promise<T> {
    await this.acquire(phase);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(phase: Phase): Promise<void> {
    if (this.queue.length === 0 && (this.holders === 0 || this.active === phase)) {
      this.active = phase;
      this.holders++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ phase, admit: resolve });
    });
  }

  private release(): void {
    this.holders--;
    if (this.holders > 0) return;

    const next = this.queue[0];
    if (!next) {
      this.active = null;
      return;
    }
    this.active = next.phase;
    while (this.queue[0]?.phase === next.phase) {
      const waiter = this.queue.shift();
      if (!waiter) break;
      this.holders++;
      waiter.admit();
    }
  }
}

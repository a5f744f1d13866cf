/**
 * @fileoverview Async Utilities
 *
 * @packageDocumentation
 */

/**
 * Race a promise against a wall-clock budget.
 *
 * @param timeoutMs - Budget in milliseconds; `0`, negative or non-finite disables it
 * @param onTimeout - Builds the rejection reason when the budget runs out
 *
 * @example
 * ```typescript
 * const result = await withTimeout(pipeline.run(query), 250, () => new ResolutionTimeoutError(250));
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => reject(onTimeout()), timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Readers share access; writers are exclusive and queue in FIFO order with
 * readers that arrive after them, so a waiting writer is never starved.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly queue: Array<{ kind: 'read' | 'write'; grant: () => void }> = [];

  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.activeReaders -= 1;
      this.drain();
    }
  }

  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writerActive = false;
      this.drain();
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  private acquire(kind: 'read' | 'write'): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(kind)) {
      this.take(kind);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ kind, grant: resolve });
    });
  }

  private canGrant(kind: 'read' | 'write'): boolean {
    if (this.writerActive) return false;
    return kind === 'read' || this.activeReaders === 0;
  }

  private take(kind: 'read' | 'write'): void {
    if (kind === 'read') {
      this.activeReaders += 1;
    } else {
      this.writerActive = true;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!next || !this.canGrant(next.kind)) return;
      this.queue.shift();
      this.take(next.kind);
      next.grant();
      if (next.kind === 'write') return;
    }
  }
}

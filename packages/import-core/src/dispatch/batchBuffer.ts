import type { WriteTarget } from '../types';

/**
 * Pending units for a single write target. The head batch stays in place
 * until it is acknowledged, so a failed flush can be retried.
 */
export class BatchBuffer<T> {
  private items: T[] = [];
  private headAttempts = 0;
  private retryAt = 0;
  private currentTarget: WriteTarget | null = null;

  get length(): number {
    return this.items.length;
  }

  get target(): WriteTarget | null {
    return this.currentTarget;
  }

  /** Attempts already spent on the current head batch. */
  get attempts(): number {
    return this.headAttempts;
  }

  /** Whether the head batch may be flushed at `now` (epoch ms). */
  isReady(now: number): boolean {
    return this.headAttempts === 0 || now >= this.retryAt;
  }

  accepts(target: WriteTarget): boolean {
    return (
      this.items.length === 0 ||
      this.currentTarget === null ||
      (this.currentTarget.database === target.database &&
        this.currentTarget.retentionPolicy === target.retentionPolicy)
    );
  }

  push(target: WriteTarget, items: readonly T[]): void {
    if (!this.accepts(target)) {
      throw new Error('batch buffer holds units for another target');
    }
    this.currentTarget = target;
    this.items.push(...items);
  }

  takeBatch(size: number): T[] {
    return this.items.slice(0, Math.min(size, this.items.length));
  }

  acknowledge(count: number): void {
    this.items = this.items.slice(count);
    this.headAttempts = 0;
    this.retryAt = 0;
  }

  recordFailure(): number {
    this.headAttempts += 1;
    return this.headAttempts;
  }

  /** Holds the head batch back from threshold flushes until `at` (epoch ms). */
  deferUntil(at: number): void {
    this.retryAt = at;
  }
}

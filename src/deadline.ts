import { systemClock, type Clock } from './clock.js';
import type { TaskFailedError } from './errors.js';

export type CancelCause =
  | { kind: 'timeout' }
  | { kind: 'failure'; label: string; error: TaskFailedError }
  | { kind: 'parent'; reason: unknown };

/**
 * Deadline context shared by every task of one supervisor invocation.
 * Responsibility: one-way, idempotent cancellation with the first cause retained.
 * Non-goals: preemption (tasks observe `signal` on their own polling tick).
 */
export class DeadlineContext {
  private readonly controller = new AbortController();
  private readonly clock: Clock;
  private readonly parent?: AbortSignal;
  private readonly onParentAbort = () => { this.cancel({ kind: 'parent', reason: this.parent?.reason }); };
  private timer: NodeJS.Timeout | undefined;
  private firstCause: CancelCause | undefined;
  readonly startedAt: number;
  readonly timeoutMs: number;

  constructor(timeoutMs: number, opts: { clock?: Clock; parent?: AbortSignal } = {}) {
    if (!(timeoutMs > 0)) throw new RangeError(`timeoutMs must be > 0 (got ${timeoutMs})`);
    this.clock = opts.clock ?? systemClock;
    this.timeoutMs = timeoutMs;
    this.startedAt = this.clock.now();
    this.timer = setTimeout(() => { this.cancel({ kind: 'timeout' }); }, timeoutMs);
    this.parent = opts.parent;
    if (this.parent?.aborted) this.onParentAbort();
    else this.parent?.addEventListener('abort', this.onParentAbort, { once: true });
  }

  get signal(): AbortSignal { return this.controller.signal; }
  get cancelled(): boolean { return this.controller.signal.aborted; }
  get cause(): CancelCause | undefined { return this.firstCause; }

  elapsedMs(): number { return this.clock.now() - this.startedAt; }
  remainingMs(): number { return Math.max(0, this.timeoutMs - this.elapsedMs()); }
  expired(): boolean { return this.elapsedMs() >= this.timeoutMs; }

  /** Returns true only for the call that actually cancelled. */
  cancel(cause: CancelCause): boolean {
    if (this.firstCause) return false;
    this.firstCause = cause;
    this.controller.abort(cause);
    this.clearTimer();
    return true;
  }

  dispose() {
    this.clearTimer();
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private clearTimer() {
    if (this.timer) { clearTimeout(this.timer); this.timer = undefined; }
  }
}

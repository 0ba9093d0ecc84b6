import { describe, it, expect } from 'vitest';
import { getEventListeners } from 'node:events';
import { abortableSleep, anySignal, createManualClock } from '../src/clock.js';
import { DeadlineContext, type CancelCause } from '../src/deadline.js';
import { TaskFailedError } from '../src/errors.js';
import { since, sleep } from './utils/time.js';

const failure = (label: string): CancelCause => ({ kind: 'failure', label, error: new TaskFailedError(label, 'broken') });

describe('DeadlineContext', () => {
  it('keeps the first cancellation cause', () => {
    const ctx = new DeadlineContext(10_000);
    const first = failure('a');
    expect(ctx.cancel(first)).toBe(true);
    expect(ctx.cancel(failure('b'))).toBe(false);
    expect(ctx.cancel({ kind: 'timeout' })).toBe(false);
    expect(ctx.cancelled).toBe(true);
    expect(ctx.cause).toBe(first);
    expect(ctx.signal.reason).toBe(first);
    ctx.dispose();
  });

  it('lets exactly one of several concurrent cancellers win', async () => {
    const ctx = new DeadlineContext(10_000);
    const attempt = async (label: string) => { await Promise.resolve(); return ctx.cancel(failure(label)); };
    const results = await Promise.all(['a', 'b', 'c'].map(attempt));
    expect(results.filter(Boolean)).toHaveLength(1);
    expect(ctx.cause?.kind).toBe('failure');
    ctx.dispose();
  });

  it('cancels itself when the timeout elapses', async () => {
    const ctx = new DeadlineContext(30);
    const start = performance.now();
    await abortableSleep(5000, ctx.signal);
    expect(since(start)).toBeLessThan(1000);
    expect(ctx.cause).toEqual({ kind: 'timeout' });
    ctx.dispose();
  });

  it('propagates a parent abort', () => {
    const parent = new AbortController();
    const ctx = new DeadlineContext(10_000, { parent: parent.signal });
    parent.abort('operator abort');
    expect(ctx.cause).toEqual({ kind: 'parent', reason: 'operator abort' });
    ctx.dispose();
  });

  it('starts cancelled under an already aborted parent', () => {
    const parent = new AbortController();
    parent.abort('gone');
    const ctx = new DeadlineContext(10_000, { parent: parent.signal });
    expect(ctx.cancelled).toBe(true);
    expect(ctx.cause).toEqual({ kind: 'parent', reason: 'gone' });
    ctx.dispose();
  });

  it('measures elapsed and remaining time on its clock', () => {
    const clock = createManualClock(50);
    const ctx = new DeadlineContext(1000, { clock });
    clock.advance(400);
    expect(ctx.elapsedMs()).toBe(400);
    expect(ctx.remainingMs()).toBe(600);
    expect(ctx.expired()).toBe(false);
    clock.advance(700);
    expect(ctx.remainingMs()).toBe(0);
    expect(ctx.expired()).toBe(true);
    ctx.dispose();
  });

  it('does not time out after dispose', async () => {
    const ctx = new DeadlineContext(20);
    ctx.dispose();
    await sleep(60);
    expect(ctx.cancelled).toBe(false);
  });

  it('rejects a non-positive timeout', () => {
    expect(() => new DeadlineContext(0)).toThrow(RangeError);
  });
});

describe('anySignal', () => {
  it('aborts when any input aborts', () => {
    const a = new AbortController();
    const b = new AbortController();
    const both = anySignal(a.signal, b.signal);
    expect(both.signal.aborted).toBe(false);
    b.abort('b');
    expect(both.signal.aborted).toBe(true);
    expect(both.signal.reason).toBe('b');
    expect(getEventListeners(a.signal, 'abort')).toHaveLength(0);
  });

  it('is aborted up front when an input already is', () => {
    const a = new AbortController();
    const b = new AbortController();
    a.abort('early');
    expect(anySignal(b.signal, a.signal).signal.reason).toBe('early');
    expect(getEventListeners(b.signal, 'abort')).toHaveLength(0);
  });

  it('detaches from its inputs on dispose', () => {
    const a = new AbortController();
    const combined = anySignal(a.signal);
    expect(getEventListeners(a.signal, 'abort')).toHaveLength(1);
    combined.dispose();
    expect(getEventListeners(a.signal, 'abort')).toHaveLength(0);
    a.abort();
    expect(combined.signal.aborted).toBe(false);
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { AmbiguousIndexError, PredicateEvaluationError, TaskFailedError, TimeoutError } from '../src/errors.js';
import { assertVerified, describeResult, entityForIndex, eventuallyEntityForIndex, updateEntityAtIndex, VerificationFailedError } from '../src/scenario.js';
import { createMemorySource, type MemorySource } from '../src/source.js';
import type { SupervisorResult } from '../src/supervisor.js';

const CONTROL = { role: 'control' };
let source: MemorySource;

beforeEach(() => {
  source = createMemorySource();
  source.seed('members', [
    { name: 'member-0', labels: CONTROL, data: { spec: 'small' } },
    { name: 'member-1', labels: CONTROL, data: { spec: 'small' } },
    { name: 'worker-1', labels: { role: 'worker' }, data: {} }
  ]);
});

describe('entityForIndex', () => {
  it('looks up within the selector', async () => {
    const res = await entityForIndex(source, 'members', 1, { selector: CONTROL });
    expect(res.status).toBe('found');
    if (res.status === 'found') expect(res.entity.name).toBe('member-1');
  });

  it('reports ambiguity across the whole collection without a selector', async () => {
    const res = await entityForIndex(source, 'members', 1);
    expect(res.status).toBe('ambiguous');
    if (res.status === 'ambiguous') expect(res.error.identifiers).toEqual(['member-1', 'worker-1']);
  });
});

describe('eventuallyEntityForIndex', () => {
  it('waits for an entity to appear in the index', async () => {
    setTimeout(() => source.seed('members', [{ name: 'member-2', labels: CONTROL, data: {} }]), 60);
    const entity = await eventuallyEntityForIndex(source, 'members', 2, { timeoutMs: 2000, intervalMs: 20 }, { selector: CONTROL });
    expect(entity.name).toBe('member-2');
  });

  it('gives up at once on a duplicate', async () => {
    const start = performance.now();
    await expect(eventuallyEntityForIndex(source, 'members', 1, { timeoutMs: 10_000, intervalMs: 20 })).rejects.toThrow(AmbiguousIndexError);
    expect(performance.now() - start).toBeLessThan(1000);
  });

  it('times out when the index stays empty', async () => {
    await expect(eventuallyEntityForIndex(source, 'members', 7, { timeoutMs: 100, intervalMs: 20 }))
      .rejects.toThrow(TimeoutError);
  });

  it('fails when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(eventuallyEntityForIndex(source, 'members', 7, { timeoutMs: 100, intervalMs: 20, signal: controller.signal }))
      .rejects.toThrow('members[7]: cancelled after 0ms');
  });
});

describe('updateEntityAtIndex', () => {
  it('mutates the entity and returns the snapshot from before the update', async () => {
    const before = await updateEntityAtIndex(source, 'members', 1, d => { d.data.spec = 'large'; }, { timeoutMs: 1000, intervalMs: 20 }, { selector: CONTROL });
    expect(before).toEqual({ name: 'member-1', labels: CONTROL, revision: 0, data: { spec: 'small' } });
    const [after] = (await source.list('members', CONTROL)).filter(e => e.name === 'member-1');
    expect(after.revision).toBe(1);
    expect(after.data.spec).toBe('large');
  });

  it('retries while the mutation fails', async () => {
    let calls = 0;
    const before = await updateEntityAtIndex(source, 'members', 0, d => {
      if (++calls < 3) throw new Error('conflict');
      d.data.spec = 'large';
    }, { timeoutMs: 2000, intervalMs: 10 }, { selector: CONTROL });
    expect(calls).toBe(3);
    expect(before.revision).toBe(0);
  });

  it('keeps the last rejection as the cause when the update never applies', async () => {
    const pending = updateEntityAtIndex(source, 'members', 0, () => { throw new Error('admission webhook denied'); }, { timeoutMs: 100, intervalMs: 20 }, { selector: CONTROL });
    const error = await pending.then(() => undefined, (e: unknown) => e);
    expect(error).toBeInstanceOf(TimeoutError);
    if (!(error instanceof TimeoutError)) return;
    expect(error.pending).toEqual(['update members[0]']);
    expect(error.cause).toBeInstanceOf(PredicateEvaluationError);
    if (error.cause instanceof PredicateEvaluationError) {
      expect(error.cause.message).toBe('update members[0]: predicate evaluation failed: admission webhook denied');
    }
  });
});

describe('describeResult', () => {
  const failure = new TaskFailedError('B', 'replicas regressed');
  const failed: SupervisorResult = {
    status: 'failed_early',
    label: 'B',
    error: failure,
    elapsedMs: 2000.4,
    tasks: [
      { label: 'A', kind: 'eventually', state: 'cancelled', attempts: 3, elapsedMs: 2000.2 },
      { label: 'B', kind: 'eventually', state: 'failed', attempts: 2, elapsedMs: 1999.6, error: failure }
    ]
  };

  it('renders a headline and one line per task', () => {
    expect(describeResult(failed)).toBe([
      'verification failed after 2000ms: B: replicas regressed',
      '  - A [eventually] cancelled after 2000ms (3 attempts)',
      '  - B [eventually] failed after 2000ms (2 attempts): B: replicas regressed'
    ].join('\n'));
  });

  it('names pending tasks on timeout', () => {
    const result: SupervisorResult = {
      status: 'timed_out', pending: ['a', 'b'], error: new TimeoutError(300, ['a', 'b']), elapsedMs: 300, tasks: []
    };
    expect(describeResult(result)).toBe('verification timed out after 300ms; pending: a, b');
  });

  it('assertVerified throws with the rendered result', () => {
    expect(() => assertVerified(failed)).toThrow(VerificationFailedError);
    try {
      assertVerified(failed);
    } catch (e) {
      expect(e).toBeInstanceOf(VerificationFailedError);
      if (e instanceof VerificationFailedError) {
        expect(e.code).toBe('verification_failed');
        expect(e.message).toBe(describeResult(failed));
        expect(e.cause).toBe(failure);
      }
    }
    expect(() => assertVerified({ status: 'all_succeeded', elapsedMs: 1, tasks: [] })).not.toThrow();
  });
});

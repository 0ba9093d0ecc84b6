import { systemClock, type Clock } from './clock.js';
import { getConfig } from './config.js';
import { DeadlineContext } from './deadline.js';
import { TaskFailedError, TimeoutError, describeCause } from './errors.js';
import { audit } from './log.js';
import { addGauge, incCounter, observeDuration } from './metrics.js';
import { pollInvariantHolds, pollUntilTrue } from './poller.js';
import { withSpan } from './tracing.js';
import type { TaskKind, TaskState } from './types.js';

/**
 * Concurrent verification supervisor.
 * Responsibility: run N checks against one shared deadline, cancel the group on the first definitive
 * failure, wait for every task to return, then classify the run exactly once.
 * Non-goals: cross-task recovery (one definitive failure ends the group), forced preemption.
 */

export interface VerificationTask {
  label: string;
  /**
   * eventually: `false` means "not yet"; definitive failure is a thrown TaskFailedError (or an error `isFatal` accepts).
   * consistently: `false` is a definitive failure.
   */
  check: (ctx: DeadlineContext) => boolean | Promise<boolean>;
  kind?: TaskKind;
  intervalMs?: number;
  /**
   * consistently only. Without it the window lasts until every eventually-task has succeeded,
   * or until the shared deadline (which then counts as holding).
   */
  durationMs?: number;
  isFatal?: (err: unknown) => boolean;
}

export interface RunOptions {
  timeoutMs: number;
  /** Default cadence for tasks without their own; falls back to VERIFY_INTERVAL_MS. */
  intervalMs?: number;
  signal?: AbortSignal;
  clock?: Clock;
  /** Run name used in audit rows and spans. */
  name?: string;
}

export interface TaskReport {
  label: string;
  kind: TaskKind;
  state: TaskState;
  attempts: number;
  elapsedMs: number;
  error?: Error;
}

export type SupervisorResult =
  | { status: 'all_succeeded'; elapsedMs: number; tasks: TaskReport[] }
  | { status: 'failed_early'; label: string; error: TaskFailedError; elapsedMs: number; tasks: TaskReport[] }
  | { status: 'timed_out'; pending: string[]; error: TimeoutError; elapsedMs: number; tasks: TaskReport[] }
  | { status: 'cancelled'; reason: unknown; elapsedMs: number; tasks: TaskReport[] };

interface RunEnv {
  run: string;
  ctx: DeadlineContext;
  clock: Clock;
  intervalMs: number;
  settled?: AbortSignal;
  onConverged: () => void;
}

type TaskOutcome = Omit<TaskReport, 'label' | 'kind'>;

function validateTasks(tasks: readonly VerificationTask[]) {
  const seen = new Set<string>();
  for (const t of tasks) {
    if (!t.label) throw new TypeError('verification task label must be non-empty');
    if (seen.has(t.label)) throw new TypeError(`duplicate verification task label: ${t.label}`);
    seen.add(t.label);
  }
}

function asTaskFailure(label: string, err: Error): TaskFailedError {
  return err instanceof TaskFailedError ? err : new TaskFailedError(label, describeCause(err), { cause: err });
}

function cancelledState(ctx: DeadlineContext): TaskState {
  return ctx.cause?.kind === 'timeout' ? 'timed_out' : 'cancelled';
}

async function runEventually(task: VerificationTask, env: RunEnv): Promise<TaskOutcome> {
  const timeoutMs = Math.max(env.ctx.remainingMs(), 1);
  const outcome = await pollUntilTrue(() => task.check(env.ctx), {
    timeoutMs,
    intervalMs: Math.min(task.intervalMs ?? env.intervalMs, timeoutMs),
    signal: env.ctx.signal,
    clock: env.clock,
    isFatal: task.isFatal,
    label: task.label
  });
  const { attempts, elapsedMs } = outcome;
  switch (outcome.status) {
    case 'success': return { state: 'succeeded', attempts, elapsedMs };
    case 'failed': return { state: 'failed', attempts, elapsedMs, error: asTaskFailure(task.label, outcome.error) };
    case 'timed_out': return { state: 'timed_out', attempts, elapsedMs, error: outcome.error };
    case 'cancelled': return { state: cancelledState(env.ctx), attempts, elapsedMs };
  }
}

async function runConsistently(task: VerificationTask, env: RunEnv): Promise<TaskOutcome> {
  const openWindow = task.durationMs === undefined;
  const durationMs = task.durationMs ?? Math.max(env.ctx.remainingMs(), 1);
  const outcome = await pollInvariantHolds(() => task.check(env.ctx), {
    durationMs,
    intervalMs: Math.min(task.intervalMs ?? env.intervalMs, durationMs),
    signal: env.ctx.signal,
    settled: openWindow ? env.settled : undefined,
    clock: env.clock,
    isFatal: task.isFatal,
    label: task.label
  });
  const { attempts, elapsedMs } = outcome;
  switch (outcome.status) {
    case 'holds': return { state: 'succeeded', attempts, elapsedMs };
    case 'violated': {
      const error = new TaskFailedError(task.label, `invariant violated after ${Math.round(outcome.atMs)}ms`);
      return { state: 'failed', attempts, elapsedMs, error };
    }
    case 'failed': return { state: 'failed', attempts, elapsedMs, error: asTaskFailure(task.label, outcome.error) };
    case 'cancelled':
      // An open window that lasted until the deadline held throughout.
      if (openWindow && env.ctx.cause?.kind === 'timeout') return { state: 'succeeded', attempts, elapsedMs };
      return { state: cancelledState(env.ctx), attempts, elapsedMs };
  }
}

async function runTask(task: VerificationTask, env: RunEnv): Promise<TaskReport> {
  const kind: TaskKind = task.kind ?? 'eventually';
  const started = env.clock.now();
  return await withSpan('verification.task', async span => {
    span.setAttribute('verification.task', task.label);
    span.setAttribute('verification.kind', kind);
    let outcome: TaskOutcome;
    try {
      outcome = kind === 'eventually' ? await runEventually(task, env) : await runConsistently(task, env);
    } catch (err) {
      // Anything escaping the poller (bad task timing, a throwing isFatal) is a definitive failure.
      const error = new TaskFailedError(task.label, `task errored: ${describeCause(err)}`, { cause: err });
      outcome = { state: 'failed', attempts: 0, elapsedMs: env.clock.now() - started, error };
    }
    const report: TaskReport = { label: task.label, kind, ...outcome };
    if (report.state === 'failed' && report.error) {
      const error = asTaskFailure(task.label, report.error);
      const first = env.ctx.cancel({ kind: 'failure', label: task.label, error });
      audit('verification_task_failed', { run: env.run, label: task.label, first, error: error.message, elapsed_ms: Math.round(report.elapsedMs) });
    }
    if (report.state === 'succeeded' && kind === 'eventually') env.onConverged();
    incCounter('verification_tasks_total', { kind, state: report.state });
    span.setAttribute('verification.state', report.state);
    return report;
  });
}

function classify(ctx: DeadlineContext, tasks: TaskReport[], elapsedMs: number): SupervisorResult {
  const cause = ctx.cause;
  if (cause?.kind === 'failure') return { status: 'failed_early', label: cause.label, error: cause.error, elapsedMs, tasks };
  // A definitive failure reported after the deadline or an abort still outranks them.
  const failed = tasks.find(t => t.state === 'failed');
  if (failed?.error) return { status: 'failed_early', label: failed.label, error: asTaskFailure(failed.label, failed.error), elapsedMs, tasks };
  if (tasks.every(t => t.state === 'succeeded')) return { status: 'all_succeeded', elapsedMs, tasks };
  if (cause?.kind === 'parent') return { status: 'cancelled', reason: cause.reason, elapsedMs, tasks };
  const pending = tasks.filter(t => t.state !== 'succeeded').map(t => t.label);
  return { status: 'timed_out', pending, error: new TimeoutError(elapsedMs, pending), elapsedMs, tasks };
}

function finish(run: string, result: SupervisorResult): SupervisorResult {
  incCounter('verification_runs_total', { outcome: result.status });
  observeDuration('verification_duration_seconds', result.elapsedMs / 1000, { outcome: result.status });
  audit('verification_completed', {
    run,
    outcome: result.status,
    elapsed_ms: Math.round(result.elapsedMs),
    ...(result.status === 'failed_early' ? { label: result.label, error: result.error.message } : {}),
    ...(result.status === 'timed_out' ? { pending: result.pending } : {})
  });
  return result;
}

export async function runConcurrently(tasks: readonly VerificationTask[], opts: RunOptions): Promise<SupervisorResult> {
  if (!(opts.timeoutMs > 0)) throw new RangeError(`timeoutMs must be > 0 (got ${opts.timeoutMs})`);
  validateTasks(tasks);
  const run = opts.name ?? 'verification';
  if (!tasks.length) return finish(run, { status: 'all_succeeded', elapsedMs: 0, tasks: [] });

  const clock = opts.clock ?? systemClock;
  const ctx = new DeadlineContext(opts.timeoutMs, { clock, parent: opts.signal });
  const settled = new AbortController();
  let converging = tasks.filter(t => (t.kind ?? 'eventually') === 'eventually').length;
  const env: RunEnv = {
    run,
    ctx,
    clock,
    intervalMs: Math.min(opts.intervalMs ?? getConfig().verifyIntervalMs, opts.timeoutMs),
    // Only groups with something to converge can settle early.
    settled: converging > 0 ? settled.signal : undefined,
    onConverged: () => { converging--; if (converging === 0) settled.abort(); }
  };

  audit('verification_started', { run, tasks: tasks.map(t => t.label), timeout_ms: opts.timeoutMs });
  addGauge('verification_runs_active', 1);
  try {
    return await withSpan('verification.run', async span => {
      span.setAttribute('verification.name', run);
      span.setAttribute('verification.tasks', tasks.length);
      // Barrier: every task returns (runTask never rejects) before the run is classified.
      const reports = await Promise.all(tasks.map(t => runTask(t, env)));
      const result = finish(run, classify(ctx, reports, ctx.elapsedMs()));
      span.setAttribute('verification.outcome', result.status);
      return result;
    });
  } finally {
    ctx.dispose();
    addGauge('verification_runs_active', -1);
  }
}

/**
 * Clock abstraction used by the poller.
 * `sleep` resolves early (never rejects) when the signal aborts; callers re-check the signal afterwards.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();
  return new Promise(resolve => {
    const onAbort = () => { clearTimeout(timer); resolve(); };
    const timer = setTimeout(() => { signal?.removeEventListener('abort', onAbort); resolve(); }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface CombinedSignal {
  signal: AbortSignal;
  /** Detaches from the inputs; call once the combined signal is no longer needed. */
  dispose(): void;
}

/** Aborts as soon as any input signal aborts. */
export function anySignal(...signals: AbortSignal[]): CombinedSignal {
  const controller = new AbortController();
  const attached: Array<[AbortSignal, () => void]> = [];
  const dispose = () => {
    for (const [s, listener] of attached) s.removeEventListener('abort', listener);
    attached.length = 0;
  };
  for (const s of signals) {
    if (s.aborted) { controller.abort(s.reason); break; }
    const listener = () => { controller.abort(s.reason); dispose(); };
    s.addEventListener('abort', listener, { once: true });
    attached.push([s, listener]);
  }
  if (controller.signal.aborted) dispose();
  return { signal: controller.signal, dispose };
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: abortableSleep
};

export interface ManualClock extends Clock {
  advance(ms: number): void;
}

/** Virtual time: `sleep` advances the clock instantly, so cadences can be asserted exactly. */
export function createManualClock(start = 0): ManualClock {
  let t = start;
  return {
    now: () => t,
    advance(ms) { t += ms; },
    async sleep(ms, signal) {
      if (signal?.aborted) return;
      t += Math.max(0, ms);
      await Promise.resolve();
    }
  };
}

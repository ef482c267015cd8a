import type { Clock } from './clock.js';
import { errorMessage, PermanentError } from './errors.js';
import type { ProvisionLogger } from './logger.js';
import type { MarkerStore } from './marker-store.js';
import type {
  FailureClass,
  ProbeContext,
  ProbeResult,
  ReadinessCheck,
  ReadinessPredicate,
  ReadinessResult,
  Step
} from './types.js';

export const DEFAULT_PROGRESS_EVERY = 12;

async function evaluate(predicate: ReadinessPredicate, ctx: ProbeContext): Promise<ProbeResult> {
  try {
    return await predicate(ctx);
  } catch (e) {
    return { state: 'not-ready', observed: errorMessage(e) };
  }
}

/**
 * Poll `check.predicate` until it is ready, reports a permanent failure, or
 * `check.timeoutMs` has elapsed. The last sleep is cut short so the final
 * poll happens at the deadline rather than past it.
 */
export async function waitFor(
  check: ReadinessCheck,
  env: { clock: Clock; logger: ProvisionLogger }
): Promise<ReadinessResult> {
  const { clock, logger } = env;
  const target = check.target;

  if (!(check.intervalMs > 0) || !(check.timeoutMs >= 0)) {
    const reason = `invalid readiness check (intervalMs=${check.intervalMs}, timeoutMs=${check.timeoutMs})`;
    logger.error({ target, reason }, 'readiness.failed');
    return { status: 'permanent-failure', polls: 0, elapsedMs: 0, reason };
  }

  const progressEvery = check.progressEvery ?? DEFAULT_PROGRESS_EVERY;
  const startedAt = clock.now();
  let polls = 0;
  let lastObserved: string | undefined;

  for (;;) {
    polls++;
    const result = await evaluate(check.predicate, { poll: polls, elapsedMs: clock.now() - startedAt });
    const elapsedMs = clock.now() - startedAt;

    if (result.state === 'ready') {
      lastObserved = result.observed ?? lastObserved;
      logger.info({ target, polls, elapsedMs, observed: lastObserved }, 'readiness.ready');
      return { status: 'ready', polls, elapsedMs, lastObserved };
    }

    if (result.state === 'failed') {
      logger.error({ target, polls, elapsedMs, reason: result.reason }, 'readiness.failed');
      return { status: 'permanent-failure', polls, elapsedMs, lastObserved, reason: result.reason };
    }

    lastObserved = result.observed ?? lastObserved;

    if (elapsedMs >= check.timeoutMs) {
      logger.warn({ target, polls, elapsedMs, observed: lastObserved }, 'readiness.timeout');
      return { status: 'timed-out', polls, elapsedMs, lastObserved };
    }

    if (progressEvery > 0 && polls % progressEvery === 0) {
      logger.info({ target, polls, elapsedMs, observed: lastObserved }, 'readiness.waiting');
    }

    await clock.sleep(Math.min(check.intervalMs, check.timeoutMs - elapsedMs));
  }
}

/**
 * Ready when any sub-predicate is ready on the same poll. Sub-predicates are
 * evaluated in order and the first ready one wins. A failed sub-predicate only
 * fails the whole when nothing else was ready.
 */
export function anyOf(...predicates: ReadinessPredicate[]): ReadinessPredicate {
  return async (ctx) => {
    const observed: string[] = [];
    let failure: string | undefined;

    for (const predicate of predicates) {
      const result = await evaluate(predicate, ctx);
      if (result.state === 'ready') return result;
      if (result.state === 'failed') {
        failure ??= result.reason;
        continue;
      }
      if (result.observed) observed.push(result.observed);
    }

    if (failure !== undefined) return { state: 'failed', reason: failure };
    return { state: 'not-ready', observed: observed.length > 0 ? observed.join(' ') : undefined };
  };
}

export function markerPredicate(store: MarkerStore, phaseId: string): ReadinessPredicate {
  return async () =>
    store.isComplete(phaseId)
      ? { state: 'ready', observed: `${phaseId} complete` }
      : { state: 'not-ready', observed: `${phaseId} pending` };
}

export function describeReadiness(target: string, result: ReadinessResult): string {
  switch (result.status) {
    case 'ready':
      return `${target} ready after ${result.polls} poll(s)`;
    case 'timed-out':
      return `${target} not ready after ${result.elapsedMs}ms (last: ${result.lastObserved ?? 'n/a'})`;
    case 'permanent-failure':
      return `${target} failed: ${result.reason ?? 'unknown reason'}`;
  }
}

/**
 * A step that blocks on a readiness check. Waiting is already bounded by the
 * check's timeout, so the step is attempted once.
 */
export function readinessStep(
  id: string,
  check: ReadinessCheck,
  opts: { title?: string; failure?: FailureClass; toleratedSignals?: readonly string[] } = {}
): Step {
  return {
    id,
    title: opts.title ?? `Wait for ${check.target}`,
    failure: opts.failure,
    toleratedSignals: opts.toleratedSignals,
    retry: { maxAttempts: 1 },
    action: async ({ clock, logger }) => {
      const result = await waitFor(check, { clock, logger });
      if (result.status !== 'ready') {
        throw new PermanentError(describeReadiness(check.target, result));
      }
    }
  };
}

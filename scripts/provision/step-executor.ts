import type { Clock } from './clock.js';
import { classifyError, errorMessage, errorReports } from './errors.js';
import type { ProvisionLogger } from './logger.js';
import type { RetryPolicy, Step, StepOutcome } from './types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 1, baseDelayMs: 0 };

export type ExecuteStepOptions = {
  phaseId: string;
  logger: ProvisionLogger;
  clock: Clock;
  /** Fills whatever the step's own `retry` leaves out. */
  retry?: Partial<RetryPolicy>;
};

export function resolveRetryPolicy(step: Step, defaults?: Partial<RetryPolicy>): RetryPolicy {
  const merged = { ...DEFAULT_RETRY_POLICY, ...defaults, ...step.retry };
  return {
    maxAttempts: Math.max(1, Math.floor(merged.maxAttempts)),
    baseDelayMs: Math.max(0, merged.baseDelayMs)
  };
}

/**
 * The signal tolerating the first report, or null when any report matches
 * none of `signals`.
 */
export function matchToleratedSignal(reports: readonly string[], signals: readonly string[] = []): string | null {
  let first: string | null = null;
  for (const report of reports) {
    const signal = signals.find((s) => new RegExp(s, 'i').test(report));
    if (signal === undefined) return null;
    first ??= signal;
  }
  return first;
}

/**
 * Run one step with retries. Never throws: the caller decides whether a
 * `failed` outcome is fatal from the step's classification.
 *
 * Every attempt is written to the audit log with its outcome:
 * `ok`, `tolerated`, `retry` or `failed`.
 */
export async function executeStep(step: Step, opts: ExecuteStepOptions): Promise<StepOutcome> {
  const { phaseId, logger, clock } = opts;
  const policy = resolveRetryPolicy(step, opts.retry);
  const base = { phase: phaseId, step: step.id };

  let lastError = '';
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    const startedAt = clock.now();
    try {
      await step.action({ phaseId, stepId: step.id, attempt, logger, clock });
      logger.info({ ...base, attempt, outcome: 'ok', durationMs: clock.now() - startedAt }, 'step.attempt');
      return { status: 'succeeded', attempts: attempt };
    } catch (e) {
      lastError = errorMessage(e);

      const signal = matchToleratedSignal(errorReports(e), step.toleratedSignals);
      if (signal !== null) {
        logger.warn({ ...base, attempt, outcome: 'tolerated', signal, error: lastError }, 'step.attempt');
        return { status: 'succeeded', attempts: attempt, warning: `${step.id}: tolerated "${signal}": ${lastError}` };
      }

      const kind = classifyError(e);
      if (kind === 'permanent' || attempt === policy.maxAttempts) {
        logger.error({ ...base, attempt, outcome: 'failed', kind, error: lastError }, 'step.attempt');
        return { status: 'failed', attempts: attempt, error: lastError };
      }

      const delayMs = attempt * policy.baseDelayMs;
      logger.warn({ ...base, attempt, outcome: 'retry', delayMs, error: lastError }, 'step.attempt');
      await clock.sleep(delayMs);
    }
  }

  // Unreachable: the loop returns on its last attempt.
  return { status: 'failed', attempts: policy.maxAttempts, error: lastError };
}

import { systemClock, type Clock } from './clock.js';
import { errorMessage, SequenceOrderError } from './errors.js';
import type { ProvisionLogger } from './logger.js';
import type { MarkerStore } from './marker-store.js';
import { executeStep } from './step-executor.js';
import type { Phase, PhaseReport, RetryPolicy, SequenceResult, StepReport } from './types.js';

export type SequenceContext = {
  store: MarkerStore;
  logger: ProvisionLogger;
  clock?: Clock;
  /** Default retry policy for steps that do not declare their own. */
  retry?: Partial<RetryPolicy>;
};

/**
 * Every dependency must be declared earlier in the sequence, which keeps the
 * relation acyclic. Phase ids and step ids within a phase must be unique.
 */
export function validateSequence(phases: Phase[]): void {
  const seen = new Set<string>();
  for (const phase of phases) {
    if (seen.has(phase.id)) {
      throw new SequenceOrderError(`Duplicate phase id: ${phase.id}`);
    }
    for (const dep of phase.dependsOn ?? []) {
      if (!seen.has(dep)) {
        throw new SequenceOrderError(`Phase ${phase.id} depends on ${dep}, which is not declared before it`);
      }
    }
    const stepIds = new Set<string>();
    for (const step of phase.steps) {
      if (stepIds.has(step.id)) {
        throw new SequenceOrderError(`Duplicate step id in phase ${phase.id}: ${step.id}`);
      }
      stepIds.add(step.id);
    }
    seen.add(phase.id);
  }
}

function notRun(phase: Phase): PhaseReport {
  return { id: phase.id, title: phase.title, status: 'not-run', steps: [], warnings: [] };
}

/**
 * Run phases strictly in order. Safe to call from the start any number of
 * times: completed phases are skipped and the first incomplete phase reruns
 * from its first step.
 */
export async function runSequence(phases: Phase[], ctx: SequenceContext): Promise<SequenceResult> {
  const { store, logger } = ctx;
  const clock = ctx.clock ?? systemClock;
  const reports: PhaseReport[] = [];
  let stepsRun = 0;

  const abort = (index: number, report: PhaseReport, error: string): SequenceResult => {
    reports.push(report, ...phases.slice(index + 1).map(notRun));
    logger.error({ phase: report.id, error }, 'sequence.failed');
    return { status: 'failed', phases: reports, stepsRun, failedPhase: report.id, error };
  };

  try {
    validateSequence(phases);
  } catch (e) {
    const error = errorMessage(e);
    logger.error({ error }, 'sequence.invalid');
    return { status: 'failed', phases: phases.map(notRun), stepsRun, error };
  }

  logger.info({ phases: phases.map((p) => p.id) }, 'sequence.start');

  for (const [index, phase] of phases.entries()) {
    if (store.isComplete(phase.id)) {
      logger.info({ phase: phase.id }, 'phase.skip');
      reports.push({ id: phase.id, title: phase.title, status: 'skipped', steps: [], warnings: [] });
      continue;
    }

    const missing = (phase.dependsOn ?? []).filter((dep) => !store.isComplete(dep));
    if (missing.length > 0) {
      // Dependencies are declared earlier and would have run, so this is a plan bug.
      const error = `Phase ${phase.id} requires incomplete phase(s): ${missing.join(', ')}`;
      logger.error({ phase: phase.id, missing, kind: SequenceOrderError.name }, 'phase.blocked');
      return abort(index, { id: phase.id, title: phase.title, status: 'failed', steps: [], warnings: [], error }, error);
    }

    logger.info({ phase: phase.id, steps: phase.steps.length }, 'phase.start');

    const steps: StepReport[] = [];
    const warnings: string[] = [];
    let toleratedFailure: string | undefined;

    for (const step of phase.steps) {
      const outcome = await executeStep(step, { phaseId: phase.id, logger, clock, retry: ctx.retry });
      stepsRun++;
      steps.push({ stepId: step.id, ...outcome });

      if (outcome.status === 'succeeded') {
        if (outcome.warning) warnings.push(outcome.warning);
        continue;
      }

      const failure = `${step.id}: ${outcome.error ?? 'failed'}`;
      if ((step.failure ?? 'fatal') === 'tolerable') {
        logger.warn({ phase: phase.id, step: step.id, error: outcome.error }, 'step.tolerated');
        warnings.push(failure);
        continue;
      }

      if (phase.tolerateFailure) {
        logger.warn({ phase: phase.id, step: step.id, error: outcome.error }, 'phase.tolerated');
        warnings.push(failure);
        toleratedFailure = failure;
        break;
      }

      return abort(index, { id: phase.id, title: phase.title, status: 'failed', steps, warnings, error: failure }, failure);
    }

    try {
      store.markComplete(phase.id, { warnings });
    } catch (e) {
      const error = `cannot record completion of ${phase.id}: ${errorMessage(e)}`;
      return abort(index, { id: phase.id, title: phase.title, status: 'failed', steps, warnings, error }, error);
    }

    const status = toleratedFailure ? 'tolerated-failure' : warnings.length > 0 ? 'completed-with-warnings' : 'completed';
    logger.info({ phase: phase.id, status, warnings: warnings.length }, 'phase.complete');
    reports.push({ id: phase.id, title: phase.title, status, steps, warnings, error: toleratedFailure });
  }

  logger.info({ stepsRun }, 'sequence.complete');
  return { status: 'completed', phases: reports, stepsRun };
}

export function exitCodeFor(result: SequenceResult): number {
  return result.status === 'completed' ? 0 : 1;
}

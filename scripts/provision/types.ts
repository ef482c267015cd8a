import type { Clock } from './clock.js';
import type { ProvisionLogger } from './logger.js';

export type RetryPolicy = {
  maxAttempts: number;
  // The wait before attempt n+1 is n * baseDelayMs.
  baseDelayMs: number;
};

export type FailureClass = 'fatal' | 'tolerable';

export type StepContext = {
  phaseId: string;
  stepId: string;
  attempt: number;
  logger: ProvisionLogger;
  clock: Clock;
};

export type Step = {
  id: string;
  title?: string;
  action: (ctx: StepContext) => Promise<void>;
  retry?: Partial<RetryPolicy>;
  /** Defaults to fatal. */
  failure?: FailureClass;
  /** Regular expressions; a failure whose text matches one is a success with a warning. */
  toleratedSignals?: readonly string[];
};

export type Phase = {
  id: string;
  title?: string;
  steps: Step[];
  dependsOn?: string[];
  /** A fatal step failure is logged and the sequence moves on. */
  tolerateFailure?: boolean;
};

export type StepOutcome = {
  status: 'succeeded' | 'failed';
  attempts: number;
  error?: string;
  warning?: string;
};

export type ProbeResult =
  | { state: 'ready'; observed?: string }
  | { state: 'not-ready'; observed?: string }
  | { state: 'failed'; reason: string };

export type ProbeContext = {
  poll: number;
  elapsedMs: number;
};

export type ReadinessPredicate = (ctx: ProbeContext) => Promise<ProbeResult>;

export type ReadinessCheck = {
  target: string;
  predicate: ReadinessPredicate;
  intervalMs: number;
  timeoutMs: number;
  progressEvery?: number;
};

export type ReadinessStatus = 'ready' | 'timed-out' | 'permanent-failure';

export type ReadinessResult = {
  status: ReadinessStatus;
  polls: number;
  elapsedMs: number;
  lastObserved?: string;
  reason?: string;
};

export type PhaseStatus =
  | 'skipped'
  | 'completed'
  | 'completed-with-warnings'
  | 'tolerated-failure'
  | 'failed'
  | 'not-run';

export type StepReport = StepOutcome & { stepId: string };

export type PhaseReport = {
  id: string;
  title?: string;
  status: PhaseStatus;
  steps: StepReport[];
  warnings: string[];
  error?: string;
};

export type SequenceResult = {
  status: 'completed' | 'failed';
  phases: PhaseReport[];
  stepsRun: number;
  failedPhase?: string;
  error?: string;
};

export type ErrorKind = 'transient' | 'permanent';

export class ProvisionError extends Error {
  constructor(
    message: string,
    readonly kind: ErrorKind,
    /** The separate errors a collaborator reported in one run, if it reported several. */
    readonly reports: readonly string[] = []
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Worth retrying: network hiccups, dependencies that are not up yet. */
export class TransientError extends ProvisionError {
  constructor(message: string, reports?: readonly string[]) {
    super(message, 'transient', reports);
  }
}

/** Retrying cannot help; the Step Executor stops at the first one. */
export class PermanentError extends ProvisionError {
  constructor(message: string, reports?: readonly string[]) {
    super(message, 'permanent', reports);
  }
}

/**
 * A phase was declared against a dependency that is unknown, declared later,
 * or not complete. This is a bug in the plan, not a runtime condition.
 */
export class SequenceOrderError extends PermanentError {}

export class ConfigError extends PermanentError {}

/** Bad command-line arguments. */
export class UsageError extends PermanentError {}

export class CommandError extends TransientError {
  readonly command: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(params: { command: string; exitCode: number; stdout: string; stderr: string }) {
    const detail = tailLines(params.stderr || params.stdout, 20);
    super(`${params.command} exited with ${params.exitCode}${detail ? `: ${detail}` : ''}`);
    this.command = params.command;
    this.exitCode = params.exitCode;
    this.stdout = params.stdout;
    this.stderr = params.stderr;
  }
}

export function classifyError(err: unknown): ErrorKind {
  return err instanceof PermanentError ? 'permanent' : 'transient';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/** What a tolerated signal has to account for: each report, or else the message. */
export function errorReports(err: unknown): string[] {
  if (err instanceof ProvisionError && err.reports.length > 0) return [...err.reports];
  return [errorMessage(err)];
}

export function tailLines(text: string, count: number): string {
  const lines = text.split('\n');
  return lines.slice(Math.max(0, lines.length - count)).join('\n').trim();
}

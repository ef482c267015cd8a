import { commandLine, type CommandRunner, type ExecOptions, type ExecResult } from '../../lib/process.js';
import { CommandError } from '../errors.js';

/**
 * Run a command and raise a `CommandError` (transient, so the step retries)
 * when it exits non-zero.
 */
export async function runChecked(
  runner: CommandRunner,
  file: string,
  args: string[] = [],
  options?: ExecOptions
): Promise<ExecResult> {
  const res = await runner(file, args, options);
  if (!res.ok) {
    throw new CommandError({
      command: commandLine(file, args),
      exitCode: res.exitCode,
      stdout: res.stdout,
      stderr: res.stderr
    });
  }
  return res;
}

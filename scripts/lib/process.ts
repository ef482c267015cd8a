import { execa } from 'execa';

export type ExecOptions = {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  timeoutMs?: number;
};

export type ExecResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Every host command goes through this signature, so capabilities can be
 * exercised against an in-process fake.
 */
export type CommandRunner = (file: string, args?: string[], options?: ExecOptions) => Promise<ExecResult>;

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

export function commandLine(file: string, args: string[] = []): string {
  return [file, ...args].join(' ');
}

export async function execCmd(file: string, args: string[] = [], options: ExecOptions = {}): Promise<ExecResult> {
  const res = await execa(file, args, {
    encoding: 'utf8',
    reject: false,
    cwd: options.cwd,
    env: options.env,
    input: options.input,
    timeout: options.timeoutMs
  });

  return {
    ok: (res.exitCode ?? 1) === 0,
    exitCode: res.exitCode ?? 1,
    stdout: normalizeText(res.stdout),
    stderr: normalizeText(res.stderr)
  };
}

/**
 * Wrap a runner so every command runs as `user` (via runuser) with that
 * user's HOME. Without a user the runner is returned unchanged.
 */
export function runAsUser(runner: CommandRunner, user: string | undefined, home?: string): CommandRunner {
  if (!user) return runner;
  return (file, args = [], options = {}) =>
    runner('runuser', ['-u', user, '--', 'env', ...(home ? [`HOME=${home}`] : []), file, ...args], options);
}

import type { CommandRunner, ExecResult } from '../../lib/process.js';
import { runChecked } from './command.js';

export type HealthStatus = 'healthy' | 'unhealthy' | 'starting' | 'unknown';

export type VolumeMount = {
  host: string;
  container: string;
  // e.g. "z" for an SELinux relabel
  options?: string;
};

export type ContainerSpec = {
  image: string;
  name: string;
  env?: Record<string, string>;
  volumes?: VolumeMount[];
  network?: string;
  /** Replace a container of the same name instead of failing on the conflict. */
  replace?: boolean;
};

export interface ContainerRuntime {
  pull(image: string): Promise<void>;
  run(spec: ContainerSpec): Promise<string>;
  inspectHealth(name: string): Promise<HealthStatus>;
  isRunning(name: string): Promise<boolean>;
  start(name: string): Promise<void>;
  exec(name: string, command: string[], input?: string): Promise<ExecResult>;
  logs(name: string): Promise<string>;
}

const HEALTH_VALUES: readonly HealthStatus[] = ['healthy', 'unhealthy', 'starting'];

export function containerRunArgs(spec: ContainerSpec): string[] {
  const args = ['run', '-d'];
  if (spec.replace) args.push('--replace');
  args.push('--name', spec.name);
  if (spec.network) args.push(`--network=${spec.network}`);
  for (const [key, value] of Object.entries(spec.env ?? {})) {
    args.push('-e', `${key}=${value}`);
  }
  for (const volume of spec.volumes ?? []) {
    args.push('-v', `${volume.host}:${volume.container}${volume.options ? `:${volume.options}` : ''}`);
  }
  args.push(spec.image);
  return args;
}

export class PodmanRuntime implements ContainerRuntime {
  constructor(
    private readonly runner: CommandRunner,
    private readonly binary = 'podman'
  ) {}

  async pull(image: string): Promise<void> {
    await runChecked(this.runner, this.binary, ['pull', image]);
  }

  async run(spec: ContainerSpec): Promise<string> {
    const res = await runChecked(this.runner, this.binary, containerRunArgs(spec));
    return res.stdout;
  }

  async inspectHealth(name: string): Promise<HealthStatus> {
    const res = await this.runner(this.binary, ['inspect', '--format', '{{.State.Health.Status}}', name]);
    if (!res.ok) return 'unknown';
    return HEALTH_VALUES.find((h) => h === res.stdout) ?? 'unknown';
  }

  async isRunning(name: string): Promise<boolean> {
    const res = await this.runner(this.binary, ['inspect', '--format', '{{.State.Running}}', name]);
    return res.ok && res.stdout === 'true';
  }

  async start(name: string): Promise<void> {
    await runChecked(this.runner, this.binary, ['start', name]);
  }

  async exec(name: string, command: string[], input?: string): Promise<ExecResult> {
    return this.runner(this.binary, ['exec', '-i', name, ...command], { input });
  }

  async logs(name: string): Promise<string> {
    // The container's stderr comes back on ours.
    const res = await this.runner(this.binary, ['logs', name]);
    return [res.stdout, res.stderr].filter(Boolean).join('\n');
  }
}

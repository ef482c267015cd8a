/**
 * In-process stand-ins for the host: a virtual clock, a recording command
 * runner, and fake supervisor / container runtime.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import { commandLine, type CommandRunner, type ExecOptions, type ExecResult } from '../../scripts/lib/process.js';
import { LabConfigSchema, type LabConfig, type LabConfigInput } from '../../scripts/schemas/lab-config.zod.js';
import type { ContainerRuntime, ContainerSpec, HealthStatus } from '../../scripts/provision/capabilities/container.js';
import type { ServiceState, ServiceSupervisor } from '../../scripts/provision/capabilities/supervisor.js';
import type { Clock } from '../../scripts/provision/clock.js';

export function createTempDir(prefix = 'labforge-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Virtual time: `sleep` advances `now` immediately. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private time = 0) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

export type RecordedCall = { file: string; args: string[]; options?: ExecOptions };

export type FakeResponse = Partial<ExecResult> | undefined;

/**
 * A runner that records every call and answers through `respond`; by default
 * every command succeeds with empty output.
 */
export function createFakeRunner(respond: (call: RecordedCall) => FakeResponse | Promise<FakeResponse> = () => undefined): {
  runner: CommandRunner;
  calls: RecordedCall[];
  lines: () => string[];
} {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (file, args = [], options) => {
    const call = { file, args, options };
    calls.push(call);
    const res = (await respond(call)) ?? {};
    const exitCode = res.exitCode ?? (res.ok === false ? 1 : 0);
    return { ok: res.ok ?? exitCode === 0, exitCode, stdout: res.stdout ?? '', stderr: res.stderr ?? '' };
  };
  return { runner, calls, lines: () => calls.map((c) => commandLine(c.file, c.args)) };
}

export class FakeSupervisor implements ServiceSupervisor {
  readonly units = new Map<string, string>();
  readonly actions: string[] = [];

  readUnit(unitName: string): string | null {
    return this.units.get(unitName) ?? null;
  }

  async installUnit(unitName: string, content: string): Promise<void> {
    this.units.set(unitName, content);
    this.actions.push(`install ${unitName}`);
  }

  async daemonReload(): Promise<void> {
    this.actions.push('daemon-reload');
  }

  async enable(unitName: string): Promise<void> {
    this.actions.push(`enable ${unitName}`);
  }

  async start(unitName: string): Promise<void> {
    this.actions.push(`start ${unitName}`);
  }

  async status(unitName: string): Promise<ServiceState> {
    return this.units.has(unitName) ? 'active' : 'inactive';
  }
}

/** Container runtime whose observable state is set by the test. */
export class FakeContainers implements ContainerRuntime {
  running = true;
  health: HealthStatus = 'starting';
  logText = '';
  readonly started: string[] = [];
  readonly runs: ContainerSpec[] = [];
  readonly execs: Array<{ name: string; command: string[]; input?: string }> = [];
  execResult: (command: string[], input?: string) => ExecResult = () => ({ ok: true, exitCode: 0, stdout: '', stderr: '' });

  async pull(): Promise<void> {}

  async run(spec: ContainerSpec): Promise<string> {
    this.runs.push(spec);
    return 'container-id';
  }

  async inspectHealth(): Promise<HealthStatus> {
    return this.health;
  }

  async isRunning(): Promise<boolean> {
    return this.running;
  }

  async start(name: string): Promise<void> {
    this.started.push(name);
    this.running = true;
  }

  async exec(name: string, command: string[], input?: string): Promise<ExecResult> {
    this.execs.push({ name, command, input });
    return this.execResult(command, input);
  }

  async logs(): Promise<string> {
    return this.logText;
  }
}

/** A valid config whose every host path points into `root`. */
export function buildTestConfig(root: string, overrides: Partial<LabConfigInput> = {}): LabConfig {
  return LabConfigSchema.parse({
    paths: {
      stateFile: path.join(root, 'state.json'),
      logFile: path.join(root, 'labforge.log'),
      unitDir: path.join(root, 'units'),
      cli: '/usr/local/bin/labforge'
    },
    packages: { base: ['podman', 'git'] },
    containerEngine: { configPath: path.join(root, 'containers', 'containers.conf') },
    database: {
      image: 'registry.example/db:latest',
      password: 'test-secret',
      dataDir: path.join(root, 'oradata'),
      appUser: { password: 'test-secret' }
    },
    runtime: {
      venvDir: path.join(root, 'venv'),
      libraries: [{ name: 'numpy', version: '1.26.4' }]
    },
    ...overrides
  });
}

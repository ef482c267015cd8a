import fs from 'fs';
import path from 'path';

import type { CommandRunner } from '../../lib/process.js';
import { runChecked } from './command.js';

export type ServiceState = 'active' | 'activating' | 'inactive' | 'failed' | 'unknown';

/**
 * The init system that owns services after registration.
 */
export interface ServiceSupervisor {
  readUnit(unitName: string): string | null;
  installUnit(unitName: string, content: string): Promise<void>;
  daemonReload(): Promise<void>;
  enable(unitName: string): Promise<void>;
  start(unitName: string): Promise<void>;
  status(unitName: string): Promise<ServiceState>;
}

const KNOWN_STATES: readonly ServiceState[] = ['active', 'activating', 'inactive', 'failed'];

export function parseServiceState(output: string): ServiceState {
  const value = output.trim().split('\n')[0]?.trim() ?? '';
  return KNOWN_STATES.find((s) => s === value) ?? 'unknown';
}

export class SystemdSupervisor implements ServiceSupervisor {
  constructor(
    private readonly runner: CommandRunner,
    private readonly unitDir: string
  ) {}

  readUnit(unitName: string): string | null {
    const unitPath = path.join(this.unitDir, unitName);
    return fs.existsSync(unitPath) ? fs.readFileSync(unitPath, 'utf8') : null;
  }

  async installUnit(unitName: string, content: string): Promise<void> {
    fs.mkdirSync(this.unitDir, { recursive: true });
    fs.writeFileSync(path.join(this.unitDir, unitName), content, { encoding: 'utf8', mode: 0o644 });
  }

  async daemonReload(): Promise<void> {
    await runChecked(this.runner, 'systemctl', ['daemon-reload']);
  }

  async enable(unitName: string): Promise<void> {
    await runChecked(this.runner, 'systemctl', ['enable', unitName]);
  }

  async start(unitName: string): Promise<void> {
    // --no-block: a unit whose ExecStartPre waits on a marker must not stall the caller.
    await runChecked(this.runner, 'systemctl', ['start', '--no-block', unitName]);
  }

  async status(unitName: string): Promise<ServiceState> {
    // is-active exits non-zero for anything but "active"; the text is still meaningful.
    const res = await this.runner('systemctl', ['is-active', unitName]);
    return parseServiceState(res.stdout);
  }
}

import type { CommandRunner } from '../../lib/process.js';
import { runChecked } from './command.js';

export interface Firewall {
  /** Start the firewall daemon now and at every boot. */
  enable(): Promise<void>;
  openPorts(ports: readonly number[]): Promise<void>;
}

export class FirewalldFirewall implements Firewall {
  constructor(
    private readonly runner: CommandRunner,
    private readonly zone = 'public'
  ) {}

  async enable(): Promise<void> {
    await runChecked(this.runner, 'systemctl', ['enable', '--now', 'firewalld']);
  }

  async openPorts(ports: readonly number[]): Promise<void> {
    if (ports.length === 0) return;
    for (const port of ports) {
      await runChecked(this.runner, 'firewall-cmd', [`--zone=${this.zone}`, `--add-port=${port}/tcp`, '--permanent']);
    }
    await runChecked(this.runner, 'firewall-cmd', ['--reload']);
  }
}

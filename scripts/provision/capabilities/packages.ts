import type { CommandRunner } from '../../lib/process.js';
import { runChecked } from './command.js';

/**
 * OS package manager. Installing something already installed is a no-op
 * success, so every call is safe to retry.
 */
export interface PackageInstaller {
  install(names: readonly string[]): Promise<void>;
  enableRepo(repo: string): Promise<void>;
  disableRepo(repo: string): Promise<void>;
  refreshMetadata(): Promise<void>;
  hasCommand(name: string): Promise<boolean>;
}

export class DnfPackageInstaller implements PackageInstaller {
  constructor(private readonly runner: CommandRunner) {}

  async install(names: readonly string[]): Promise<void> {
    if (names.length === 0) return;
    await runChecked(this.runner, 'dnf', ['-y', 'install', ...names]);
  }

  async enableRepo(repo: string): Promise<void> {
    await runChecked(this.runner, 'dnf', ['config-manager', '--set-enabled', repo]);
  }

  async disableRepo(repo: string): Promise<void> {
    await runChecked(this.runner, 'dnf', ['config-manager', '--set-disabled', repo]);
  }

  async refreshMetadata(): Promise<void> {
    await runChecked(this.runner, 'dnf', ['-y', 'makecache', '--refresh']);
  }

  async hasCommand(name: string): Promise<boolean> {
    const res = await this.runner('sh', ['-c', 'command -v "$1"', 'sh', name]);
    return res.ok;
  }
}

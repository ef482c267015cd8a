import path from 'path';

import type { CommandRunner } from '../../lib/process.js';
import type { LibrarySpec } from '../../schemas/lab-config.zod.js';
import { runChecked } from './command.js';

export interface PackageLibraryInstaller {
  install(libs: readonly LibrarySpec[], opts?: { forceReinstall?: boolean }): Promise<void>;
  upgradeTooling(): Promise<void>;
}

export function requirementOf(lib: LibrarySpec): string {
  return lib.version ? `${lib.name}==${lib.version}` : lib.name;
}

export class PipLibraryInstaller implements PackageLibraryInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly binDir: string
  ) {}

  private get pip(): string {
    return path.join(this.binDir, 'pip');
  }

  async install(libs: readonly LibrarySpec[], opts: { forceReinstall?: boolean } = {}): Promise<void> {
    if (libs.length === 0) return;
    const args = ['install', '--no-cache-dir'];
    if (opts.forceReinstall) args.push('--force-reinstall');
    args.push(...libs.map(requirementOf));
    await runChecked(this.runner, this.pip, args);
  }

  async upgradeTooling(): Promise<void> {
    await runChecked(this.runner, this.pip, ['install', '--upgrade', 'pip', 'wheel', 'setuptools']);
  }
}

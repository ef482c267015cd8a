import fs from 'fs';
import path from 'path';

import type { CommandRunner } from '../../lib/process.js';
import { PermanentError } from '../errors.js';
import { runChecked } from './command.js';

export type RuntimeEnvironment = {
  version: string;
  binDir: string;
  python: string;
};

export interface RuntimeVersionManager {
  install(version: string): Promise<void>;
  activate(version: string): Promise<RuntimeEnvironment>;
}

/**
 * A Python virtual environment built from the system `python<version>`.
 */
export class VenvRuntimeManager implements RuntimeVersionManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly venvDir: string,
    private readonly exists: (p: string) => boolean = fs.existsSync
  ) {}

  private get binDir(): string {
    return path.join(this.venvDir, 'bin');
  }

  async install(version: string): Promise<void> {
    if (this.exists(path.join(this.binDir, 'python'))) return;
    await runChecked(this.runner, `python${version}`, ['-m', 'venv', this.venvDir]);
  }

  async activate(version: string): Promise<RuntimeEnvironment> {
    const python = path.join(this.binDir, 'python');
    if (!this.exists(python)) {
      throw new PermanentError(`No runtime environment at ${this.venvDir}; install Python ${version} first`);
    }

    const res = await runChecked(this.runner, python, ['--version']);
    // Older interpreters print the version on stderr.
    const reported = (res.stdout || res.stderr).replace(/^Python\s+/i, '').trim();
    if (reported !== version && !reported.startsWith(`${version}.`)) {
      throw new PermanentError(`${this.venvDir} runs Python ${reported}, expected ${version}`);
    }
    return { version, binDir: this.binDir, python };
  }
}

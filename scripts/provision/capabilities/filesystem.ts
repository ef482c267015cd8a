import fs from 'fs';

import type { CommandRunner } from '../../lib/process.js';
import { runChecked } from './command.js';

export interface FilesystemGrower {
  grow(): Promise<'grown' | 'unavailable'>;
}

/**
 * Extends the root filesystem over unallocated space with the image's own
 * growfs utility. Images without it report `unavailable`.
 */
export class GrowfsCommand implements FilesystemGrower {
  constructor(
    private readonly runner: CommandRunner,
    private readonly command: string,
    private readonly exists: (p: string) => boolean = fs.existsSync
  ) {}

  async grow(): Promise<'grown' | 'unavailable'> {
    if (!this.exists(this.command)) return 'unavailable';
    await runChecked(this.runner, this.command, ['-y']);
    return 'grown';
  }
}

import fs from 'fs';
import os from 'os';
import path from 'path';

import { commandLine, type CommandRunner } from '../../lib/process.js';
import { PermanentError } from '../errors.js';
import { runChecked } from './command.js';

export type ContentSource = {
  repository: string;
  ref: string;
  archiveUrl?: string;
};

export type FetchResult = {
  method: 'sparse' | 'archive';
  files: number;
};

export interface ContentFetcher {
  fetch(source: ContentSource, subsetPath: string, destination: string): Promise<FetchResult>;
}

/**
 * Derive a zip download URL for GitHub-hosted repositories.
 */
export function deriveArchiveUrl(source: ContentSource): string | null {
  const match = source.repository.match(/^https:\/\/github\.com\/([^/]+)\/([^/]+?)(?:\.git)?\/?$/);
  if (!match) return null;
  return `https://codeload.github.com/${match[1]}/${match[2]}/zip/refs/heads/${source.ref}`;
}

export function countFiles(dir: string): number {
  if (!fs.existsSync(dir)) return 0;
  let count = 0;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.name === '.git') continue;
    count += entry.isDirectory() ? countFiles(path.join(dir, entry.name)) : 1;
  }
  return count;
}

function copyTree(from: string, to: string): void {
  fs.mkdirSync(to, { recursive: true });
  fs.cpSync(from, to, {
    recursive: true,
    force: true,
    filter: (src) => path.basename(src) !== '.git'
  });
}

/**
 * Fetch a directory of a git repository. A shallow sparse clone is tried
 * first; when it yields nothing the branch archive is downloaded and the same
 * directory extracted from it.
 */
export class GitContentFetcher implements ContentFetcher {
  constructor(
    private readonly runner: CommandRunner,
    private readonly tmpRoot: string = os.tmpdir()
  ) {}

  async fetch(source: ContentSource, subsetPath: string, destination: string): Promise<FetchResult> {
    const workDir = fs.mkdtempSync(path.join(this.tmpRoot, 'labforge-content-'));
    try {
      const sparse = await this.sparseCheckout(source, subsetPath, path.join(workDir, 'sparse'));
      if (sparse.dir && countFiles(sparse.dir) > 0) {
        copyTree(sparse.dir, destination);
        return { method: 'sparse', files: countFiles(sparse.dir) };
      }

      const archiveUrl = source.archiveUrl ?? deriveArchiveUrl(source);
      if (!archiveUrl) {
        throw new PermanentError(
          `Sparse checkout of ${source.repository} yielded nothing (${sparse.reason}) and no archive URL is known`
        );
      }

      const extracted = await this.extractArchive(archiveUrl, subsetPath, workDir);
      copyTree(extracted, destination);
      return { method: 'archive', files: countFiles(extracted) };
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  }

  private async sparseCheckout(
    source: ContentSource,
    subsetPath: string,
    cloneDir: string
  ): Promise<{ dir: string | null; reason: string }> {
    const commands: string[][] = [
      ['clone', '--depth', '1', '--filter=blob:none', '--sparse', '--branch', source.ref, source.repository, cloneDir]
    ];
    if (subsetPath) {
      commands.push(['-C', cloneDir, 'sparse-checkout', 'set', subsetPath]);
    }

    for (const args of commands) {
      const res = await this.runner('git', args);
      if (!res.ok) {
        return { dir: null, reason: `${commandLine('git', args)} exited with ${res.exitCode}` };
      }
    }

    const dir = subsetPath ? path.join(cloneDir, subsetPath) : cloneDir;
    return fs.existsSync(dir) ? { dir, reason: '' } : { dir: null, reason: `${subsetPath} missing after checkout` };
  }

  private async extractArchive(archiveUrl: string, subsetPath: string, workDir: string): Promise<string> {
    const zipPath = path.join(workDir, 'archive.zip');
    const extractDir = path.join(workDir, 'archive');

    await runChecked(this.runner, 'curl', ['-fsSL', '-o', zipPath, archiveUrl]);
    await runChecked(this.runner, 'unzip', ['-q', '-o', zipPath, '-d', extractDir]);

    // Branch archives hold a single top-level "<repo>-<ref>/" directory.
    const roots = fs.existsSync(extractDir)
      ? fs.readdirSync(extractDir, { withFileTypes: true }).filter((e) => e.isDirectory())
      : [];
    if (roots.length !== 1) {
      throw new PermanentError(`Unexpected archive layout from ${archiveUrl}`);
    }

    const dir = path.join(extractDir, roots[0].name, subsetPath);
    if (countFiles(dir) === 0) {
      throw new PermanentError(`${subsetPath || '(root)'} not found in archive ${archiveUrl}`);
    }
    return dir;
  }
}

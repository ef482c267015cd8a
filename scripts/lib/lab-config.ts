import fs from 'fs';
import path from 'path';
import YAML from 'yaml';

import { LabConfigSchema, type LabConfig } from '../schemas/lab-config.zod.js';
import { ConfigError, errorMessage } from '../provision/errors.js';
import { replaceVariablesInObject } from './config.js';
import { mergeEnv, readEnvFile } from './env.js';

export const LAB_CONFIG_BASENAMES = ['lab.config.yml', 'lab.config.yaml'] as const;
export const DEFAULT_CONFIG_PATH = '/etc/labforge/lab.config.yml';

interface FindConfigOptions {
  maxDepth?: number;
}

/**
 * Walk parent directories until a lab config file is found.
 */
export function findLabConfigFile(startPath: string = process.cwd(), opts: FindConfigOptions = {}): string | null {
  const maxDepth = opts.maxDepth ?? 10;

  let current = path.resolve(startPath);
  for (let depth = 0; depth < maxDepth; depth++) {
    const matches = LAB_CONFIG_BASENAMES.map((name) => path.join(current, name)).filter((p) => fs.existsSync(p));
    if (matches.length > 1) {
      const list = matches.map((p) => path.basename(p)).join(', ');
      throw new ConfigError(`Multiple lab config files found in ${current} (${list}). Keep only one.`);
    }
    if (matches.length === 1) return matches[0];

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return null;
}

/**
 * `--config` wins, then `LABFORGE_CONFIG`, then the nearest config file above
 * the working directory, then the system-wide default.
 */
export function resolveConfigPath(
  explicit: string | undefined,
  opts: { cwd?: string; processEnv?: NodeJS.ProcessEnv } = {}
): string {
  const cwd = opts.cwd ?? process.cwd();
  const processEnv = opts.processEnv ?? process.env;

  if (explicit && explicit.trim()) return path.resolve(cwd, explicit.trim());
  const fromEnv = processEnv.LABFORGE_CONFIG;
  if (fromEnv && fromEnv.trim()) return path.resolve(cwd, fromEnv.trim());
  return findLabConfigFile(cwd) ?? DEFAULT_CONFIG_PATH;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}

/**
 * Read, substitute and validate a lab config. Variables come from the process
 * environment first, then from `.env` beside the config file.
 */
export function readLabConfig(filePath: string, opts: { processEnv?: NodeJS.ProcessEnv } = {}): LabConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Lab config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Cannot parse ${filePath}: ${errorMessage(e)}`);
  }
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`${filePath} must contain a YAML mapping`);
  }

  const env = mergeEnv(readEnvFile(path.join(path.dirname(filePath), '.env')), opts.processEnv ?? process.env);
  const unresolved = new Set<string>();
  const substituted = replaceVariablesInObject(raw, env, unresolved);
  if (unresolved.size > 0) {
    throw new ConfigError(
      `Unresolved variables in ${filePath}: ${[...unresolved].sort().join(', ')}. ` +
        `Export them or add them to ${path.join(path.dirname(filePath), '.env')}.`
    );
  }

  const parsed = LabConfigSchema.safeParse(substituted);
  if (!parsed.success) {
    throw new ConfigError(`Invalid lab config ${filePath}:\n${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

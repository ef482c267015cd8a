/**
 * JSON file helpers and `$VAR` substitution for configuration values.
 */

import fs from 'fs';
import path from 'path';

/**
 * Read JSON file. Missing or malformed files read as null.
 */
export function readJSON(filePath: string): unknown {
  try {
    const content = fs.readFileSync(filePath, 'utf8');
    return JSON.parse(content);
  } catch {
    return null;
  }
}

/**
 * Write JSON durably: the payload goes to a sibling temp file, is flushed to
 * disk, then renamed over the target. Readers see either the old or the new
 * document, never a torn one.
 */
export function writeJSONAtomic(filePath: string, data: unknown): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });

  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  const fd = fs.openSync(tmpPath, 'w');
  try {
    fs.writeSync(fd, JSON.stringify(data, null, 2) + '\n');
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
  fs.renameSync(tmpPath, filePath);
}

/**
 * Replace `$VARNAME` references using `env`. Names that cannot be resolved are
 * kept as written and collected into `unresolved` when given. `$$` stands for
 * a literal `$`. A leading `~/` expands to `env.HOME`.
 */
export function replaceVariables(str: string, env: Record<string, string>, unresolved?: Set<string>): string {
  let result = str.replace(/\$\$|\$([A-Za-z_][A-Za-z0-9_]*)/g, (match, varName: string | undefined) => {
    if (varName === undefined) return '$';
    const value = env[varName];
    if (value !== undefined) return value;
    unresolved?.add(varName);
    return match;
  });

  if (result.startsWith('~/') && env.HOME) {
    result = path.posix.join(env.HOME, result.slice(2));
  }

  return result;
}

/**
 * Recursively replace variables in every string of a parsed document.
 */
export function replaceVariablesInObject(obj: unknown, env: Record<string, string>, unresolved?: Set<string>): unknown {
  if (typeof obj === 'string') {
    return replaceVariables(obj, env, unresolved);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => replaceVariablesInObject(item, env, unresolved));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = replaceVariablesInObject(value, env, unresolved);
    }
    return result;
  }
  return obj;
}

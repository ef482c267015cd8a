import fs from 'fs';
import dotenv from 'dotenv';

/**
 * Parse a `.env` file. A missing file yields an empty map.
 */
export function readEnvFile(envPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) return {};
  return dotenv.parse(fs.readFileSync(envPath, 'utf8'));
}

/**
 * Merge `.env` values under the process environment: a variable exported in
 * the shell wins over the same name in the file. Empty values count as unset.
 */
export function mergeEnv(fileEnv: Record<string, string>, processEnv: NodeJS.ProcessEnv): Record<string, string> {
  const merged: Record<string, string> = { ...fileEnv };
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined && value.trim() !== '') merged[key] = value;
  }
  return merged;
}

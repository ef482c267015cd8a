import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

import type { LabConfig } from '../schemas/lab-config.zod.js';
import type { ContainerRuntime } from './capabilities/container.js';
import { CommandError, PermanentError, TransientError } from './errors.js';
import { anyOf } from './readiness.js';
import type { ReadinessPredicate } from './types.js';

export type DatabaseConfig = LabConfig['database'];

const SQL_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'sql');

export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (_match, name: string) => {
    const value = vars[name];
    if (value === undefined) throw new PermanentError(`Template variable ${name} has no value`);
    return value;
  });
}

export function sqlVariables(db: DatabaseConfig): Record<string, string> {
  return {
    PDB: db.pdb,
    LISTENER_PORT: String(db.listenerPort),
    APP_USER: db.appUser.name,
    APP_PASSWORD: db.appUser.password,
    VECTOR_MEMORY: db.vectorMemory
  };
}

export function loadSql(name: string, db: DatabaseConfig): string {
  return renderTemplate(fs.readFileSync(path.join(SQL_DIR, `${name}.sql`), 'utf8'), sqlVariables(db));
}

/**
 * Feed a script to sqlplus inside the database container. `WHENEVER SQLERROR
 * CONTINUE` keeps sqlplus at exit 0, so ORA- lines in the output are raised
 * as errors too; known-harmless ones are matched by the step's tolerated
 * signals.
 */
export async function runSql(
  containers: ContainerRuntime,
  db: DatabaseConfig,
  script: string,
  opts: { connect?: string } = {}
): Promise<string> {
  const connect = opts.connect ?? '/ as sysdba';
  const res = await containers.exec(db.name, ['bash', '-lc', `. ${db.shellProfile}; sqlplus -S -L ${connect}`], script);
  if (!res.ok) {
    throw new CommandError({ command: `sqlplus (${db.name})`, exitCode: res.exitCode, stdout: res.stdout, stderr: res.stderr });
  }
  const errors = res.stdout.match(/ORA-\d{5}[^\n]*/g);
  if (errors) {
    const reports = errors.map((line) => line.trim());
    throw new TransientError(reports.join('; '), reports);
  }
  return res.stdout;
}

/**
 * The database is usable once the container reports healthy or the ready
 * line shows up in its logs, whichever comes first. The image's setup can
 * log a configuration failure even though the database came up, so neither
 * signal alone is trusted to be the only one.
 *
 * A stopped container with persisted data is restarted; one without data is
 * a permanent failure.
 */
export function databaseReadiness(
  db: DatabaseConfig,
  containers: ContainerRuntime,
  pathExists: (p: string) => boolean = fs.existsSync
): ReadinessPredicate {
  const persisted = path.join(db.dataDir, db.persistedDataSubdir);

  const liveness: ReadinessPredicate = async () => {
    if (await containers.isRunning(db.name)) return { state: 'not-ready', observed: 'running=true' };
    if (!pathExists(persisted)) {
      return { state: 'failed', reason: `container ${db.name} exited and ${persisted} does not exist` };
    }
    await containers.start(db.name);
    return { state: 'not-ready', observed: 'running=false restarted' };
  };

  const health: ReadinessPredicate = async () => {
    const status = await containers.inspectHealth(db.name);
    return status === 'healthy' ? { state: 'ready', observed: 'health=healthy' } : { state: 'not-ready', observed: `health=${status}` };
  };

  const readyLine: ReadinessPredicate = async () =>
    (await containers.logs(db.name)).includes(db.readyLogLine)
      ? { state: 'ready', observed: 'ready line logged' }
      : { state: 'not-ready' };

  return anyOf(liveness, health, readyLine);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function listenerReadiness(db: DatabaseConfig, containers: ContainerRuntime): ReadinessPredicate {
  const service = new RegExp(`Service "${escapeRegExp(db.pdb)}"`, 'i');
  return async () => {
    const res = await containers.exec(db.name, ['bash', '-lc', `. ${db.shellProfile}; lsnrctl status`]);
    return service.test(res.stdout)
      ? { state: 'ready', observed: `${db.pdb} registered` }
      : { state: 'not-ready', observed: `lsnrctl exit=${res.exitCode}` };
  };
}

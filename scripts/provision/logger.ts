import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { print, type Color } from '../utils.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Pino-compatible (levels-only) surface:
// - logger.info('msg')
// - logger.info({ key: 'value' }, 'msg')
export type ProvisionLogger = {
  debug: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  info: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  warn: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  error: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
};

const AuditRecordSchema = z
  .object({
    level: z.number(),
    time: z.number(),
    msg: z.string()
  })
  .passthrough();

export type AuditRecord = z.infer<typeof AuditRecordSchema>;

function normalizeArgs(
  objOrMsg?: Record<string, unknown> | string,
  msg?: string
): { obj: Record<string, unknown>; msg: string } {
  if (typeof objOrMsg === 'string') {
    return { obj: {}, msg: objOrMsg };
  }
  return { obj: objOrMsg ?? {}, msg: msg ?? '' };
}

function levelToNumber(level: LogLevel): number {
  // Align with pino numeric levels.
  switch (level) {
    case 'debug':
      return 20;
    case 'info':
      return 30;
    case 'warn':
      return 40;
    case 'error':
      return 50;
  }
}

const ECHO_COLORS: Record<LogLevel, Color> = {
  debug: 'gray',
  info: 'cyan',
  warn: 'yellow',
  error: 'red'
};

function formatEcho(level: LogLevel, record: AuditRecord): string {
  const fields = Object.entries(record)
    .filter(([k]) => k !== 'level' && k !== 'time' && k !== 'msg')
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
  return `[${level}] ${record.msg}${fields ? ` ${fields}` : ''}`;
}

function createLogger(sink: (level: LogLevel, record: AuditRecord) => void): ProvisionLogger {
  const write = (level: LogLevel, objOrMsg?: Record<string, unknown> | string, msg?: string): void => {
    const { obj, msg: normalizedMsg } = normalizeArgs(objOrMsg, msg);
    sink(level, {
      level: levelToNumber(level),
      time: Date.now(),
      msg: normalizedMsg,
      ...obj
    });
  };

  return {
    debug: (objOrMsg, msg) => write('debug', objOrMsg, msg),
    info: (objOrMsg, msg) => write('info', objOrMsg, msg),
    warn: (objOrMsg, msg) => write('warn', objOrMsg, msg),
    error: (objOrMsg, msg) => write('error', objOrMsg, msg)
  };
}

/**
 * Append-only JSON-lines audit log. With `echo`, info and above are also
 * printed to the console.
 */
export function createFileLogger(filePath: string, opts: { echo?: boolean } = {}): ProvisionLogger {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  return createLogger((level, record) => {
    fs.appendFileSync(filePath, JSON.stringify(record) + '\n', 'utf8');
    if (opts.echo && level !== 'debug') {
      print(formatEcho(level, record), ECHO_COLORS[level]);
    }
  });
}

export type MemoryLogger = ProvisionLogger & { records: AuditRecord[] };

export function createMemoryLogger(): MemoryLogger {
  const records: AuditRecord[] = [];
  const logger = createLogger((_level, record) => {
    records.push(record);
  });
  return { ...logger, records };
}

/**
 * Parse the audit log back into records, skipping lines that are not
 * well-formed. `tail` keeps only the last N records.
 */
export function readAuditLog(filePath: string, opts: { tail?: number } = {}): AuditRecord[] {
  if (!fs.existsSync(filePath)) return [];

  const records: AuditRecord[] = [];
  for (const line of fs.readFileSync(filePath, 'utf8').split('\n')) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    const result = AuditRecordSchema.safeParse(parsed);
    if (result.success) records.push(result.data);
  }

  return opts.tail !== undefined ? records.slice(Math.max(0, records.length - opts.tail)) : records;
}

import { env } from '../config/env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const minRank = LEVEL_RANK[env.LOG_LEVEL];

export function formatLogLine(level: LogLevel, event: string, fields?: LogFields, now = new Date()): string {
  return JSON.stringify({ ts: now.toISOString(), level, event, ...fields });
}

function write(level: LogLevel, event: string, fields?: LogFields): void {
  if (LEVEL_RANK[level] < minRank) return;
  const line = formatLogLine(level, event, fields);
  if (level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function logDebug(event: string, fields?: LogFields): void {
  write('debug', event, fields);
}

export function logInfo(event: string, fields?: LogFields): void {
  write('info', event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  write('warn', event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  write('error', event, fields);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

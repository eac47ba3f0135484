import winston, { type Logger } from 'winston';

const { createLogger, format, transports } = winston;

const LEVEL_ENV = 'KEY_HYGIENE_LOG_LEVEL';
const DEFAULT_LEVEL = 'warn';

function configuredLevel(): string {
  const fromEnv = typeof process !== 'undefined' ? process.env[LEVEL_ENV] : undefined;
  return fromEnv && fromEnv.length > 0 ? fromEnv : DEFAULT_LEVEL;
}

const level = configuredLevel();

interface LogLine {
  timestamp?: unknown;
  level: string;
  message: unknown;
  module?: unknown;
}

/** `2024-01-05 09:03:07.250 | WARN     | [MONITOR     ] | message` */
export function formatLine(info: LogLine): string {
  const module = typeof info.module === 'string' ? info.module : 'CORE';
  return `${String(info.timestamp)} | ${info.level.toUpperCase().padEnd(8)} | [${module.padEnd(12)}] | ${String(info.message)}`;
}

const lineFormat = format.printf(formatLine);

const root: Logger = createLogger({
  level: level === 'silent' ? DEFAULT_LEVEL : level,
  silent: level === 'silent',
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    lineFormat,
  ),
  transports: [new transports.Console({ stderrLevels: ['error', 'warn'] })],
});

/** Logger bound to a module tag, e.g. getLogger('TRACKER'). */
export function getLogger(module: string): Logger {
  return root.child({ module });
}

export type { Logger };

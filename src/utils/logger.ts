/**
 * Component loggers.
 *
 * Every logger shares one sink, set by configureLogging() from the validated
 * `logging` section of the wire config. Until then entries at INFO and above
 * go to the console as text.
 */

import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_LOGGING_CONFIG } from '../config/wire-config.js';
import type { LoggingConfig } from '../config/schemas.js';

export type LogLevel = LoggingConfig['level'];

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

let settings: Readonly<LoggingConfig> = { ...DEFAULT_LOGGING_CONFIG };

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

/**
 * Point every logger at `config`. The log file's directory is created here,
 * so a bad path fails at startup instead of on the first entry.
 */
export function configureLogging(config: LoggingConfig): void {
  if (config.file !== undefined) {
    fs.mkdirSync(path.dirname(config.file), { recursive: true });
  }
  settings = { ...config };
}

export function loggingSettings(): Readonly<LoggingConfig> {
  return settings;
}

export function formatLogEntry(entry: LogEntry, json: boolean = settings.json): string {
  if (json) {
    return JSON.stringify(entry);
  }
  const { ts, level, component, msg, ...extra } = entry;
  const fields = Object.entries(extra).map(([key, value]) => ` ${key}=${String(value)}`);
  return `${ts} [${level}] [${component}] ${msg}${fields.join('')}`;
}

function write(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[settings.level]) return;

  const line = formatLogEntry({ ts: new Date().toISOString(), level, component, msg, ...extra });

  if (settings.file !== undefined) {
    fs.appendFileSync(settings.file, `${line}\n`);
  } else if (SEVERITY[level] >= SEVERITY.WARN) {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * @param component - short subsystem name shown in brackets, e.g. 'context-store'
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => write('DEBUG', component, msg, extra),
    info: (msg, extra) => write('INFO', component, msg, extra),
    warn: (msg, extra) => write('WARN', component, msg, extra),
    error: (msg, extra) => write('ERROR', component, msg, extra),
  };
}

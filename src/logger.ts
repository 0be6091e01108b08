'use strict';

import * as util from 'util';

import { loadSettings, LogLevel } from './settings';

/**
 * Logger interface used by the automata. Arguments follow `util.format`
 * conventions, so a message is only formatted when its level is enabled.
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface LoggerOptions {
  /** Lowest level written; defaults to the `DFA_LOG_LEVEL` setting */
  level?: LogLevel;
  sink?: LogSink;
  now?: () => Date;
}

const SEVERITY: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

type WrittenLevel = Exclude<LogLevel, 'silent'>;

/**
 * Create a named logger writing lines of the form
 * `2024-01-01T00:00:00.000Z - DFA - DEBUG - message`.
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? loadSettings().logLevel];
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());

  const write = (level: WrittenLevel) => (...args: unknown[]): void => {
    if (SEVERITY[level] < threshold) return;
    const line = [now().toISOString(), name, level.toUpperCase(), util.format(...args)].join(' - ');
    sink[level](line);
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });

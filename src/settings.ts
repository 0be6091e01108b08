'use strict';

import * as yup from 'yup';

import { SettingsError } from './errors';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const settingsSchema = yup.object({
  logLevel: yup
    .mixed<LogLevel>()
    .oneOf(LOG_LEVELS, 'log level must be one of ' + JSON.stringify(LOG_LEVELS))
    .default('warn'),
});

export type Settings = yup.InferType<typeof settingsSchema>;

/**
 * Read settings from the environment.
 *
 * `DFA_LOG_LEVEL` picks the default level of every logger created without an
 * explicit one (case-insensitive, default `warn`).
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw = {
    logLevel: env.DFA_LOG_LEVEL ? env.DFA_LOG_LEVEL.trim().toLowerCase() : undefined,
  };

  try {
    return settingsSchema.validateSync(raw);
  } catch (e) {
    if (e instanceof yup.ValidationError) {
      throw new SettingsError('Invalid settings', {
        problemValue: env.DFA_LOG_LEVEL,
        validationErrors: e.errors,
      }, { cause: e });
    }
    throw e;
  }
}

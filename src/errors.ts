'use strict';

import * as util from 'util';

export type ErrorKind =
  | 'config'
  | 'invalid-symbol'
  | 'undefined-transition'
  | 'step'
  | 'rejected'
  | 'engine'
  | 'input-type'
  | 'invalid-character'
  | 'internal-config'
  | 'parse'
  | 'settings';

export interface ErrorDetails {
  problemValue?: unknown;
  [key: string]: unknown;
}

function describe(reason: string, details: ErrorDetails): string {
  if (details.problemValue === undefined) return reason;
  return reason + ': ' + util.inspect(details.problemValue);
}

/**
 * Base of every error the automata raise. Callers tell errors apart by
 * `kind` (or `instanceof`); `reason` is the headline without the value.
 */
export class AutomatonError extends Error {
  public readonly kind: ErrorKind;
  public readonly reason: string;
  public readonly details: Readonly<ErrorDetails>;

  constructor(kind: ErrorKind, reason: string, details: ErrorDetails = {}, options?: ErrorOptions) {
    super(describe(reason, details), options);

    this.name = 'AutomatonError';
    this.kind = kind;
    this.reason = reason;
    this.details = details;

    // https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
    // Set the prototype explicitly.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const CONFIG_VIOLATIONS = [
  'empty-states',
  'empty-alphabet',
  'unknown-start-state',
  'unknown-accept-state',
  'unknown-transition-state',
  'unknown-transition-symbol',
  'unknown-target-state',
] as const;

export type ConfigViolation = typeof CONFIG_VIOLATIONS[number];

export function isConfigViolation(value: unknown): value is ConfigViolation {
  return CONFIG_VIOLATIONS.some((violation) => violation === value);
}

export class ConfigError extends AutomatonError {
  public readonly violation: ConfigViolation;

  constructor(violation: ConfigViolation, reason: string, details: ErrorDetails = {}) {
    super('config', reason, details);
    this.name = 'ConfigError';
    this.violation = violation;
  }
}

export class InvalidSymbolError extends AutomatonError {
  constructor(public readonly symbol: string, public readonly state: string) {
    super('invalid-symbol', 'Symbol is not in the alphabet', { problemValue: symbol, state });
    this.name = 'InvalidSymbolError';
  }
}

export class UndefinedTransitionError extends AutomatonError {
  constructor(public readonly state: string, public readonly symbol: string) {
    super('undefined-transition', 'No transition defined from state ' + util.inspect(state),
      { problemValue: symbol, state });
    this.name = 'UndefinedTransitionError';
  }
}

export type SymbolError = InvalidSymbolError | UndefinedTransitionError;

export class StepError extends AutomatonError {
  declare readonly cause: SymbolError;

  constructor(public readonly position: number, public readonly symbol: string, cause: SymbolError) {
    super('step', 'Error at position ' + position + ' while processing ' + util.inspect(symbol) + ': ' + cause.message,
      { position, symbol }, { cause });
    this.name = 'StepError';
  }
}

export class RejectedError extends AutomatonError {
  constructor(public readonly state: string, acceptStates: readonly string[]) {
    super('rejected', 'Input rejected: final state is not accepting', { problemValue: state, acceptStates });
    this.name = 'RejectedError';
  }
}

export type ModThreeErrorKind = 'engine' | 'input-type' | 'invalid-character' | 'internal-config';

/**
 * Raised by the modulo-3 automaton. With kind `engine` it wraps a failure of
 * the underlying engine, kept as `cause`; the subclasses cover input and
 * definition problems.
 */
export class ModThreeError extends AutomatonError {
  constructor(kind: ModThreeErrorKind, reason: string, details: ErrorDetails = {}, options?: ErrorOptions) {
    super(kind, reason, details, options);
    this.name = 'ModThreeError';
  }
}

export class InputTypeError extends ModThreeError {
  constructor(input: unknown) {
    super('input-type', 'Input must be a string', { problemValue: input === null ? 'null' : typeof input });
    this.name = 'InputTypeError';
  }
}

export class InvalidCharacterError extends ModThreeError {
  constructor(public readonly characters: readonly string[]) {
    super('invalid-character', 'Binary string contains invalid characters', { problemValue: characters });
    this.name = 'InvalidCharacterError';
  }
}

export class InternalConfigError extends ModThreeError {
  declare readonly cause: ConfigError;

  constructor(cause: ConfigError) {
    super('internal-config', 'Modulo-3 automaton definition is invalid', { problemValue: cause.violation }, { cause });
    this.name = 'InternalConfigError';
  }
}

export class ParseError extends AutomatonError {
  constructor(reason: string, details: ErrorDetails = {}, options?: ErrorOptions) {
    super('parse', reason, details, options);
    this.name = 'ParseError';
  }
}

export class SettingsError extends AutomatonError {
  constructor(reason: string, details: ErrorDetails = {}, options?: ErrorOptions) {
    super('settings', reason, details, options);
    this.name = 'SettingsError';
  }
}

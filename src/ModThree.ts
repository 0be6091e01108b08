'use strict';

import DFA from './DFA';
import _ from './lodash-mixins';
import {
  AutomatonError,
  ConfigError,
  InputTypeError,
  InternalConfigError,
  InvalidCharacterError,
  ModThreeError,
} from './errors';
import { createLogger, Logger } from './logger';
import { attempt, Result } from './result';
import { DFADefinition } from './TransitionSpec';

export type RemainderState = 'R0' | 'R1' | 'R2';
export type BinaryDigit = '0' | '1';
export type Remainder = 0 | 1 | 2;

/**
 * Reading digit d in the state for remainder r leads to the state for
 * (2r + d) mod 3: appending a digit doubles the value and adds d.
 */
export const MOD_THREE_DEFINITION: DFADefinition<RemainderState, BinaryDigit> = {
  states: ['R0', 'R1', 'R2'],
  alphabet: ['0', '1'],
  table: {
    R0: { '0': 'R0', '1': 'R1' },
    R1: { '0': 'R2', '1': 'R0' },
    R2: { '0': 'R1', '1': 'R2' },
  },
  startState: 'R0',
  // every state is accepting, so a binary string is never rejected
  acceptStates: ['R0', 'R1', 'R2'],
};

export const REMAINDERS: Readonly<Record<RemainderState, Remainder>> = {
  R0: 0,
  R1: 1,
  R2: 2,
};

const DIGITS: ReadonlySet<string> = new Set<BinaryDigit>(['0', '1']);

export interface ModThreeOptions {
  /** Definition to compile in place of {@link MOD_THREE_DEFINITION} */
  definition?: DFADefinition<RemainderState, BinaryDigit>;
  logger?: Logger;
  /** Logger of the underlying automaton; defaults to `createLogger('DFA')` */
  engineLogger?: Logger;
}

/**
 * Build the engine for a modulo-3 definition. The definition is fixed, so a
 * rejected one is a defect and surfaces as {@link InternalConfigError}.
 */
export function compileModThree(
  definition: DFADefinition<RemainderState, BinaryDigit> = MOD_THREE_DEFINITION,
  logger?: Logger,
): DFA<RemainderState, BinaryDigit> {
  try {
    return new DFA(definition, { logger });
  } catch (e) {
    if (e instanceof ConfigError) throw new InternalConfigError(e);
    throw e;
  }
}

/**
 * Computes the remainder of a binary number divided by 3 by running it,
 * most significant digit first, through a three-state automaton.
 */
export default class ModThree {
  private readonly dfa: DFA<RemainderState, BinaryDigit>;
  private readonly logger: Logger;

  constructor (options: ModThreeOptions = {}) {
    this.dfa = compileModThree(options.definition, options.engineLogger);
    this.logger = options.logger ?? createLogger('ModThree');
    this.logger.info('ModThree automaton initialized');
  }

  public get currentState (): RemainderState {
    return this.dfa.currentState;
  }

  public reset (): void {
    this.dfa.reset();
  }

  /**
   * @param input  binary digits, most significant first; '' stands for 0
   * @throws {InputTypeError} if the input is not a string
   * @throws {InvalidCharacterError} listing the distinct non-binary characters
   * @throws {ModThreeError} wrapping a failure of the underlying automaton,
   *   possible only with a definition other than the default
   */
  public getRemainder (input: string): Remainder {
    if (typeof input !== 'string')
      throw new InputTypeError(input);

    if (input.length === 0) {
      this.logger.debug('Empty binary string, remainder 0');
      return 0;
    }

    const invalid = _.uniq([...input].filter((character) => !DIGITS.has(character)));
    if (invalid.length)
      throw new InvalidCharacterError(invalid);

    let finalState: RemainderState;
    try {
      finalState = this.dfa.run(input);
    } catch (e) {
      if (e instanceof AutomatonError)
        throw new ModThreeError('engine', 'Automaton processing failed', { problemValue: e.message }, { cause: e });
      throw e;
    }

    const remainder = REMAINDERS[finalState];
    this.logger.debug('%s ends in %s, remainder %d', input, finalState, remainder);
    return remainder;
  }

  public tryGetRemainder (input: string): Result<Remainder> {
    return attempt(() => this.getRemainder(input));
  }

  public toString (): string {
    return 'ModThree(current=' + this.currentState + ')';
  }
}

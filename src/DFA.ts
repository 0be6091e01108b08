'use strict';

import _ from './lodash-mixins';
import { InvalidSymbolError, RejectedError, StepError, UndefinedTransitionError } from './errors';
import { createLogger, Logger } from './logger';
import { parseDefinition } from './parser';
import { flattenTable } from './parser-utils';
import { attempt, Result } from './result';
import { DFADefinition } from './TransitionSpec';
import { validateDefinition } from './validation';

export interface DFAOptions {
  logger?: Logger;
}

export default class DFA<S extends string = string, A extends string = string> {
  public readonly states: ReadonlySet<S>;
  public readonly alphabet: ReadonlySet<A>;
  public readonly startState: S;
  public readonly acceptStates: ReadonlySet<S>;
  private readonly symbols: ReadonlySet<string>;
  private readonly table: ReadonlyMap<string, ReadonlyMap<string, S>>;
  private readonly logger: Logger;
  private state: S;

  /**
   * Construct a deterministic finite automaton.
   *
   * The definition is checked once, here, and copied: later changes to the
   * caller's sets or table do not reach the automaton.
   * @throws {ConfigError} on the first violated invariant, in the order
   *   states, alphabet, start state, accept states, transition table
   */
  constructor (definition: DFADefinition<S, A>, options: DFAOptions = {}) {
    const states = new Set(definition.states);
    const alphabet = new Set(definition.alphabet);
    const acceptStates = new Set(definition.acceptStates);
    const transitions = flattenTable(definition.table);

    validateDefinition({
      states,
      alphabet,
      startState: definition.startState,
      acceptStates,
      transitions,
    });

    const table = new Map<string, Map<string, S>>();
    _.forOwn(definition.table, (outTrans, from) => {
      const row = new Map<string, S>();
      _.forOwn<{ readonly [read in A]?: S }>(outTrans, (to: S | undefined, read: string) => {
        if (!_.isNil(to))
          row.set(read, to);
      });
      if (row.size)
        table.set(from, row);
    });

    this.states = states;
    this.alphabet = alphabet;
    this.startState = definition.startState;
    this.acceptStates = acceptStates;
    this.symbols = alphabet;
    this.table = table;
    this.logger = options.logger ?? createLogger('DFA');
    this.state = definition.startState;

    this.logger.info('DFA initialized with %d states and %d symbols', states.size, alphabet.size);
  }

  /**
   * Parse a YAML definition and build the automaton it describes.
   * @see parseDefinition
   */
  static fromYaml (text: string, options: DFAOptions = {}): DFA {
    return new DFA(parseDefinition(text).definition, options);
  }

  public get currentState (): S {
    return this.state;
  }

  public get isAccepting (): boolean {
    return this.acceptStates.has(this.state);
  }

  public reset (): void {
    this.state = this.startState;
    this.logger.debug('DFA reset to start state %s', this.startState);
  }

  /**
   * Consume one symbol.
   * @throws {InvalidSymbolError} if the symbol is not in the alphabet
   * @throws {UndefinedTransitionError} if the current state has no
   *   transition on the symbol
   */
  public step (symbol: string): void {
    if (!this.symbols.has(symbol))
      throw new InvalidSymbolError(symbol, this.state);

    const next = this.table.get(this.state)?.get(symbol);
    if (next === undefined)
      throw new UndefinedTransitionError(this.state, symbol);

    this.logger.debug('Transition: %s --%s--> %s', this.state, symbol, next);
    this.state = next;
  }

  /**
   * Reset, then consume the input left to right.
   *
   * On failure the current state is wherever processing stopped; call
   * {@link reset} for a clean instance.
   * @return the final state
   * @throws {StepError} wrapping the symbol error, with its position
   * @throws {RejectedError} if the final state is not accepting
   */
  public run (input: Iterable<string>): S {
    this.reset();

    let position = 0;
    for (const symbol of input) {
      try {
        this.step(symbol);
      } catch (e) {
        if (e instanceof InvalidSymbolError || e instanceof UndefinedTransitionError)
          throw new StepError(position, symbol, e);
        throw e;
      }
      position++;
    }

    this.logger.debug('Processed %d symbols, final state %s', position, this.state);

    if (!this.isAccepting)
      throw new RejectedError(this.state, [...this.acceptStates]);

    return this.state;
  }

  public tryRun (input: Iterable<string>): Result<S> {
    return attempt(() => this.run(input));
  }

  public toString (): string {
    return 'DFA(states=' + this.states.size
      + ', alphabet=' + [...this.alphabet].join(',')
      + ', current=' + this.state + ')';
  }
}

'use strict';

import * as yup from 'yup';

import _ from './lodash-mixins';
import { ConfigError, ConfigViolation, isConfigViolation } from './errors';
import { DFATransition } from './TransitionSpec';

/** A definition flattened into plain sets and a transition list, ready to check. */
export interface DefinitionShape {
  states: ReadonlySet<string>;
  alphabet: ReadonlySet<string>;
  startState: string;
  acceptStates: ReadonlySet<string>;
  transitions: readonly DFATransition[];
}

interface TransitionProblem {
  violation: ConfigViolation;
  message: string;
  problemValue: string;
}

function checkTransition(definition: DefinitionShape, transition: DFATransition): TransitionProblem | undefined {
  if (!definition.states.has(transition.from))
    return {
      violation: 'unknown-transition-state',
      message: 'Transition source state is not declared',
      problemValue: transition.from,
    };
  if (!definition.alphabet.has(transition.read))
    return {
      violation: 'unknown-transition-symbol',
      message: 'Transition symbol is not in the alphabet',
      problemValue: transition.read,
    };
  if (!definition.states.has(transition.to))
    return {
      violation: 'unknown-target-state',
      message: 'Transition target state is not declared',
      problemValue: transition.to,
    };
  return undefined;
}

// Tests run in declaration order and validation stops at the first failure,
// so the order below is the order violations are reported in.
const definitionSchema = yup
  .mixed<DefinitionShape>()
  .defined()
  .test('empty-states', 'States set cannot be empty',
    (definition) => definition.states.size > 0)
  .test('empty-alphabet', 'Alphabet cannot be empty',
    (definition) => definition.alphabet.size > 0)
  .test('unknown-start-state', 'Start state is not a declared state',
    (definition, context) =>
      definition.states.has(definition.startState)
      || context.createError({ params: { problemValue: definition.startState } }))
  .test('unknown-accept-state', 'Accept states must be declared states',
    (definition, context) => {
      const undeclared = _.firstUndeclared(definition.acceptStates, definition.states);
      return undeclared === undefined
        || context.createError({ params: { problemValue: undeclared } });
    })
  .test('transitions', 'Transition table is invalid',
    (definition, context) => {
      for (const transition of definition.transitions) {
        const problem = checkTransition(definition, transition);
        if (problem)
          return context.createError({
            message: problem.message,
            params: { violation: problem.violation, problemValue: problem.problemValue, transition },
          });
      }
      return true;
    });

function toConfigError(e: yup.ValidationError): ConfigError | undefined {
  const params = e.params ?? {};
  const violation = params.violation ?? e.type;
  if (!isConfigViolation(violation)) return undefined;

  const details: Record<string, unknown> = {};
  if (params.problemValue !== undefined) details.problemValue = params.problemValue;
  if (params.transition !== undefined) details.transition = params.transition;
  return new ConfigError(violation, e.message, details);
}

/**
 * Check the definition invariants.
 * @throws {ConfigError} for the first violated invariant
 */
export function validateDefinition(definition: DefinitionShape): void {
  try {
    definitionSchema.validateSync(definition, { strict: true });
  } catch (e) {
    if (e instanceof yup.ValidationError) {
      const error = toConfigError(e);
      if (error) throw error;
    }
    throw e;
  }
}

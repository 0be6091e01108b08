'use strict';

import * as jsyaml from "js-yaml";
import * as yup from 'yup';

import _ from './lodash-mixins';
import { ParseError } from './errors';
import { flattenTable, parseTable, splitToStringArray, toStringArray } from './parser-utils';
import { DFADefinition, StringArraySchema, TransitionTable } from './TransitionSpec';

let schemaFields = {
  states: StringArraySchema(toStringArray).optional(),

  alphabet: StringArraySchema(toStringArray).optional(),

  startState: yup
    .string()
    .required('start state is required'),

  acceptStates: StringArraySchema(toStringArray).default([]),

  table: yup
    .mixed<TransitionTable>()
    .transform((_value, originalValue) => parseTable(originalValue))
    .default(() => ({})),

  input: StringArraySchema(splitToStringArray).default([]),
};

let schema = yup.object(schemaFields)
  .from('["start state"]', 'startState')
  .from('start', 'startState')
  .from('["accept states"]', 'acceptStates')
  .from('["accept state"]', 'acceptStates')
;

export interface ParsedDefinition {
  definition: DFADefinition;
  /** Symbols of the optional `input` entry */
  input: string[];
}

/**
 * Read a DFA definition written in YAML.
 *
 * `states` defaults to the states the table lists transitions for, and
 * `alphabet` to the symbols it uses. Table keys may list several
 * comma-separated symbols sharing a target.
 * @throws {ParseError} for malformed YAML or a malformed definition
 */
export function parseDefinition(str: string): ParsedDefinition {
  let obj: unknown;
  try {
    obj = jsyaml.load(str);
  } catch (e) {
    if (e instanceof jsyaml.YAMLException)
      throw new ParseError('Invalid YAML', { problemValue: e.reason }, { cause: e });
    throw e;
  }

  let parsed: yup.InferType<typeof schema>;
  try {
    parsed = schema.validateSync(obj ?? {});
  } catch (e) {
    if (e instanceof yup.ValidationError)
      throw new ParseError('Validation Error', {
        problemValue: e.message,
        validationErrors: e.errors,
      }, { cause: e });
    throw e;
  }

  const table = parsed.table;
  return {
    definition: {
      states: parsed.states ?? _.keys(table),
      alphabet: parsed.alphabet ?? _.uniq(flattenTable(table).map((transition) => transition.read)),
      startState: parsed.startState,
      acceptStates: parsed.acceptStates,
      table,
    },
    input: parsed.input,
  };
}

import _ from "./lodash-mixins";

import { ParseError } from './errors';
import { DFATransition, DFATransitionSchema, TransitionTable } from './TransitionSpec';

export function toStringArray (val: unknown): string[] {
  if (_.isNil(val))
    return [];
  if (_.isString(val))
    return [val];
  else
    return _.castArray(val).map(String);
}

export function splitToStringArray (val: unknown): string[] {
  if (_.isNil(val))
    return [];
  if (_.isString(val))
    return [...val];
  if (_.isArray(val))
    return val.map(String);
  else
    return [...String(val)];
}

/**
 * Split a table key into the symbols it stands for.
 * NB. Comma-separated symbols are supported, a lone comma stands for itself.
 * e.g. '0,1' -> ['0', '1'], ',' -> [','].
 */
export function splitSymbols (key: string): string[] {
  if (key === ',')
    return [key];
  return key.split(',');
}

function isMapping (val: unknown): val is Record<string, unknown> {
  return _.isPlainObject(val);
}

/**
 * Turn the `table` section of a YAML definition into a transition table.
 * An empty target stays in the same state; a list of targets is
 * nondeterministic and rejected, as is a symbol given twice for one state.
 */
export function parseTable (table: unknown): TransitionTable {
  if (_.isNil(table))
    return {};
  if (!isMapping(table))
    throw new ParseError('Transition table must be a mapping', { problemValue: table });

  return _.mapValues(table, (outTrans, from): Record<string, string> => {
    if (_.isNil(outTrans))
      return {};
    if (!isMapping(outTrans))
      throw new ParseError('Transitions of a state must be a mapping', { problemValue: from });

    const row = new Map<string, string>();
    _.forEach(_.toPairs(outTrans), ([symbols, trans]) => {
      if (_.isArray(trans) && trans.length > 1)
        throw new ParseError('Nondeterministic transition: one target state per symbol', {
          problemValue: from + ', ' + symbols,
        });
      const target = _.isNil(trans) || (_.isArray(trans) && trans.length === 0) ? from : _.head(_.castArray(trans));

      for (const symbol of splitSymbols(symbols)) {
        if (row.has(symbol))
          throw new ParseError('Nondeterministic transition: symbol given twice', {
            problemValue: from + ', ' + symbol,
          });
        row.set(symbol, DFATransitionSchema.validateSync({ from, read: symbol, to: target }).to);
      }
    });
    // fromEntries defines own properties, so a `__proto__` symbol is kept
    return Object.fromEntries(row);
  });
}

export function flattenTable (table: TransitionTable): DFATransition[] {
  const transitions: DFATransition[] = [];
  _.forOwn(table, (outTrans, from) => {
    _.forOwn(outTrans, (to, read) => {
      if (!_.isNil(to))
        transitions.push({ from, read, to });
    });
  });
  return transitions;
}

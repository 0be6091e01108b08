import * as yup from "yup";

/**
 * Transition table of a deterministic automaton: at most one target state per
 * (state, symbol) pair. Missing entries mean no transition is defined.
 */
export type TransitionTable<S extends string = string, A extends string = string> = {
  readonly [from in S]?: { readonly [read in A]?: S };
};

export type DFATransition = {from: string, read: string, to: string};

export interface DFADefinition<S extends string = string, A extends string = string> {
  states: Iterable<S>;
  alphabet: Iterable<A>;
  table: TransitionTable<S, A>;
  startState: S;
  acceptStates: Iterable<S>;
}

export let StringArraySchema = (transformer: (value: unknown) => string[]) =>
  yup
    .array(yup.string().defined())
    // array.ensure does not split scalars
    .transform((_value, originalValue) => transformer(originalValue));

export let DFATransitionSchema = yup.object({
  from: yup.string().defined(),
  read: yup.string().defined(),
  to: yup.string().defined(),
});

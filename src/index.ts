export { default as DFA, type DFAOptions } from './DFA';
export {
  default as ModThree,
  type BinaryDigit,
  compileModThree,
  MOD_THREE_DEFINITION,
  type ModThreeOptions,
  type Remainder,
  REMAINDERS,
  type RemainderState,
} from './ModThree';
export * from './errors';
export { createLogger, type Logger, type LoggerOptions, type LogSink, silentLogger } from './logger';
export { parseDefinition, type ParsedDefinition } from './parser';
export { attempt, type Result } from './result';
export { loadSettings, LOG_LEVELS, type LogLevel, type Settings } from './settings';
export type { DFADefinition, DFATransition, TransitionTable } from './TransitionSpec';

export * from './symbols';
export * from './errors';
export { Config, DEFAULT_LABEL_PREFIX, loadConfig } from './config';
export { IHaveDebugStr, colors, log, logger, useColors } from './debug';
export { StateSet, HashMap } from './sets';
export { DFA, DFADefinition, DFATransition } from './automata/dfa';
export { NFA, NFADefinition, NFAKind, NFATransition } from './automata/nfa';
export {
  PDADefinition,
  PDATransition,
  PushdownAutomaton,
  StackSymbol,
  formatPush,
} from './automata/pda';
export {
  epsilonClosure,
  epsilonClosures,
  multiEpsilonClosure,
} from './automata/epsilon-closure';
export {
  DEFAULT_MAX_DFA_STATES,
  SubsetConstruction,
  SubsetConstructionOptions,
  move,
  subsetConstruction,
} from './automata/subset-construction';
export {
  Halt,
  SimulationResult,
  acceptsNFA,
  simulate,
  splitInput,
} from './automata/simulate';
export * from './grammar/grammar';
export * from './grammar/convert';
export * from './input/records';
export * from './graph/describe';
export { toDot } from './graph/dot';
export * from './commands';

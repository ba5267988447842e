/**
 * Subset construction of a DFA (Deterministic Finite Automaton) from an NFA
 * (Nondeterministic Finite Automaton), following Algorithm 3.20 of the
 * dragon book (p. 153).
 *
 * Every DFA state stands for the set of NFA states ("composite state") the
 * NFA could simultaneously be in. Composite states are labeled in the order
 * they are first discovered by a breadth first worklist, so the same NFA
 * always yields the same DFA.
 */

import { err, ok, Result } from 'neverthrow';
import { DEFAULT_LABEL_PREFIX } from '../config';
import { log } from '../debug';
import { AutomatonError, expectValid } from '../errors';
import { HashMap, StateSet } from '../sets';
import { InputSymbol, State } from '../symbols';
import { DFA, DFATransition } from './dfa';
import { epsilonClosures, multiEpsilonClosure } from './epsilon-closure';
import { NFA } from './nfa';

/**
 * Default bound on the number of composite states.
 */
export const DEFAULT_MAX_DFA_STATES = 10_000;

export interface SubsetConstructionOptions {
  /**
   * Labels of the DFA states are this prefix followed by the discovery index.
   * @defaultValue "D"
   */
  labelPrefix?: string;
  /**
   * Maximum number of composite states before giving up.
   * @defaultValue 10000
   */
  maxStates?: number;
}

export interface SubsetConstruction {
  readonly dfa: DFA;
  /** DFA state label to the NFA states it stands for, in discovery order */
  readonly composites: ReadonlyMap<State, StateSet>;
  /** Epsilon closures that were applied, for an ε-NFA */
  readonly closures?: ReadonlyMap<State, StateSet>;
}

/**
 * move(T,a)
 *
 * Set of NFA states to which there is a transition on input symbol a from
 * some state s in T.
 */
export function move(
  nfa: NFA,
  states: Iterable<State>,
  symbol: InputSymbol
): Set<State> {
  let set: Set<State> = new Set();
  for (const state of states) {
    for (const next of nfa.image(state, symbol)) {
      set.add(next);
    }
  }
  return set;
}

/**
 * Convert an NFA or ε-NFA into an equivalent DFA.
 *
 * The DFA is total: when the empty composite state is reachable it becomes
 * a dead state that moves to itself on every symbol.
 */
export function subsetConstruction(
  nfa: NFA,
  options: SubsetConstructionOptions = {}
): Result<SubsetConstruction, AutomatonError> {
  const labelPrefix = options.labelPrefix ?? DEFAULT_LABEL_PREFIX;
  const maxStates = options.maxStates ?? DEFAULT_MAX_DFA_STATES;

  const closures = nfa.kind == 'enfa' ? epsilonClosures(nfa) : undefined;
  const close = (states: Iterable<State>) =>
    closures
      ? multiEpsilonClosure(nfa, states, closures)
      : new StateSet(states);

  // Interning table from composite state to its label. Anything in here has
  // been queued on the worklist exactly once.
  const labels: HashMap<StateSet, State> = new HashMap((set) => set.hash());
  const composites: Map<State, StateSet> = new Map();
  const worklist: { label: State; set: StateSet }[] = [];
  const transitions: DFATransition[] = [];

  const intern = (set: StateSet): Result<State, AutomatonError> => {
    const existing = labels.get(set);
    if (existing !== undefined) {
      return ok(existing);
    }
    if (composites.size >= maxStates) {
      return err(
        new AutomatonError(
          'StateLimitExceeded',
          `subset construction exceeded the limit of ${maxStates} states`
        )
      );
    }
    const label = `${labelPrefix}${composites.size}`;
    labels.set(set, label);
    composites.set(label, set);
    worklist.push({ label, set });
    log('subset construction: discovered', label, '=', set.toString());
    return ok(label);
  };

  const start = intern(close([nfa.start]));
  if (start.isErr()) {
    return err(start.error);
  }

  // Breadth first: the worklist only grows at the end.
  for (let i = 0; i < worklist.length; i++) {
    const { label: from, set } = worklist[i];
    for (const symbol of nfa.alphabet) {
      const to = intern(close(move(nfa, set, symbol)));
      if (to.isErr()) {
        return err(to.error);
      }
      transitions.push({ from, symbol, to: to.value });
    }
  }

  const accepting: State[] = [];
  for (const [label, set] of composites.entries()) {
    if (set.some((s) => nfa.isAccepting(s))) {
      accepting.push(label);
    }
  }

  const dfa = expectValid(
    DFA.create({
      states: [...composites.keys()],
      alphabet: nfa.alphabet,
      transitions,
      start: start.value,
      accepting,
    })
  );
  return ok({ dfa, composites, closures });
}

import { log } from '../debug';
import { InputSymbol, State } from '../symbols';
import { DFA } from './dfa';
import { multiEpsilonClosure } from './epsilon-closure';
import { move } from './subset-construction';
import { NFA } from './nfa';

/**
 * Why a run stopped.
 *
 * `UndefinedTransition` is an ordinary rejection: the DFA has no entry for
 * the next symbol, so the rest of the input is never read.
 */
export type Halt =
  | { readonly kind: 'Consumed'; readonly state: State }
  | {
      readonly kind: 'UndefinedTransition';
      readonly state: State;
      readonly symbol: InputSymbol;
      /** Index of the symbol in the input */
      readonly position: number;
    };

export interface SimulationResult {
  readonly accepted: boolean;
  /** Visited states, starting with the start state */
  readonly path: readonly State[];
  /** The symbols that were read, one per step of the path */
  readonly consumed: readonly InputSymbol[];
  readonly halt: Halt;
}

/**
 * Run a DFA over the input, recording every state it passes through.
 *
 * A missing transition ends the run at the last state reached. No dead state
 * is synthesized here; a partial DFA simply rejects.
 */
export function simulate(
  dfa: DFA,
  input: readonly InputSymbol[]
): SimulationResult {
  let current = dfa.start;
  const path: State[] = [current];
  for (const [position, symbol] of input.entries()) {
    const next = dfa.next(current, symbol);
    if (next === undefined) {
      log('simulate: no transition from', current, 'on', symbol);
      return {
        accepted: false,
        path,
        consumed: input.slice(0, position),
        halt: { kind: 'UndefinedTransition', state: current, symbol, position },
      };
    }
    current = next;
    path.push(current);
  }
  const accepted = dfa.isAccepting(current);
  log('simulate:', path.join(' -> '), accepted ? 'accepted' : 'rejected');
  return {
    accepted,
    path,
    consumed: [...input],
    halt: { kind: 'Consumed', state: current },
  };
}

/**
 * Whether some run of the NFA (or ε-NFA) over the input ends in an accepting
 * state.
 */
export function acceptsNFA(nfa: NFA, input: readonly InputSymbol[]): boolean {
  const close = (states: Iterable<State>) =>
    nfa.kind == 'enfa' ? multiEpsilonClosure(nfa, states) : new Set(states);
  let current = close([nfa.start]);
  for (const symbol of input) {
    current = close(move(nfa, current, symbol));
    if (current.size == 0) {
      return false;
    }
  }
  for (const state of current) {
    if (nfa.isAccepting(state)) {
      return true;
    }
  }
  return false;
}

/**
 * Split a typed string into alphabet symbols.
 *
 * Text containing commas or spaces is a separated list. Otherwise the longest
 * declared symbol at each position is taken; a character that starts no
 * symbol becomes a symbol of its own, which a DFA will then reject.
 */
export function splitInput(
  alphabet: readonly InputSymbol[],
  text: string
): InputSymbol[] {
  const trimmed = text.trim();
  if (trimmed.length == 0) {
    return [];
  }
  if (/[\s,]/.test(trimmed)) {
    return trimmed.split(/[\s,]+/).filter((s) => s.length > 0);
  }
  const bySize = [...alphabet].sort((a, b) => b.length - a.length);
  const symbols: InputSymbol[] = [];
  let i = 0;
  while (i < trimmed.length) {
    const symbol =
      bySize.find((s) => s.length > 0 && trimmed.startsWith(s, i)) ??
      trimmed.charAt(i);
    symbols.push(symbol);
    i += symbol.length;
  }
  return symbols;
}

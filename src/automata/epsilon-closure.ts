/**
 * e-closure(s)
 *
 * "Set of NFA states reachable from NFA state s on epsilon transitions
 * alone." The closure of a state always contains the state itself.
 */

import { log } from '../debug';
import { StateSet } from '../sets';
import { EPSILON, State } from '../symbols';
import { NFA } from './nfa';

/**
 * Depth first traversal of the epsilon edges leaving `state`. Each state is
 * pushed at most once, so epsilon cycles terminate.
 */
export function epsilonClosure(nfa: NFA, state: State): StateSet {
  let visited: Set<State> = new Set([state]);
  let stack: State[] = [state];
  for (
    let current = stack.pop();
    current !== undefined;
    current = stack.pop()
  ) {
    for (const next of nfa.image(current, EPSILON)) {
      if (!visited.has(next)) {
        visited.add(next);
        stack.push(next);
      }
    }
  }
  return new StateSet(visited);
}

/**
 * The closure of every state of the automaton, in declaration order.
 */
export function epsilonClosures(nfa: NFA): ReadonlyMap<State, StateSet> {
  const closures: Map<State, StateSet> = new Map();
  for (const state of nfa.states) {
    const closure = epsilonClosure(nfa, state);
    log('e-closure', state, '=', closure.toString());
    closures.set(state, closure);
  }
  return closures;
}

/**
 * e-closure(T)
 *
 * Union of the closures of every state in T. Uses precomputed closures when
 * given.
 */
export function multiEpsilonClosure(
  nfa: NFA,
  states: Iterable<State>,
  closures?: ReadonlyMap<State, StateSet>
): StateSet {
  let closure: Set<State> = new Set();
  for (const state of states) {
    const reachable = closures?.get(state) ?? epsilonClosure(nfa, state);
    for (const member of reachable) {
      closure.add(member);
    }
  }
  return new StateSet(closure);
}

/**
 * Conversions between right-linear grammars and DFAs.
 *
 * A variable corresponds to a state and `V → a W` to the transition
 * (V, a) → W. `V → ε` makes V accepting. A terminal-only production `V → a`
 * moves to one shared accepting state that has no outgoing transitions.
 */

import { err, Result } from 'neverthrow';
import { DFA, DFATransition } from '../automata/dfa';
import { log } from '../debug';
import { AutomatonError, malformedInput } from '../errors';
import { EPSILON, Label, State } from '../symbols';
import {
  GrammarDefinition,
  RegularGrammar,
  Terminal,
  Variable,
} from './grammar';

/**
 * Base name of the accepting state that terminal-only productions move to.
 */
export const FINAL_STATE = 'F';

/**
 * `base`, or `base` followed by the smallest number that is not taken.
 */
export function freshName(base: string, taken: ReadonlySet<string>): string {
  if (!taken.has(base)) {
    return base;
  }
  let i = 1;
  while (taken.has(`${base}${i}`)) {
    i++;
  }
  return `${base}${i}`;
}

/**
 * The first variable, reachable or not, with two productions that start with
 * the same terminal.
 */
function findNondeterminism(
  grammar: RegularGrammar
): AutomatonError | undefined {
  for (const variable of grammar.variables) {
    const seen: Set<Terminal> = new Set();
    for (const { body } of grammar.productionsFrom(variable)) {
      if (body.kind == 'epsilon') {
        continue;
      }
      if (seen.has(body.terminal)) {
        return new AutomatonError(
          'NonDeterministicGrammar',
          `variable "${variable}" has more than one production starting with "${body.terminal}"`,
          { field: 'productions' }
        );
      }
      seen.add(body.terminal);
    }
  }
  return undefined;
}

/**
 * Build the DFA of a deterministic right-linear grammar.
 *
 * Only variables reachable from the start variable become states. The
 * result may be partial: a variable without a production for some terminal
 * has no transition on it.
 */
export function grammarToDFA(
  grammar: RegularGrammar
): Result<DFA, AutomatonError> {
  const nondeterminism = findNondeterminism(grammar);
  if (nondeterminism) {
    return err(nondeterminism);
  }

  const finalState = freshName(FINAL_STATE, new Set(grammar.variables));
  let usesFinalState = false;

  const visited: Set<Variable> = new Set([grammar.start]);
  const worklist: Variable[] = [grammar.start];
  const transitions: DFATransition[] = [];
  const accepting: State[] = [];

  for (let i = 0; i < worklist.length; i++) {
    const variable = worklist[i];
    for (const { body } of grammar.productionsFrom(variable)) {
      if (body.kind == 'epsilon') {
        accepting.push(variable);
        continue;
      }
      if (body.kind == 'terminal') {
        usesFinalState = true;
        transitions.push({
          from: variable,
          symbol: body.terminal,
          to: finalState,
        });
      } else {
        transitions.push({
          from: variable,
          symbol: body.terminal,
          to: body.variable,
        });
        if (!visited.has(body.variable)) {
          visited.add(body.variable);
          worklist.push(body.variable);
        }
      }
    }
  }

  const states = [...worklist];
  if (usesFinalState) {
    states.push(finalState);
    accepting.push(finalState);
  }
  log(
    'grammar to dfa: states',
    states.join(','),
    'accepting',
    accepting.join(',')
  );

  return DFA.create({
    states,
    alphabet: grammar.terminals,
    transitions,
    start: grammar.start,
    accepting,
  });
}

function bodiesOf(dfa: DFA, state: State): Label[][] {
  const bodies: Label[][] = [];
  for (const symbol of dfa.alphabet) {
    const next = dfa.next(state, symbol);
    if (next !== undefined) {
      bodies.push([symbol, next]);
    }
  }
  if (dfa.isAccepting(state)) {
    bodies.push([EPSILON]);
  }
  return bodies;
}

/**
 * Read a DFA as a right-linear grammar: (S, a) → T becomes `S → a T` and an
 * accepting S also gets `S → ε`. Productions follow state and then alphabet
 * order, with the empty production last.
 */
export function dfaToGrammar(dfa: DFA): Result<RegularGrammar, AutomatonError> {
  const clash = dfa.states.find((s) => dfa.alphabet.includes(s));
  if (clash !== undefined) {
    return err(
      malformedInput(
        `state "${clash}" has the same name as a symbol and cannot become a variable`,
        { field: 'states' }
      )
    );
  }

  const productions: GrammarDefinition['productions'] = dfa.states.map(
    (state) => ({ variable: state, bodies: bodiesOf(dfa, state) })
  );

  const grammar = RegularGrammar.create({
    variables: dfa.states,
    terminals: dfa.alphabet,
    productions,
    start: dfa.start,
  });
  if (grammar.isOk()) {
    log('dfa to grammar:\n' + grammar.value.toDebugStr());
  }
  return grammar;
}

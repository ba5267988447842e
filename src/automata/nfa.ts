import { err, ok, Result } from 'neverthrow';
import { TextTable } from '../data-structures/table';
import { IHaveDebugStr } from '../debug';
import { AutomatonError, malformedInput } from '../errors';
import {
  displayLabel,
  EPSILON,
  InputSymbol,
  isEpsilon,
  Label,
  State,
} from '../symbols';
import { declareNames, requireAllDeclared, requireDeclared } from './validate';

/**
 * `nfa` forbids epsilon transitions, `enfa` allows them.
 */
export type NFAKind = 'nfa' | 'enfa';

export interface NFATransition {
  readonly from: State;
  readonly symbol: Label;
  readonly to: readonly State[];
}

/**
 * Unvalidated description of an NFA or ε-NFA, as read from an input record.
 */
export interface NFADefinition {
  readonly states: readonly State[];
  readonly alphabet: readonly InputSymbol[];
  readonly transitions: readonly (NFATransition & { readonly line?: number })[];
  readonly start: State;
  readonly accepting: readonly State[];
}

const NO_STATES: readonly State[] = [];

/**
 * A nondeterministic finite automaton, optionally with epsilon transitions.
 *
 * Entries for the same (state, label) pair are merged, and a transition may
 * have no destinations at all.
 */
export class NFA implements IHaveDebugStr {
  readonly kind: NFAKind;
  readonly states: readonly State[];
  readonly alphabet: readonly InputSymbol[];
  readonly start: State;
  readonly accepting: ReadonlySet<State>;
  private readonly delta: ReadonlyMap<
    State,
    ReadonlyMap<Label, readonly State[]>
  >;

  private constructor(
    kind: NFAKind,
    states: readonly State[],
    alphabet: readonly InputSymbol[],
    delta: ReadonlyMap<State, ReadonlyMap<Label, readonly State[]>>,
    start: State,
    accepting: ReadonlySet<State>
  ) {
    this.kind = kind;
    this.states = states;
    this.alphabet = alphabet;
    this.delta = delta;
    this.start = start;
    this.accepting = accepting;
  }

  static create(
    definition: NFADefinition,
    kind: NFAKind = 'nfa'
  ): Result<NFA, AutomatonError> {
    const states = declareNames(definition.states, {
      what: 'state',
      field: 'states',
    });
    if (states.isErr()) {
      return err(states.error);
    }
    const alphabet = declareNames(definition.alphabet, {
      what: 'symbol',
      field: 'alphabet',
      symbols: true,
    });
    if (alphabet.isErr()) {
      return err(alphabet.error);
    }

    const delta: Map<State, Map<Label, State[]>> = new Map();
    for (const state of definition.states) {
      delta.set(state, new Map());
    }
    for (const [i, t] of definition.transitions.entries()) {
      const context = { field: 'transitions', line: t.line ?? i + 1 };
      const { symbol } = t;
      if (isEpsilon(symbol)) {
        if (kind == 'nfa') {
          return err(
            malformedInput(
              'epsilon transitions are only allowed in an ε-NFA',
              context
            )
          );
        }
      } else {
        const checked = requireDeclared(
          symbol,
          alphabet.value,
          'symbol',
          context
        );
        if (checked.isErr()) {
          return err(checked.error);
        }
      }
      const from = requireDeclared(t.from, states.value, 'state', context);
      if (from.isErr()) {
        return err(from.error);
      }
      const row = delta.get(t.from);
      if (!row) {
        throw new Error(`Invariant violation: no row for state ${t.from}`);
      }
      const targets = row.get(symbol) ?? [];
      for (const to of t.to) {
        const checked = requireDeclared(to, states.value, 'state', context);
        if (checked.isErr()) {
          return err(checked.error);
        }
        if (!targets.includes(to)) {
          targets.push(to);
        }
      }
      row.set(symbol, targets);
    }

    const start = requireDeclared(definition.start, states.value, 'state', {
      field: 'start',
    });
    if (start.isErr()) {
      return err(start.error);
    }
    const accepting = requireAllDeclared(
      definition.accepting,
      states.value,
      'state',
      'accepting'
    );
    if (accepting.isErr()) {
      return err(accepting.error);
    }

    return ok(
      new NFA(
        kind,
        [...definition.states],
        [...definition.alphabet],
        delta,
        start.value,
        accepting.value
      )
    );
  }

  /**
   * Every state reachable from `state` along one edge labeled `label`.
   */
  image(state: State, label: Label): readonly State[] {
    return this.delta.get(state)?.get(label) ?? NO_STATES;
  }

  isAccepting(state: State): boolean {
    return this.accepting.has(state);
  }

  /**
   * The labels edges may carry: the alphabet, then epsilon for an ε-NFA.
   */
  labels(): Label[] {
    return this.kind == 'enfa'
      ? [...this.alphabet, EPSILON]
      : [...this.alphabet];
  }

  /**
   * All transitions with at least one destination, ordered by state and
   * then label.
   */
  transitions(): NFATransition[] {
    const out: NFATransition[] = [];
    for (const from of this.states) {
      for (const symbol of this.labels()) {
        const to = this.image(from, symbol);
        if (to.length > 0) {
          out.push({ from, symbol, to });
        }
      }
    }
    return out;
  }

  toDefinition(): NFADefinition {
    return {
      states: this.states,
      alphabet: this.alphabet,
      transitions: this.transitions(),
      start: this.start,
      accepting: this.states.filter((s) => this.isAccepting(s)),
    };
  }

  private stateLabel(state: State) {
    let out = state;
    if (this.isAccepting(state)) {
      out = '*' + out;
    }
    if (state == this.start) {
      out = '>' + out;
    }
    return out;
  }

  toDebugStr(): string {
    const labels = this.labels();
    const table = new TextTable(['δ', ...labels.map(displayLabel)]);
    for (const state of this.states) {
      table.addRow([
        this.stateLabel(state) + ':',
        ...labels.map((label) => {
          const next = this.image(state, label);
          return next.length ? next.join(',') : '∅';
        }),
      ]);
    }
    return table.toDebugStr();
  }
}

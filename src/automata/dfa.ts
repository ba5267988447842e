import { err, ok, Result } from 'neverthrow';
import { TextTable } from '../data-structures/table';
import { IHaveDebugStr } from '../debug';
import { AutomatonError, malformedInput } from '../errors';
import { InputSymbol, isEpsilon, Label, State } from '../symbols';
import { declareNames, requireAllDeclared, requireDeclared } from './validate';

export interface DFATransition {
  readonly from: State;
  readonly symbol: InputSymbol;
  readonly to: State;
}

/**
 * Unvalidated description of a DFA, as read from an input record.
 */
export interface DFADefinition {
  readonly states: readonly State[];
  readonly alphabet: readonly InputSymbol[];
  readonly transitions: readonly {
    readonly from: State;
    readonly symbol: Label;
    readonly to: State;
    /** 1-based entry number in the source record */
    readonly line?: number;
  }[];
  readonly start: State;
  readonly accepting: readonly State[];
}

/**
 * A deterministic finite automaton.
 *
 * The transition function may be partial: a (state, symbol) pair without an
 * entry rejects. Instances are immutable and only built through
 * {@link DFA.create}, so every reference in them is declared.
 */
export class DFA implements IHaveDebugStr {
  readonly kind = 'dfa' as const;
  readonly states: readonly State[];
  readonly alphabet: readonly InputSymbol[];
  readonly start: State;
  readonly accepting: ReadonlySet<State>;
  private readonly delta: ReadonlyMap<State, ReadonlyMap<InputSymbol, State>>;

  private constructor(
    states: readonly State[],
    alphabet: readonly InputSymbol[],
    delta: ReadonlyMap<State, ReadonlyMap<InputSymbol, State>>,
    start: State,
    accepting: ReadonlySet<State>
  ) {
    this.states = states;
    this.alphabet = alphabet;
    this.delta = delta;
    this.start = start;
    this.accepting = accepting;
  }

  static create(definition: DFADefinition): Result<DFA, AutomatonError> {
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

    const delta: Map<State, Map<InputSymbol, State>> = new Map();
    for (const state of definition.states) {
      delta.set(state, new Map());
    }
    for (const [i, t] of definition.transitions.entries()) {
      const context = { field: 'transitions', line: t.line ?? i + 1 };
      const { symbol } = t;
      if (isEpsilon(symbol)) {
        return err(
          malformedInput('a DFA cannot have epsilon transitions', context)
        );
      }
      const checked = requireDeclared(t.from, states.value, 'state', context)
        .andThen(() =>
          requireDeclared(symbol, alphabet.value, 'symbol', context)
        )
        .andThen(() => requireDeclared(t.to, states.value, 'state', context));
      if (checked.isErr()) {
        return err(checked.error);
      }
      const row = delta.get(t.from);
      const existing = row?.get(symbol);
      if (existing !== undefined && existing !== t.to) {
        return err(
          malformedInput(
            `state "${t.from}" already moves to "${existing}" on "${symbol}"`,
            context
          )
        );
      }
      row?.set(symbol, t.to);
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
      new DFA(
        [...definition.states],
        [...definition.alphabet],
        delta,
        start.value,
        accepting.value
      )
    );
  }

  /**
   * The state reached from `state` on `symbol`, if the transition is defined.
   */
  next(state: State, symbol: InputSymbol): State | undefined {
    return this.delta.get(state)?.get(symbol);
  }

  isAccepting(state: State): boolean {
    return this.accepting.has(state);
  }

  /**
   * All transitions, ordered by state and then alphabet declaration.
   */
  transitions(): DFATransition[] {
    const out: DFATransition[] = [];
    for (const from of this.states) {
      for (const symbol of this.alphabet) {
        const to = this.next(from, symbol);
        if (to !== undefined) {
          out.push({ from, symbol, to });
        }
      }
    }
    return out;
  }

  /**
   * Whether every (state, symbol) pair has a transition.
   */
  isTotal(): boolean {
    return (
      this.transitions().length == this.states.length * this.alphabet.length
    );
  }

  toDefinition(): DFADefinition {
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
    const table = new TextTable(['δ', ...this.alphabet]);
    for (const state of this.states) {
      table.addRow([
        this.stateLabel(state) + ':',
        ...this.alphabet.map((symbol) => this.next(state, symbol) ?? '-'),
      ]);
    }
    return table.toDebugStr();
  }
}

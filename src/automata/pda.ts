import { err, ok, Result } from 'neverthrow';
import { IHaveDebugStr } from '../debug';
import { AutomatonError } from '../errors';
import {
  displayLabel,
  EPSILON_GLYPH,
  InputSymbol,
  isEpsilon,
  Label,
  State,
} from '../symbols';
import {
  declareNames,
  firstError,
  requireAllDeclared,
  requireDeclared,
} from './validate';

export type StackSymbol = string;

export interface PDATransition {
  readonly from: State;
  readonly input: Label;
  /** Symbol popped from the top of the stack */
  readonly stackTop: StackSymbol;
  readonly to: State;
  /** Symbols pushed in its place, leftmost ends up on top; empty pops */
  readonly push: readonly StackSymbol[];
}

export interface PDADefinition {
  readonly states: readonly State[];
  readonly inputAlphabet: readonly InputSymbol[];
  readonly stackAlphabet: readonly StackSymbol[];
  readonly transitions: readonly (PDATransition & { readonly line?: number })[];
  readonly start: State;
  readonly initialStack: StackSymbol;
  readonly accepting: readonly State[];
}

/**
 * A pushdown automaton. It is checked for consistency and can be described
 * and printed, but it is never run.
 */
export class PushdownAutomaton implements IHaveDebugStr {
  readonly kind = 'pda' as const;
  readonly states: readonly State[];
  readonly inputAlphabet: readonly InputSymbol[];
  readonly stackAlphabet: readonly StackSymbol[];
  readonly start: State;
  readonly initialStack: StackSymbol;
  readonly accepting: ReadonlySet<State>;
  private readonly delta: readonly PDATransition[];

  private constructor(
    definition: PDADefinition,
    delta: readonly PDATransition[],
    accepting: ReadonlySet<State>
  ) {
    this.states = [...definition.states];
    this.inputAlphabet = [...definition.inputAlphabet];
    this.stackAlphabet = [...definition.stackAlphabet];
    this.start = definition.start;
    this.initialStack = definition.initialStack;
    this.delta = delta;
    this.accepting = accepting;
  }

  static create(
    definition: PDADefinition
  ): Result<PushdownAutomaton, AutomatonError> {
    const states = declareNames(definition.states, {
      what: 'state',
      field: 'states',
    });
    if (states.isErr()) {
      return err(states.error);
    }
    const inputAlphabet = declareNames(definition.inputAlphabet, {
      what: 'input symbol',
      field: 'inputAlphabet',
      symbols: true,
    });
    if (inputAlphabet.isErr()) {
      return err(inputAlphabet.error);
    }
    const stackAlphabet = declareNames(definition.stackAlphabet, {
      what: 'stack symbol',
      field: 'stackAlphabet',
      symbols: true,
    });
    if (stackAlphabet.isErr()) {
      return err(stackAlphabet.error);
    }

    const delta: PDATransition[] = [];
    const seen: Set<string> = new Set();
    for (const [i, t] of definition.transitions.entries()) {
      const context = { field: 'transitions', line: t.line ?? i + 1 };
      const { input } = t;
      const failed = firstError([
        requireDeclared(t.from, states.value, 'state', context),
        isEpsilon(input)
          ? ok(input)
          : requireDeclared(
              input,
              inputAlphabet.value,
              'input symbol',
              context
            ),
        requireDeclared(
          t.stackTop,
          stackAlphabet.value,
          'stack symbol',
          context
        ),
        requireDeclared(t.to, states.value, 'state', context),
        ...t.push.map((symbol) =>
          requireDeclared(symbol, stackAlphabet.value, 'stack symbol', context)
        ),
      ]);
      if (failed) {
        return err(failed);
      }
      const key = JSON.stringify([
        t.from,
        isEpsilon(input) ? null : input,
        t.stackTop,
        t.to,
        t.push,
      ]);
      if (!seen.has(key)) {
        seen.add(key);
        delta.push({
          from: t.from,
          input,
          stackTop: t.stackTop,
          to: t.to,
          push: [...t.push],
        });
      }
    }

    const start = requireDeclared(definition.start, states.value, 'state', {
      field: 'start',
    });
    if (start.isErr()) {
      return err(start.error);
    }
    const initialStack = requireDeclared(
      definition.initialStack,
      stackAlphabet.value,
      'stack symbol',
      { field: 'initialStack' }
    );
    if (initialStack.isErr()) {
      return err(initialStack.error);
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

    return ok(new PushdownAutomaton(definition, delta, accepting.value));
  }

  isAccepting(state: State): boolean {
    return this.accepting.has(state);
  }

  /**
   * The moves available in `state` reading `input` with `stackTop` on top.
   */
  moves(state: State, input: Label, stackTop: StackSymbol): PDATransition[] {
    return this.delta.filter(
      (t) => t.from == state && t.input === input && t.stackTop == stackTop
    );
  }

  /**
   * All transitions in the order they were declared, without duplicates.
   */
  transitions(): readonly PDATransition[] {
    return this.delta;
  }

  toDebugStr(): string {
    return this.delta
      .map(
        (t) =>
          `δ(${t.from}, ${displayLabel(t.input)}, ${t.stackTop}) ∋ (${t.to}, ${formatPush(t.push)})`
      )
      .join('\n');
  }
}

/**
 * Push sequences print as their symbols run together, or ε when empty.
 */
export function formatPush(push: readonly StackSymbol[]): string {
  return push.length ? push.join('') : EPSILON_GLYPH;
}

import { err, ok, Result } from 'neverthrow';
import { declareNames, requireDeclared } from '../automata/validate';
import { colors, IHaveDebugStr } from '../debug';
import {
  AutomatonError,
  malformedInput,
  undeclaredReference,
} from '../errors';
import { EPSILON_GLYPH, isEpsilon, Label, State } from '../symbols';

export type Variable = State;
export type Terminal = string;

/**
 * Right hand side of a right-linear production: empty, one terminal, or one
 * terminal followed by one variable.
 */
export type ProductionBody =
  | { readonly kind: 'epsilon' }
  | { readonly kind: 'terminal'; readonly terminal: Terminal }
  | {
      readonly kind: 'step';
      readonly terminal: Terminal;
      readonly variable: Variable;
    };

export class Production {
  readonly variable: Variable;
  readonly body: ProductionBody;
  constructor(variable: Variable, body: ProductionBody) {
    this.variable = variable;
    this.body = body;
  }

  /**
   * The terminal a non-empty body starts with.
   */
  leadingTerminal(): Terminal | undefined {
    return this.body.kind == 'epsilon' ? undefined : this.body.terminal;
  }

  equals(other: Production): boolean {
    return (
      this.variable == other.variable &&
      formatBody(this.body) == formatBody(other.body)
    );
  }

  toString(): string {
    return `${colors.red(this.variable)} → ${formatBody(this.body)}`;
  }
}

export function formatBody(body: ProductionBody): string {
  switch (body.kind) {
    case 'epsilon':
      return EPSILON_GLYPH;
    case 'terminal':
      return body.terminal;
    case 'step':
      return `${body.terminal} ${body.variable}`;
  }
}

/**
 * Unvalidated grammar. Each entry lists bodies for one variable; a body is
 * its symbols in order, with `[]` or `[EPSILON]` for the empty body.
 */
export interface GrammarDefinition {
  readonly variables: readonly Variable[];
  readonly terminals: readonly Terminal[];
  readonly productions: readonly {
    readonly variable: Variable;
    readonly bodies: readonly (readonly Label[])[];
    readonly line?: number;
  }[];
  readonly start: Variable;
}

/**
 * A right-linear regular grammar.
 *
 * Productions of a variable keep the order they were declared in; the
 * conversions read them in that order.
 */
export class RegularGrammar implements IHaveDebugStr {
  readonly kind = 'grammar' as const;
  readonly variables: readonly Variable[];
  readonly terminals: readonly Terminal[];
  readonly start: Variable;
  private readonly productionMap: ReadonlyMap<Variable, readonly Production[]>;

  private constructor(
    variables: readonly Variable[],
    terminals: readonly Terminal[],
    productionMap: ReadonlyMap<Variable, readonly Production[]>,
    start: Variable
  ) {
    this.variables = variables;
    this.terminals = terminals;
    this.productionMap = productionMap;
    this.start = start;
  }

  static create(
    definition: GrammarDefinition
  ): Result<RegularGrammar, AutomatonError> {
    const variables = declareNames(definition.variables, {
      what: 'variable',
      field: 'variables',
      symbols: true,
    });
    if (variables.isErr()) {
      return err(variables.error);
    }
    const terminals = declareNames(definition.terminals, {
      what: 'terminal',
      field: 'terminals',
      symbols: true,
    });
    if (terminals.isErr()) {
      return err(terminals.error);
    }
    const shared = definition.terminals.find((t) => variables.value.has(t));
    if (shared !== undefined) {
      return err(
        malformedInput(
          `"${shared}" is declared as both a variable and a terminal`,
          { field: 'terminals' }
        )
      );
    }

    const productionMap: Map<Variable, Production[]> = new Map();
    for (const variable of definition.variables) {
      productionMap.set(variable, []);
    }
    for (const [i, entry] of definition.productions.entries()) {
      const context = { field: 'productions', line: entry.line ?? i + 1 };
      const head = requireDeclared(
        entry.variable,
        variables.value,
        'variable',
        context
      );
      if (head.isErr()) {
        return err(head.error);
      }
      const list = productionMap.get(entry.variable) ?? [];
      for (const symbols of entry.bodies) {
        const body = toBody(symbols, variables.value, terminals.value, context);
        if (body.isErr()) {
          return err(body.error);
        }
        const production = new Production(entry.variable, body.value);
        if (!list.some((p) => p.equals(production))) {
          list.push(production);
        }
      }
      productionMap.set(entry.variable, list);
    }

    const start = requireDeclared(
      definition.start,
      variables.value,
      'variable',
      { field: 'start' }
    );
    if (start.isErr()) {
      return err(start.error);
    }

    return ok(
      new RegularGrammar(
        [...definition.variables],
        [...definition.terminals],
        productionMap,
        start.value
      )
    );
  }

  productionsFrom(variable: Variable): readonly Production[] {
    return this.productionMap.get(variable) ?? [];
  }

  /**
   * Every production, grouped by variable in declaration order.
   */
  productions(): Production[] {
    return this.variables.flatMap((v) => [...this.productionsFrom(v)]);
  }

  toDefinition(): GrammarDefinition {
    return {
      variables: this.variables,
      terminals: this.terminals,
      productions: this.variables.map((variable) => ({
        variable,
        bodies: this.productionsFrom(variable).map((p) => bodySymbols(p.body)),
      })),
      start: this.start,
    };
  }

  toDebugStr(): string {
    return this.variables
      .filter((v) => this.productionsFrom(v).length > 0)
      .map(
        (v) =>
          `${v} → ${this.productionsFrom(v)
            .map((p) => formatBody(p.body))
            .join(' | ')}`
      )
      .join('\n');
  }
}

function bodySymbols(body: ProductionBody): Label[] {
  switch (body.kind) {
    case 'epsilon':
      return [];
    case 'terminal':
      return [body.terminal];
    case 'step':
      return [body.terminal, body.variable];
  }
}

/**
 * Check the right-linear shape of one body.
 */
function toBody(
  symbols: readonly Label[],
  variables: ReadonlySet<Variable>,
  terminals: ReadonlySet<Terminal>,
  context: { field: string; line: number }
): Result<ProductionBody, AutomatonError> {
  if (symbols.length == 0 || (symbols.length == 1 && isEpsilon(symbols[0]))) {
    return ok({ kind: 'epsilon' });
  }
  const names: string[] = [];
  for (const symbol of symbols) {
    if (isEpsilon(symbol)) {
      return err(
        malformedInput('ε must stand alone in a production body', context)
      );
    }
    if (!variables.has(symbol) && !terminals.has(symbol)) {
      return err(
        undeclaredReference(
          `undeclared symbol "${symbol}" in production body`,
          context
        )
      );
    }
    names.push(symbol);
  }
  const shown = names.join(' ');
  const terminal = names[0];
  if (names.length > 2 || !terminals.has(terminal)) {
    return err(
      malformedInput(
        `"${shown}" is not right-linear: expected a terminal optionally followed by a variable`,
        context
      )
    );
  }
  if (names.length == 1) {
    return ok({ kind: 'terminal', terminal });
  }
  const variable = names[1];
  if (!variables.has(variable)) {
    return err(
      malformedInput(`"${shown}" is not right-linear: "${variable}" is not a variable`, context)
    );
  }
  return ok({ kind: 'step', terminal, variable });
}

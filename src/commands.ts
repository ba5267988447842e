/**
 * What each command line command does, independent of argument parsing.
 *
 * A command takes a record (an object of string fields, read from a JSON
 * file or from flags), builds the model, runs one algorithm over it and
 * renders the result.
 */

import { err, ok, Result } from 'neverthrow';
import { DFA } from './automata/dfa';
import { simulate, SimulationResult, splitInput } from './automata/simulate';
import { subsetConstruction } from './automata/subset-construction';
import { colors } from './debug';
import { AutomatonError } from './errors';
import { dfaToGrammar, grammarToDFA } from './grammar/convert';
import {
  describeDFA,
  describeGrammar,
  describeNFA,
  describePDA,
  describeSimulation,
  describeSubsetConstruction,
  GraphDescription,
} from './graph/describe';
import { toDot } from './graph/dot';
import {
  parseDFA,
  parseEpsilonNFA,
  parseGrammar,
  parseNFA,
  parsePDA,
  toAutomatonRecord,
  toGrammarRecord,
  toPDARecord,
} from './input/records';

export type CommandName =
  | 'dfa'
  | 'nfa'
  | 'enfa'
  | 'grammar'
  | 'pda'
  | 'dfa-to-grammar';

export type OutputFormat = 'json' | 'dot' | 'table';
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'dot', 'table'];

export interface CommandOptions {
  readonly format: OutputFormat;
  /** Text to run the resulting DFA on */
  readonly input?: string;
  readonly labelPrefix?: string;
}

/**
 * One part of a command's output: a graph, and the same thing as text for
 * the table format.
 */
export interface Section {
  readonly name: string;
  readonly graph: GraphDescription;
  readonly table: string;
}

export function formatSimulation(result: SimulationResult): string {
  const lines = [
    `path: ${result.path.join(' -> ')}`,
    `symbols: ${result.consumed.join(' ')}`,
  ];
  if (result.halt.kind == 'UndefinedTransition') {
    const { state, symbol, position } = result.halt;
    lines.push(
      `halted: no transition from ${state} on "${symbol}" at position ${position}`
    );
  }
  lines.push(
    result.accepted ? colors.green('accepted') : colors.red('rejected')
  );
  return lines.join('\n');
}

function withSimulation(
  dfa: DFA,
  sections: Section[],
  input: string | undefined
): Section[] {
  if (input === undefined) {
    return sections;
  }
  const result = simulate(dfa, splitInput(dfa.alphabet, input));
  return [
    ...sections,
    {
      name: 'simulation',
      graph: describeSimulation(dfa, result),
      table: formatSimulation(result),
    },
  ];
}

function dfaCommand(
  value: unknown,
  options: CommandOptions
): Result<Section[], AutomatonError> {
  return toAutomatonRecord(value)
    .andThen(parseDFA)
    .map((dfa) =>
      withSimulation(
        dfa,
        [{ name: 'dfa', graph: describeDFA(dfa), table: dfa.toDebugStr() }],
        options.input
      )
    );
}

function nfaCommand(
  value: unknown,
  epsilon: boolean,
  options: CommandOptions
): Result<Section[], AutomatonError> {
  const parse = epsilon ? parseEpsilonNFA : parseNFA;
  return toAutomatonRecord(value)
    .andThen(parse)
    .andThen((nfa) =>
      subsetConstruction(nfa, { labelPrefix: options.labelPrefix }).map(
        (construction) => {
          const { dfa, composites } = construction;
          const legend = [...composites.entries()].map(
            ([label, set]) => `${label} = ${set}`
          );
          return withSimulation(
            dfa,
            [
              {
                name: nfa.kind,
                graph: describeNFA(nfa),
                table: nfa.toDebugStr(),
              },
              {
                name: 'dfa',
                graph: describeSubsetConstruction(construction),
                table: dfa.toDebugStr() + legend.join('\n'),
              },
            ],
            options.input
          );
        }
      )
    );
}

function grammarCommand(
  value: unknown,
  options: CommandOptions
): Result<Section[], AutomatonError> {
  return toGrammarRecord(value)
    .andThen(parseGrammar)
    .andThen((grammar) =>
      grammarToDFA(grammar).map((dfa) =>
        withSimulation(
          dfa,
          [
            {
              name: 'grammar',
              graph: describeGrammar(grammar),
              table: grammar.toDebugStr(),
            },
            { name: 'dfa', graph: describeDFA(dfa), table: dfa.toDebugStr() },
          ],
          options.input
        )
      )
    );
}

function pdaCommand(value: unknown): Result<Section[], AutomatonError> {
  return toPDARecord(value)
    .andThen(parsePDA)
    .map((pda) => [
      { name: 'pda', graph: describePDA(pda), table: pda.toDebugStr() },
    ]);
}

function dfaToGrammarCommand(
  value: unknown
): Result<Section[], AutomatonError> {
  return toAutomatonRecord(value)
    .andThen(parseDFA)
    .andThen((dfa) =>
      dfaToGrammar(dfa).map((grammar) => [
        { name: 'dfa', graph: describeDFA(dfa), table: dfa.toDebugStr() },
        {
          name: 'grammar',
          graph: describeGrammar(grammar),
          table: grammar.toDebugStr(),
        },
      ])
    );
}

export function runSections(
  command: CommandName,
  record: unknown,
  options: CommandOptions
): Result<Section[], AutomatonError> {
  switch (command) {
    case 'dfa':
      return dfaCommand(record, options);
    case 'nfa':
      return nfaCommand(record, false, options);
    case 'enfa':
      return nfaCommand(record, true, options);
    case 'grammar':
      return grammarCommand(record, options);
    case 'pda':
      return pdaCommand(record);
    case 'dfa-to-grammar':
      return dfaToGrammarCommand(record);
  }
}

export function render(
  sections: readonly Section[],
  format: OutputFormat
): string {
  switch (format) {
    case 'json': {
      const out: Record<string, GraphDescription> = {};
      for (const section of sections) {
        out[section.name] = section.graph;
      }
      return JSON.stringify(out, null, 2) + '\n';
    }
    case 'dot':
      return sections.map((section) => toDot(section.graph)).join('\n');
    case 'table':
      return (
        sections
          .map(
            (section) =>
              `${section.name}:\n${section.table.replace(/\n+$/, '')}`
          )
          .join('\n') + '\n'
      );
  }
}

/**
 * Run a command over a record and render its output.
 */
export function runCommand(
  command: CommandName,
  record: unknown,
  options: CommandOptions
): Result<string, AutomatonError> {
  const sections = runSections(command, record, options);
  if (sections.isErr()) {
    return err(sections.error);
  }
  return ok(render(sections.value, options.format));
}

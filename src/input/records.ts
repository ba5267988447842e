/**
 * Input records: the flat text fields a user fills in for each kind of
 * model, and their conversion into validated models.
 */

import fs from 'fs';
import { err, ok, Result } from 'neverthrow';
import { DFA, DFADefinition } from '../automata/dfa';
import { NFA, NFADefinition, NFAKind } from '../automata/nfa';
import { PDADefinition, PushdownAutomaton } from '../automata/pda';
import { log } from '../debug';
import { AutomatonError, malformedInput } from '../errors';
import { GrammarDefinition, RegularGrammar } from '../grammar/grammar';
import { EPSILON, isEpsilonToken, toLabel } from '../symbols';
import { splitEntries, splitList, splitSequence } from './tokens';

/**
 * DFA, NFA and ε-NFA records share their fields.
 *
 * `transitions` is a semicolon separated list of `from,symbol,to` for a DFA
 * and `from,symbol,to1,to2,...` for the others.
 */
export interface AutomatonRecord {
  states: string;
  alphabet: string;
  transitions: string;
  start: string;
  accepting: string;
}

/**
 * `productions` is a semicolon separated list of `variable,body1,body2,...`.
 */
export interface GrammarRecord {
  variables: string;
  terminals: string;
  productions: string;
  start: string;
}

/**
 * `transitions` is a semicolon separated list of
 * `from,input,stackTop,to,push`.
 */
export interface PDARecord {
  states: string;
  inputAlphabet: string;
  stackAlphabet: string;
  transitions: string;
  start: string;
  initialStack: string;
  accepting: string;
}

export const AUTOMATON_FIELDS: readonly (keyof AutomatonRecord)[] = [
  'states',
  'alphabet',
  'transitions',
  'start',
  'accepting',
];

export const GRAMMAR_FIELDS: readonly (keyof GrammarRecord)[] = [
  'variables',
  'terminals',
  'productions',
  'start',
];

export const PDA_FIELDS: readonly (keyof PDARecord)[] = [
  'states',
  'inputAlphabet',
  'stackAlphabet',
  'transitions',
  'start',
  'initialStack',
  'accepting',
];

function requireValue(
  value: string,
  field: string
): Result<string, AutomatonError> {
  const trimmed = value.trim();
  if (trimmed.length == 0) {
    return err(malformedInput('a value is required', { field }));
  }
  return ok(trimmed);
}

export function parseDFA(record: AutomatonRecord): Result<DFA, AutomatonError> {
  const start = requireValue(record.start, 'start');
  if (start.isErr()) {
    return err(start.error);
  }
  const transitions: DFADefinition['transitions'][number][] = [];
  for (const { line, tokens } of splitEntries(record.transitions)) {
    if (tokens.length != 3) {
      return err(
        malformedInput(
          `expected "from,symbol,to" but found ${tokens.length} values`,
          { field: 'transitions', line }
        )
      );
    }
    const [from, symbol, to] = tokens;
    transitions.push({ from, symbol: toLabel(symbol), to, line });
  }
  return DFA.create({
    states: splitList(record.states),
    alphabet: splitList(record.alphabet),
    transitions,
    start: start.value,
    accepting: splitList(record.accepting),
  });
}

function parseNondeterministic(
  record: AutomatonRecord,
  kind: NFAKind
): Result<NFA, AutomatonError> {
  const start = requireValue(record.start, 'start');
  if (start.isErr()) {
    return err(start.error);
  }
  const transitions: NFADefinition['transitions'][number][] = [];
  for (const { line, tokens } of splitEntries(record.transitions)) {
    if (tokens.length < 2) {
      return err(
        malformedInput(
          `expected "from,symbol,to1,to2,..." but found ${tokens.length} value`,
          { field: 'transitions', line }
        )
      );
    }
    const [from, symbol, ...to] = tokens;
    transitions.push({
      from,
      symbol: toLabel(symbol),
      to: to.filter((t) => t.length > 0),
      line,
    });
  }
  return NFA.create(
    {
      states: splitList(record.states),
      alphabet: splitList(record.alphabet),
      transitions,
      start: start.value,
      accepting: splitList(record.accepting),
    },
    kind
  );
}

export function parseNFA(record: AutomatonRecord): Result<NFA, AutomatonError> {
  return parseNondeterministic(record, 'nfa');
}

export function parseEpsilonNFA(
  record: AutomatonRecord
): Result<NFA, AutomatonError> {
  return parseNondeterministic(record, 'enfa');
}

export function parseGrammar(
  record: GrammarRecord
): Result<RegularGrammar, AutomatonError> {
  const start = requireValue(record.start, 'start');
  if (start.isErr()) {
    return err(start.error);
  }
  const variables = splitList(record.variables);
  const terminals = splitList(record.terminals);
  const vocabulary = [...terminals, ...variables];
  const productions: GrammarDefinition['productions'][number][] = [];
  for (const { line, tokens } of splitEntries(record.productions)) {
    const [variable, ...bodies] = tokens;
    if (bodies.length == 0) {
      return err(
        malformedInput(
          'expected "variable,body1,body2,..." but found no body',
          { field: 'productions', line }
        )
      );
    }
    productions.push({
      variable,
      bodies: bodies.map((body) =>
        isEpsilonToken(body)
          ? [EPSILON]
          : splitSequence(body, vocabulary).map(toLabel)
      ),
      line,
    });
  }
  return RegularGrammar.create({
    variables,
    terminals,
    productions,
    start: start.value,
  });
}

export function parsePDA(
  record: PDARecord
): Result<PushdownAutomaton, AutomatonError> {
  const start = requireValue(record.start, 'start');
  if (start.isErr()) {
    return err(start.error);
  }
  const initialStack = requireValue(record.initialStack, 'initialStack');
  if (initialStack.isErr()) {
    return err(initialStack.error);
  }
  const stackAlphabet = splitList(record.stackAlphabet);
  const transitions: PDADefinition['transitions'][number][] = [];
  for (const { line, tokens } of splitEntries(record.transitions)) {
    if (tokens.length != 5) {
      return err(
        malformedInput(
          `expected "from,input,stackTop,to,push" but found ${tokens.length} values`,
          { field: 'transitions', line }
        )
      );
    }
    const [from, input, stackTop, to, push] = tokens;
    transitions.push({
      from,
      input: toLabel(input),
      stackTop,
      to,
      push:
        isEpsilonToken(push) || push.length == 0
          ? []
          : splitSequence(push, stackAlphabet),
      line,
    });
  }
  return PushdownAutomaton.create({
    states: splitList(record.states),
    inputAlphabet: splitList(record.inputAlphabet),
    stackAlphabet,
    transitions,
    start: start.value,
    initialStack: initialStack.value,
    accepting: splitList(record.accepting),
  });
}

const parseJSON = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e) => malformedInput(`invalid JSON: ${describeError(e)}`)
);

function describeError(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

type FieldReader = (field: string) => string;

/**
 * Check that a value, e.g. parsed JSON, is an object whose named fields are
 * strings. Missing fields read as empty.
 */
function readFields(
  value: unknown,
  fields: readonly string[]
): Result<FieldReader, AutomatonError> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return err(malformedInput('a record must be a JSON object'));
  }
  const entries: Map<string, unknown> = new Map(Object.entries(value));
  const strings: Map<string, string> = new Map();
  for (const field of fields) {
    const fieldValue = entries.get(field) ?? '';
    if (typeof fieldValue !== 'string') {
      return err(malformedInput('must be a string', { field }));
    }
    strings.set(field, fieldValue);
  }
  return ok((field) => strings.get(field) ?? '');
}

export function toAutomatonRecord(
  value: unknown
): Result<AutomatonRecord, AutomatonError> {
  return readFields(value, AUTOMATON_FIELDS).map((get) => ({
    states: get('states'),
    alphabet: get('alphabet'),
    transitions: get('transitions'),
    start: get('start'),
    accepting: get('accepting'),
  }));
}

export function toGrammarRecord(
  value: unknown
): Result<GrammarRecord, AutomatonError> {
  return readFields(value, GRAMMAR_FIELDS).map((get) => ({
    variables: get('variables'),
    terminals: get('terminals'),
    productions: get('productions'),
    start: get('start'),
  }));
}

export function toPDARecord(value: unknown): Result<PDARecord, AutomatonError> {
  return readFields(value, PDA_FIELDS).map((get) => ({
    states: get('states'),
    inputAlphabet: get('inputAlphabet'),
    stackAlphabet: get('stackAlphabet'),
    transitions: get('transitions'),
    start: get('start'),
    initialStack: get('initialStack'),
    accepting: get('accepting'),
  }));
}

/**
 * Read the JSON value stored in a record file.
 */
export function loadRecord(file: string): Result<unknown, AutomatonError> {
  log('loading record from', file);
  const read = Result.fromThrowable(
    () => fs.readFileSync(file, { encoding: 'utf-8' }),
    (e) => malformedInput(`cannot read ${file}: ${describeError(e)}`)
  );
  return read().andThen(parseJSON);
}

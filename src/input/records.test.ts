import fs from 'fs';
import os from 'os';
import path from 'path';
import { Result } from 'neverthrow';
import { AutomatonError } from '../errors';
import {
  AutomatonRecord,
  GrammarRecord,
  loadRecord,
  parseDFA,
  parseEpsilonNFA,
  parseGrammar,
  parseNFA,
  parsePDA,
  PDARecord,
  toAutomatonRecord,
  toPDARecord,
} from './records';

const dfaRecord: AutomatonRecord = {
  states: 'q0, q1',
  alphabet: 'a,b',
  transitions: 'q0,a,q1; q1,b,q0;',
  start: ' q0 ',
  accepting: 'q1',
};

const grammarRecord: GrammarRecord = {
  variables: 'S',
  terminals: 'a,b',
  productions: 'S,aS,b S,λ',
  start: 'S',
};

const pdaRecord: PDARecord = {
  states: 'q0,q1,q2',
  inputAlphabet: 'a,b',
  stackAlphabet: 'A,Z',
  transitions:
    'q0,a,Z,q0,AZ; q0,a,A,q0,AA; q0,b,A,q1,λ; q1,b,A,q1,ε; q1,λ,Z,q2,Z',
  start: 'q0',
  initialStack: 'Z',
  accepting: 'q2',
};

describe('parseDFA()', () => {
  test('reads a record', () => {
    const dfa = parseDFA(dfaRecord)._unsafeUnwrap();
    expect(dfa.states).toEqual(['q0', 'q1']);
    expect(dfa.start).toBe('q0');
    expect(dfa.next('q0', 'a')).toBe('q1');
    expect(dfa.next('q1', 'b')).toBe('q0');
  });

  test('reports entries with the wrong number of values', () => {
    const error = parseDFA({
      ...dfaRecord,
      transitions: 'q0,a,q1;q1,b',
    })._unsafeUnwrapErr();
    expect(error.kind).toBe('MalformedInput');
    expect(error.field).toBe('transitions');
    expect(error.line).toBe(2);
    expect(error.message).toBe(
      'transitions, entry 2: expected "from,symbol,to" but found 2 values'
    );
  });

  test('requires a start state', () => {
    expect(
      parseDFA({ ...dfaRecord, start: ' ' })._unsafeUnwrapErr().message
    ).toBe('start: a value is required');
  });
});

describe('parseNFA() and parseEpsilonNFA()', () => {
  test('read destination lists', () => {
    const nfa = parseNFA({
      ...dfaRecord,
      transitions: 'q0,a,q0,q1; q1,b',
    })._unsafeUnwrap();
    expect(nfa.image('q0', 'a')).toEqual(['q0', 'q1']);
    expect(nfa.image('q1', 'b')).toEqual([]);
  });

  test('epsilon only in an ε-NFA', () => {
    const record = { ...dfaRecord, transitions: 'q0,λ,q1' };
    expect(parseEpsilonNFA(record)._unsafeUnwrap().kind).toBe('enfa');
    expect(parseNFA(record)._unsafeUnwrapErr().message).toBe(
      'transitions, entry 1: epsilon transitions are only allowed in an ε-NFA'
    );
  });

  test('an entry needs a state and a symbol', () => {
    expect(
      parseNFA({ ...dfaRecord, transitions: 'q0' })._unsafeUnwrapErr().message
    ).toBe(
      'transitions, entry 1: expected "from,symbol,to1,to2,..." but found 1 value'
    );
  });
});

describe('parseGrammar()', () => {
  test('reads juxtaposed and spaced bodies', () => {
    const grammar = parseGrammar(grammarRecord)._unsafeUnwrap();
    expect(grammar.toDebugStr()).toBe('S → a S | b S | ε');
  });

  test('an entry needs a body', () => {
    expect(
      parseGrammar({ ...grammarRecord, productions: 'S' })._unsafeUnwrapErr()
        .message
    ).toBe('productions, entry 1: expected "variable,body1,body2,..." but found no body');
  });
});

describe('parsePDA()', () => {
  test('reads pushes', () => {
    const pda = parsePDA(pdaRecord)._unsafeUnwrap();
    expect(pda.toDebugStr().split('\n')).toEqual([
      'δ(q0, a, Z) ∋ (q0, AZ)',
      'δ(q0, a, A) ∋ (q0, AA)',
      'δ(q0, b, A) ∋ (q1, ε)',
      'δ(q1, b, A) ∋ (q1, ε)',
      'δ(q1, ε, Z) ∋ (q2, Z)',
    ]);
  });

  test('reports entries with the wrong number of values', () => {
    expect(
      parsePDA({ ...pdaRecord, transitions: 'q0,a,Z,q0' })._unsafeUnwrapErr()
        .message
    ).toBe(
      'transitions, entry 1: expected "from,input,stackTop,to,push" but found 4 values'
    );
  });
});

test('an undeclared q9 is reported by every parser', () => {
  const results: Result<unknown, AutomatonError>[] = [
    parseDFA({ ...dfaRecord, transitions: 'q0,a,q9' }),
    parseNFA({ ...dfaRecord, transitions: 'q0,a,q9' }),
    parseEpsilonNFA({ ...dfaRecord, transitions: 'q0,λ,q9' }),
    parseGrammar({ ...grammarRecord, productions: 'S,a q9' }),
    parsePDA({ ...pdaRecord, transitions: 'q0,a,Z,q9,Z' }),
  ];
  for (const result of results) {
    expect(result._unsafeUnwrapErr().kind).toBe('UndeclaredReference');
  }
});

describe('record objects', () => {
  test('missing fields read as empty', () => {
    expect(toAutomatonRecord({ states: 'q0' })._unsafeUnwrap()).toEqual({
      states: 'q0',
      alphabet: '',
      transitions: '',
      start: '',
      accepting: '',
    });
  });

  test('fields must be strings', () => {
    expect(
      toPDARecord({ states: 'q0', initialStack: 3 })._unsafeUnwrapErr().message
    ).toBe('initialStack: must be a string');
    expect(toAutomatonRecord(['q0'])._unsafeUnwrapErr().message).toBe(
      'a record must be a JSON object'
    );
  });
});

describe('loadRecord()', () => {
  let dir: string;
  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'automata-lab-'));
  });
  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('reads a JSON file', () => {
    const file = path.join(dir, 'dfa.json');
    fs.writeFileSync(file, JSON.stringify(dfaRecord));
    expect(loadRecord(file)._unsafeUnwrap()).toEqual(dfaRecord);
  });

  test('reports invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{"states": ');
    const error = loadRecord(file)._unsafeUnwrapErr();
    expect(error.kind).toBe('MalformedInput');
    expect(error.message.startsWith('invalid JSON: ')).toBe(true);
  });

  test('reports a missing file', () => {
    const file = path.join(dir, 'missing.json');
    const { message } = loadRecord(file)._unsafeUnwrapErr();
    expect(message.startsWith(`cannot read ${file}: `)).toBe(true);
  });
});

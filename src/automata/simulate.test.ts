import { logger } from '../debug';
import { EPSILON } from '../symbols';
import { DFA } from './dfa';
import { NFA } from './nfa';
import { acceptsNFA, simulate, splitInput } from './simulate';
import { subsetConstruction } from './subset-construction';

// accepts strings over {0,1} whose second to last symbol is 0
const secondToLastZero = NFA.create({
  states: ['q0', 'q1', 'q2'],
  alphabet: ['0', '1'],
  transitions: [
    { from: 'q0', symbol: '0', to: ['q0', 'q1'] },
    { from: 'q0', symbol: '1', to: ['q0'] },
    { from: 'q1', symbol: '0', to: ['q2'] },
    { from: 'q1', symbol: '1', to: ['q2'] },
  ],
  start: 'q0',
  accepting: ['q2'],
})._unsafeUnwrap();

// only "a" followed by anything that is never read
const partial = DFA.create({
  states: ['q0', 'q1'],
  alphabet: ['a', 'b'],
  transitions: [{ from: 'q0', symbol: 'a', to: 'q1' }],
  start: 'q0',
  accepting: ['q1'],
})._unsafeUnwrap();

beforeAll(() => {
  logger.configure({ debug: false });
});

describe('simulate()', () => {
  const { dfa } = subsetConstruction(secondToLastZero)._unsafeUnwrap();

  test('accepts along the traced path', () => {
    expect(simulate(dfa, ['0', '0'])).toEqual({
      accepted: true,
      path: ['D0', 'D1', 'D2'],
      consumed: ['0', '0'],
      halt: { kind: 'Consumed', state: 'D2' },
    });
  });

  test('rejects when the last state is not accepting', () => {
    expect(simulate(dfa, ['1', '1'])).toEqual({
      accepted: false,
      path: ['D0', 'D0', 'D0'],
      consumed: ['1', '1'],
      halt: { kind: 'Consumed', state: 'D0' },
    });
  });

  test('stops at an undefined transition', () => {
    expect(simulate(partial, ['a', 'b', 'a'])).toEqual({
      accepted: false,
      path: ['q0', 'q1'],
      consumed: ['a'],
      halt: {
        kind: 'UndefinedTransition',
        state: 'q1',
        symbol: 'b',
        position: 1,
      },
    });
    expect(simulate(partial, ['c']).halt).toEqual({
      kind: 'UndefinedTransition',
      state: 'q0',
      symbol: 'c',
      position: 0,
    });
  });

  test('the empty input stays in the start state', () => {
    const result = simulate(partial, []);
    expect(result.path).toEqual(['q0']);
    expect(result.accepted).toBe(false);
  });

  test('the path is one longer than the consumed input', () => {
    for (const input of [[], ['0'], ['1', '0', '1'], ['0', '1', '0', '0']]) {
      const result = simulate(dfa, input);
      expect(result.path).toHaveLength(result.consumed.length + 1);
    }
    for (const input of [['b'], ['a', 'a'], ['a']]) {
      const result = simulate(partial, input);
      expect(result.path).toHaveLength(result.consumed.length + 1);
      expect(result.accepted).toBe(
        result.halt.kind == 'Consumed' && partial.isAccepting(result.halt.state)
      );
    }
  });

  test('agrees with the NFA', () => {
    const inputs = [['0', '0'], ['1', '1'], ['0', '1'], ['1', '0', '0'], []];
    for (const input of inputs) {
      expect(simulate(dfa, input).accepted).toBe(
        acceptsNFA(secondToLastZero, input)
      );
    }
  });
});

describe('acceptsNFA()', () => {
  test('NFA', () => {
    expect(acceptsNFA(secondToLastZero, ['0', '0'])).toBe(true);
    expect(acceptsNFA(secondToLastZero, ['1', '1'])).toBe(false);
  });

  test('ε-NFA', () => {
    const nfa = NFA.create(
      {
        states: ['p', 'q', 'r', 's'],
        alphabet: ['a'],
        transitions: [
          { from: 'p', symbol: EPSILON, to: ['q'] },
          { from: 'q', symbol: EPSILON, to: ['r'] },
          { from: 'r', symbol: EPSILON, to: ['p'] },
          { from: 'r', symbol: 'a', to: ['s'] },
        ],
        start: 'p',
        accepting: ['s'],
      },
      'enfa'
    )._unsafeUnwrap();
    expect(acceptsNFA(nfa, ['a'])).toBe(true);
    expect(acceptsNFA(nfa, [])).toBe(false);
    expect(acceptsNFA(nfa, ['a', 'a'])).toBe(false);
  });
});

describe('splitInput()', () => {
  test('single character symbols', () => {
    expect(splitInput(['0', '1'], '0110')).toEqual(['0', '1', '1', '0']);
  });

  test('takes the longest declared symbol', () => {
    expect(splitInput(['ab', 'a', 'b'], 'aab')).toEqual(['a', 'ab']);
  });

  test('separated lists', () => {
    expect(splitInput(['a'], 'a b, a')).toEqual(['a', 'b', 'a']);
  });

  test('unknown characters become their own symbol', () => {
    expect(splitInput(['a'], 'ax')).toEqual(['a', 'x']);
    expect(splitInput(['a'], '  ')).toEqual([]);
  });
});

import { EPSILON } from '../symbols';
import { DFA, DFADefinition } from './dfa';

// strings over {a,b} with an even number of a's
const evenAs: DFADefinition = {
  states: ['even', 'odd'],
  alphabet: ['a', 'b'],
  transitions: [
    { from: 'even', symbol: 'a', to: 'odd' },
    { from: 'even', symbol: 'b', to: 'even' },
    { from: 'odd', symbol: 'a', to: 'even' },
    { from: 'odd', symbol: 'b', to: 'odd' },
  ],
  start: 'even',
  accepting: ['even'],
};

const createError = (definition: DFADefinition) =>
  DFA.create(definition)._unsafeUnwrapErr();

describe('DFA.create()', () => {
  test('builds a total DFA', () => {
    const dfa = DFA.create(evenAs)._unsafeUnwrap();
    expect(dfa.kind).toBe('dfa');
    expect(dfa.next('even', 'a')).toBe('odd');
    expect(dfa.next('odd', 'b')).toBe('odd');
    expect(dfa.isAccepting('even')).toBe(true);
    expect(dfa.isAccepting('odd')).toBe(false);
    expect(dfa.isTotal()).toBe(true);
  });

  test('allows a partial transition function', () => {
    const dfa = DFA.create({
      ...evenAs,
      transitions: evenAs.transitions.slice(0, 3),
    })._unsafeUnwrap();
    expect(dfa.isTotal()).toBe(false);
    expect(dfa.next('odd', 'b')).toBeUndefined();
  });

  test('accepts a repeated identical transition', () => {
    const dfa = DFA.create({
      ...evenAs,
      transitions: [...evenAs.transitions, evenAs.transitions[0]],
    })._unsafeUnwrap();
    expect(dfa.transitions()).toHaveLength(4);
  });

  test('rejects undeclared states and symbols', () => {
    const toQ9 = createError({
      ...evenAs,
      transitions: [{ from: 'even', symbol: 'a', to: 'q9' }],
    });
    expect(toQ9.kind).toBe('UndeclaredReference');
    expect(toQ9.message).toBe('transitions, entry 1: undeclared state "q9"');

    const onC = createError({
      ...evenAs,
      transitions: [{ from: 'even', symbol: 'c', to: 'odd', line: 4 }],
    });
    expect(onC.kind).toBe('UndeclaredReference');
    expect(onC.message).toBe('transitions, entry 4: undeclared symbol "c"');

    expect(createError({ ...evenAs, start: 'q9' }).message).toBe(
      'start: undeclared state "q9"'
    );
    expect(createError({ ...evenAs, accepting: ['q9'] }).message).toBe(
      'accepting: undeclared state "q9"'
    );
  });

  test('rejects conflicting transitions', () => {
    const error = createError({
      ...evenAs,
      transitions: [
        { from: 'even', symbol: 'a', to: 'odd' },
        { from: 'even', symbol: 'a', to: 'even' },
      ],
    });
    expect(error.kind).toBe('MalformedInput');
    expect(error.message).toBe(
      'transitions, entry 2: state "even" already moves to "odd" on "a"'
    );
  });

  test('rejects epsilon transitions', () => {
    const error = createError({
      ...evenAs,
      transitions: [{ from: 'even', symbol: EPSILON, to: 'odd' }],
    });
    expect(error.kind).toBe('MalformedInput');
    expect(error.message).toBe(
      'transitions, entry 1: a DFA cannot have epsilon transitions'
    );
  });

  test('rejects bad declarations', () => {
    expect(createError({ ...evenAs, states: [] }).message).toBe(
      'states: at least one state must be declared'
    );
    expect(createError({ ...evenAs, states: ['even', 'even'] }).message).toBe(
      'states: duplicate state "even"'
    );
    expect(createError({ ...evenAs, alphabet: ['a', 'λ'] }).message).toBe(
      'alphabet: "λ" is reserved for epsilon and cannot be a symbol'
    );
  });
});

describe('DFA', () => {
  const dfa = DFA.create(evenAs)._unsafeUnwrap();

  test('transitions() follow state and then alphabet order', () => {
    expect(dfa.transitions()).toEqual(evenAs.transitions);
  });

  test('toDefinition() rebuilds the same automaton', () => {
    const copy = DFA.create(dfa.toDefinition())._unsafeUnwrap();
    expect(copy.toDefinition()).toEqual(dfa.toDefinition());
  });

  test('toDebugStr()', () => {
    expect('\n' + dfa.toDebugStr()).toEqual(
      '\n' +
        '        δ     a     b\n' +
        '  >*even:   odd  even\n' +
        '     odd:  even   odd\n'
    );
  });
});

import { DFA } from '../automata/dfa';
import { simulate } from '../automata/simulate';
import { logger } from '../debug';
import { describeDFA, describeSimulation } from './describe';
import { toDot } from './dot';

const dfa = DFA.create({
  states: ['q0', 'q1'],
  alphabet: ['a'],
  transitions: [{ from: 'q0', symbol: 'a', to: 'q1' }],
  start: 'q0',
  accepting: ['q1'],
})._unsafeUnwrap();

beforeAll(() => {
  logger.configure({ debug: false });
});

test('toDot()', () => {
  expect(toDot(describeDFA(dfa))).toBe(
    [
      'digraph dfa {',
      '  rankdir=LR;',
      '  "q0" [shape=circle, style=filled, fillcolor=lightblue];',
      '  "q1" [shape=doublecircle];',
      '  "q0" -> "q1" [label="a"];',
      '}',
      '',
    ].join('\n')
  );
});

test('toDot() draws the simulated path in red', () => {
  const description = describeSimulation(dfa, simulate(dfa, ['a']));
  expect(toDot(description).split('\n').slice(2, 5)).toEqual([
    '  "q0" [shape=circle, style=filled, fillcolor=lightblue, color=red];',
    '  "q1" [shape=doublecircle, color=red];',
    '  "q0" -> "q1" [label="a", color=red, penwidth=2];',
  ]);
});

test('toDot() quotes ids and labels', () => {
  const dot = toDot({
    kind: 'grammar',
    nodes: [
      { id: 'say "hi"', label: 'a\\b', isAccepting: false, isStart: false },
    ],
    edges: [],
  });
  expect(dot.split('\n')[2]).toBe(
    '  "say \\"hi\\"" [shape=circle, label="a\\\\b"];'
  );
});

import { HashMap, StateSet } from './sets';

describe('StateSet', () => {
  test('compares by content', () => {
    const a = new StateSet(['q1', 'q0']);
    const b = new StateSet(['q0', 'q1', 'q0']);
    expect(a.equals(b)).toBe(true);
    expect(a.toString()).toBe('{q0,q1}');
    expect(b.size).toBe(2);
    expect(`${a}`).toBe('{q0,q1}');
  });

  test('state names with commas do not collide', () => {
    const pair = new StateSet(['a', 'b']);
    const single = new StateSet(['a,b']);
    expect(`${pair}`).toBe(`${single}`);
    expect(pair.hash()).not.toBe(single.hash());
    expect(pair.equals(single)).toBe(false);
  });

  test('EMPTY', () => {
    expect(StateSet.EMPTY.isEmpty()).toBe(true);
    expect(StateSet.EMPTY.toString()).toBe('{}');
    expect(StateSet.EMPTY.equals(new StateSet())).toBe(true);
  });

  test('union() and ordered()', () => {
    const set = new StateSet(['q2']).union(['q0', 'q2']);
    expect(set.toString()).toBe('{q0,q2}');
    expect(set.ordered(['q2', 'q1', 'q0'])).toEqual(['q2', 'q0']);
    expect(set.some((s) => s == 'q0')).toBe(true);
    expect(set.has('q1')).toBe(false);
  });
});

describe('HashMap', () => {
  test('looks keys up by hash', () => {
    const map = new HashMap<StateSet, string>((set) => set.hash());
    map.set(new StateSet(['x', 'y']), 'D0');
    map.set(new StateSet(['z']), 'D1');
    expect(map.get(new StateSet(['y', 'x']))).toBe('D0');
    expect(map.has(new StateSet(['x']))).toBe(false);
    map.set(new StateSet(['y', 'x']), 'D2');
    expect(map.size).toBe(2);
    expect([...map.values()]).toEqual(['D2', 'D1']);
    expect([...map.keys()].map((k) => k.toString())).toEqual([
      '{x,y}',
      '{z}',
    ]);
  });
});

import { State } from './symbols';

export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * An immutable set of states, compared by content.
 *
 * Used for the composite states of subset construction: two StateSets
 * built from the same states in any order have the same hash, and sets
 * with different states never do.
 */
export class StateSet implements ConstSet<State> {
  static readonly EMPTY = new StateSet();

  private readonly data: ReadonlySet<State>;
  private readonly sorted: readonly State[];
  private readonly key: string;

  constructor(items: Iterable<State> = []) {
    this.data = new Set(items);
    this.sorted = [...this.data].sort();
    // state names may contain commas or braces
    this.key = JSON.stringify(this.sorted);
  }

  get size(): number {
    return this.data.size;
  }

  [Symbol.iterator]() {
    return this.data[Symbol.iterator]();
  }

  has(state: State): boolean {
    return this.data.has(state);
  }

  isEmpty() {
    return this.data.size == 0;
  }

  some(predicate: (state: State) => boolean): boolean {
    for (const state of this.data) {
      if (predicate(state)) {
        return true;
      }
    }
    return false;
  }

  union(other: Iterable<State>): StateSet {
    return new StateSet([...this.data, ...other]);
  }

  equals(other: StateSet): boolean {
    return this.key === other.key;
  }

  /**
   * The states in the order given, e.g. the declaration order of an automaton.
   */
  ordered(order: readonly State[]): State[] {
    return order.filter((s) => this.data.has(s));
  }

  hash(): string {
    return this.key;
  }

  /** Set notation for display, e.g. `{q0,q1}` */
  toString() {
    return `{${this.sorted.join(',')}}`;
  }
}

/**
 * A map whose keys are compared through a string hash rather than identity.
 * Iteration follows insertion order.
 */
export class HashMap<K, V> {
  private hasher: (item: K) => string;
  private data: Map<string, [K, V]> = new Map();
  constructor(hasher: (item: K) => string) {
    this.hasher = hasher;
  }
  get(key: K): V | undefined {
    return this.data.get(this.hasher(key))?.[1];
  }
  has(key: K): boolean {
    return this.data.has(this.hasher(key));
  }
  set(key: K, value: V): this {
    this.data.set(this.hasher(key), [key, value]);
    return this;
  }
  get size(): number {
    return this.data.size;
  }
  *keys(): IterableIterator<K> {
    for (const [key] of this.data.values()) {
      yield key;
    }
  }
  *values(): IterableIterator<V> {
    for (const [, value] of this.data.values()) {
      yield value;
    }
  }
  entries(): IterableIterator<[K, V]> {
    return this.data.values();
  }
  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}

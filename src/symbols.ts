/**
 * Atomic label types shared by every automaton and grammar.
 */

/**
 * An opaque state (or grammar variable) identifier.
 */
export type State = string;

/**
 * A terminal symbol of some alphabet.
 */
export type InputSymbol = string;

/**
 * The label of a transition that consumes no input.
 */
export const EPSILON: unique symbol = Symbol('epsilon');
export type Epsilon = typeof EPSILON;

export type Label = InputSymbol | Epsilon;

/**
 * Tokens that stand for epsilon in input records. Neither may be declared
 * as an alphabet symbol.
 */
export const EPSILON_TOKENS: readonly string[] = ['λ', 'ε'];

/**
 * Glyph used when epsilon is displayed.
 */
export const EPSILON_GLYPH = 'ε';

export function isEpsilon(label: Label): label is Epsilon {
  return label === EPSILON;
}

export function isEpsilonToken(token: string): boolean {
  return EPSILON_TOKENS.includes(token);
}

/**
 * Read a token from an input record as a transition label.
 */
export function toLabel(token: string): Label {
  return isEpsilonToken(token) ? EPSILON : token;
}

export function displayLabel(label: Label): string {
  return isEpsilon(label) ? EPSILON_GLYPH : label;
}

import { Result } from 'neverthrow';

export type AutomatonErrorKind =
  | 'MalformedInput' // wrong token count, duplicate or reserved declaration, bad shape
  | 'UndeclaredReference' // a state, symbol or variable used but never declared
  | 'NonDeterministicGrammar' // two productions of one variable share a leading terminal
  | 'StateLimitExceeded'; // subset construction grew past its configured bound

/**
 * Where in an input record an error was found.
 */
export interface ErrorContext {
  /** Record field, e.g. "transitions" */
  readonly field?: string;
  /** 1-based entry number within a semicolon separated field */
  readonly line?: number;
}

export class AutomatonError extends Error {
  readonly kind: AutomatonErrorKind;
  readonly field?: string;
  readonly line?: number;

  constructor(
    kind: AutomatonErrorKind,
    message: string,
    context: ErrorContext = {}
  ) {
    super(AutomatonError.withContext(message, context));
    this.name = 'AutomatonError';
    this.kind = kind;
    this.field = context.field;
    this.line = context.line;
  }

  private static withContext(message: string, context: ErrorContext) {
    if (context.field === undefined) {
      return message;
    }
    if (context.line === undefined) {
      return `${context.field}: ${message}`;
    }
    return `${context.field}, entry ${context.line}: ${message}`;
  }
}

export function malformedInput(message: string, context?: ErrorContext) {
  return new AutomatonError('MalformedInput', message, context);
}

export function undeclaredReference(message: string, context?: ErrorContext) {
  return new AutomatonError('UndeclaredReference', message, context);
}

/**
 * Unwrap the result of building a model that an algorithm assembled from an
 * already validated one. Failure here is a bug, not bad input.
 */
export function expectValid<T>(result: Result<T, AutomatonError>): T {
  if (result.isErr()) {
    throw new Error(`Invariant violation: ${result.error.message}`);
  }
  return result.value;
}

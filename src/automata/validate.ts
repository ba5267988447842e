import { err, ok, Result } from 'neverthrow';
import {
  AutomatonError,
  ErrorContext,
  malformedInput,
  undeclaredReference,
} from '../errors';
import { isEpsilonToken } from '../symbols';

export interface DeclareOptions {
  /** What a name denotes in messages, e.g. "state" */
  what: string;
  /** Record field the names came from */
  field: string;
  /** Whether an empty list is acceptable */
  allowEmpty?: boolean;
  /** Whether names are alphabet symbols, which may not be epsilon tokens */
  symbols?: boolean;
}

/**
 * Check a declaration list and turn it into a lookup set.
 *
 * Names must be non-empty and pairwise distinct.
 */
export function declareNames(
  names: readonly string[],
  options: DeclareOptions
): Result<ReadonlySet<string>, AutomatonError> {
  const { what, field } = options;
  if (names.length == 0 && !options.allowEmpty) {
    return err(
      malformedInput(`at least one ${what} must be declared`, { field })
    );
  }
  const declared: Set<string> = new Set();
  for (const name of names) {
    if (name.length == 0) {
      return err(malformedInput(`empty ${what} name`, { field }));
    }
    if (options.symbols && isEpsilonToken(name)) {
      return err(
        malformedInput(
          `"${name}" is reserved for epsilon and cannot be a ${what}`,
          { field }
        )
      );
    }
    if (declared.has(name)) {
      return err(malformedInput(`duplicate ${what} "${name}"`, { field }));
    }
    declared.add(name);
  }
  return ok(declared);
}

export function requireDeclared(
  name: string,
  declared: ReadonlySet<string>,
  what: string,
  context: ErrorContext
): Result<string, AutomatonError> {
  if (!declared.has(name)) {
    return err(undeclaredReference(`undeclared ${what} "${name}"`, context));
  }
  return ok(name);
}

/**
 * Check that every name in a list was declared, e.g. the accepting states.
 */
export function requireAllDeclared(
  names: readonly string[],
  declared: ReadonlySet<string>,
  what: string,
  field: string
): Result<ReadonlySet<string>, AutomatonError> {
  const checked: Set<string> = new Set();
  for (const name of names) {
    const result = requireDeclared(name, declared, what, { field });
    if (result.isErr()) {
      return err(result.error);
    }
    checked.add(name);
  }
  return ok(checked);
}

/**
 * The first failure among independent checks, if any.
 */
export function firstError(
  results: readonly Result<unknown, AutomatonError>[]
): AutomatonError | undefined {
  for (const result of results) {
    if (result.isErr()) {
      return result.error;
    }
  }
  return undefined;
}

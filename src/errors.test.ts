import { err, ok } from 'neverthrow';
import {
  AutomatonError,
  expectValid,
  malformedInput,
  undeclaredReference,
} from './errors';

describe('AutomatonError', () => {
  test('prefixes the message with where the error was found', () => {
    const error = malformedInput('bad', { field: 'transitions', line: 3 });
    expect(error.message).toBe('transitions, entry 3: bad');
    expect(malformedInput('bad', { field: 'start' }).message).toBe('start: bad');
    expect(malformedInput('bad').message).toBe('bad');
  });

  test('keeps kind and context', () => {
    const error = undeclaredReference('undeclared state "q9"', {
      field: 'accepting',
    });
    expect(error).toBeInstanceOf(AutomatonError);
    expect(error).toBeInstanceOf(Error);
    expect(error.kind).toBe('UndeclaredReference');
    expect(error.field).toBe('accepting');
    expect(error.line).toBeUndefined();
    expect(error.name).toBe('AutomatonError');
  });
});

test('expectValid() unwraps or throws', () => {
  expect(expectValid(ok(5))).toBe(5);
  expect(() => expectValid(err(malformedInput('bad')))).toThrow(
    'Invariant violation: bad'
  );
});

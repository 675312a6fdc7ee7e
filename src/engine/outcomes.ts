/**
 * Outcome signalling for test bodies run by the tree executor.
 *
 * A body that throws TestAbortedError finishes aborted; any other thrown
 * value finishes failed.
 */

export class AssertionFailedError extends Error {
  constructor(
    message = 'Assertion failed',
    public expected?: unknown,
    public actual?: unknown,
  ) {
    super(message);
    this.name = 'AssertionFailedError';
  }
}

/** Signals an unmet precondition; the test is aborted, not failed. */
export class TestAbortedError extends Error {
  constructor(message = 'Assumption failed') {
    super(message);
    this.name = 'TestAbortedError';
  }
}

export function fail(message?: string): never {
  throw new AssertionFailedError(message);
}

export function assumeTrue(condition: boolean, message?: string): void {
  if (!condition) {
    throw new TestAbortedError(message ?? 'Assumption failed: condition was false');
  }
}

/** A failure message, or a function producing it only when the assertion fails. */
export type MessageSource = string | (() => string);

export function assertEquals<T>(expected: T, actual: T, message?: MessageSource): void {
  if (!Object.is(expected, actual)) {
    throw new AssertionFailedError(
      `${messagePrefix(message)}expected: ${formatValue(expected)} but was: ${formatValue(actual)}`,
      expected,
      actual,
    );
  }
}

export function assertNull(actual: unknown, message?: MessageSource): void {
  if (actual !== null) {
    throw new AssertionFailedError(
      `${messagePrefix(message)}expected: <null> but was: ${formatValue(actual)}`,
      null,
      actual,
    );
  }
}

function messagePrefix(message: MessageSource | undefined): string {
  const text = typeof message === 'function' ? message() : message;
  return text ? `${text} ==> ` : '';
}

/**
 * `<text>` for a value; a value that merely renders like null or undefined
 * is qualified with its type, e.g. `string<null>`.
 */
function formatValue(value: unknown): string {
  const text = String(value);
  if (value !== null && value !== undefined && (text === 'null' || text === 'undefined')) {
    return `${typeName(value)}<${text}>`;
  }
  return `<${text}>`;
}

function typeName(value: unknown): string {
  if (typeof value === 'object' && value !== null) return value.constructor?.name ?? 'Object';
  return typeof value;
}

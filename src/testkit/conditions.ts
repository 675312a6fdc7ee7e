/**
 * Composable conditions over recorded events.
 *
 * A condition is a predicate plus a human-readable description; the
 * description is what mismatch diagnostics print. Conditions compose by
 * AND (allOf, and the variadic builders below).
 */

import { EventKind, ExecutionEvent } from '../domain/events';
import { UniqueId } from '../domain/identifier';
import { NodeKind } from '../domain/node';
import { ExecutionResult, ResultStatus } from '../domain/result';

export interface Condition<T> {
  description: string;
  matches(value: T): boolean;
}

export function condition<T>(description: string, predicate: (value: T) => boolean): Condition<T> {
  return { description, matches: predicate };
}

export function allOf<T>(...conditions: Condition<T>[]): Condition<T> {
  if (conditions.length === 1) return conditions[0];
  const description = conditions.length === 0 ? 'anything' : conditions.map((c) => c.description).join(' and ');
  return condition(description, (value) => conditions.every((c) => c.matches(value)));
}

export function not<T>(inner: Condition<T>): Condition<T> {
  return condition(`not (${inner.description})`, (value) => !inner.matches(value));
}

// ---------------------------------------------------------------------------
// Event conditions
// ---------------------------------------------------------------------------

/** An event satisfying every given condition. */
export function event(...conditions: Condition<ExecutionEvent>[]): Condition<ExecutionEvent> {
  const inner = allOf(...conditions);
  return condition(`event matching (${inner.description})`, (e) => inner.matches(e));
}

/** An event for a test (leaf) node, optionally narrowed further. */
export function testNode(...conditions: Condition<ExecutionEvent>[]): Condition<ExecutionEvent> {
  return allOf(nodeKind(NodeKind.Test), ...conditions);
}

/** An event for a container node, optionally narrowed further. */
export function containerNode(...conditions: Condition<ExecutionEvent>[]): Condition<ExecutionEvent> {
  return allOf(nodeKind(NodeKind.Container), ...conditions);
}

export function nodeKind(kind: NodeKind): Condition<ExecutionEvent> {
  return condition(`${kind} node`, (e) => e.testIdentifier.kind === kind);
}

/** Compares parsed identifiers, so any valid spelling of the expected id matches. */
export function uniqueId(expected: string | UniqueId): Condition<ExecutionEvent> {
  const id = typeof expected === 'string' ? UniqueId.parse(expected) : expected;
  return condition(`unique id '${id.toString()}'`, (e) => e.testIdentifier.uniqueId.equals(id));
}

/** The node's unique id ends with a segment of this type (and value, when given). */
export function lastSegment(type: string, value?: string): Condition<ExecutionEvent> {
  const shown = value === undefined ? `[${type}:*]` : `[${type}:${value}]`;
  return condition(`unique id ending in ${shown}`, (e) => {
    const last = e.testIdentifier.uniqueId.lastSegment();
    return last.type === type && (value === undefined || last.value === value);
  });
}

export function displayName(expected: string): Condition<ExecutionEvent> {
  return condition(`display name '${expected}'`, (e) => e.testIdentifier.displayName === expected);
}

export function eventKind(kind: EventKind): Condition<ExecutionEvent> {
  return condition(kind, (e) => e.kind === kind);
}

export function started(): Condition<ExecutionEvent> {
  return eventKind(EventKind.Started);
}

export function skipped(): Condition<ExecutionEvent> {
  return eventKind(EventKind.Skipped);
}

export function skippedWithReason(expected?: string | RegExp): Condition<ExecutionEvent> {
  if (expected === undefined) return skipped();
  return condition(`skipped with reason ${describeExpectation(expected)}`, (e) =>
    e.kind === EventKind.Skipped && matchesText(e.reason, expected),
  );
}

/** A finished event whose result satisfies every given condition. */
export function finished(...conditions: Condition<ExecutionResult>[]): Condition<ExecutionEvent> {
  const inner = allOf(...conditions);
  const description = conditions.length === 0 ? 'finished' : `finished with ${inner.description}`;
  return condition(description, (e) => e.kind === EventKind.Finished && inner.matches(e.result));
}

export function finishedSuccessfully(): Condition<ExecutionEvent> {
  return finished(status(ResultStatus.Successful));
}

export function finishedWithFailure(...causeConditions: Condition<unknown>[]): Condition<ExecutionEvent> {
  return finished(status(ResultStatus.Failed), ...causeList(causeConditions));
}

export function abortedWithReason(...causeConditions: Condition<unknown>[]): Condition<ExecutionEvent> {
  return finished(status(ResultStatus.Aborted), ...causeList(causeConditions));
}

// ---------------------------------------------------------------------------
// Result and cause conditions
// ---------------------------------------------------------------------------

export function status(expected: ResultStatus): Condition<ExecutionResult> {
  return condition(`status ${expected}`, (r) => r.status === expected);
}

export function cause(...conditions: Condition<unknown>[]): Condition<ExecutionResult> {
  const inner = allOf(...conditions);
  return condition(`cause that is ${inner.description}`, (r) => inner.matches(r.cause));
}

export function instanceOf<T>(ctor: new (...args: never[]) => T): Condition<unknown> {
  return condition(`instance of ${ctor.name}`, (value) => value instanceof ctor);
}

export function message(expected: string | RegExp): Condition<unknown> {
  return condition(`message ${describeExpectation(expected)}`, (value) =>
    value instanceof Error && matchesText(value.message, expected),
  );
}

function causeList(conditions: Condition<unknown>[]): Condition<ExecutionResult>[] {
  return conditions.length === 0 ? [] : [cause(...conditions)];
}

function matchesText(actual: string, expected: string | RegExp): boolean {
  return typeof expected === 'string' ? actual === expected : expected.test(actual);
}

function describeExpectation(expected: string | RegExp): string {
  return typeof expected === 'string' ? `'${expected}'` : String(expected);
}

/**
 * Execution event domain model.
 *
 * Events form a closed tagged union so consumers handle every kind
 * exhaustively. A new kind is a schema change, not a subclass.
 */

import { TestIdentifier } from './node';
import { ExecutionResult } from './result';

export enum EventKind {
  Started = 'started',
  Skipped = 'skipped',
  Finished = 'finished',
}

/** What an executor hands to the bus. */
export type EventInput =
  | { kind: EventKind.Started; testIdentifier: TestIdentifier }
  | { kind: EventKind.Skipped; testIdentifier: TestIdentifier; reason: string }
  | { kind: EventKind.Finished; testIdentifier: TestIdentifier; result: ExecutionResult };

/** Fields the bus stamps onto every delivered event. */
interface EventEnvelope {
  /** 1-based position in the session's total order. */
  sequence: number;
  sessionId: string;
  timestamp: string;
}

export type StartedEvent = EventEnvelope & { kind: EventKind.Started; testIdentifier: TestIdentifier };
export type SkippedEvent = EventEnvelope & { kind: EventKind.Skipped; testIdentifier: TestIdentifier; reason: string };
export type FinishedEvent = EventEnvelope & {
  kind: EventKind.Finished;
  testIdentifier: TestIdentifier;
  result: ExecutionResult;
};

export type ExecutionEvent = StartedEvent | SkippedEvent | FinishedEvent;

/** One-line rendering used in diagnostics. */
export function formatEvent(event: ExecutionEvent): string {
  const head = `#${event.sequence} ${event.kind} ${event.testIdentifier.kind} ${event.testIdentifier.uniqueId.toString()}`;
  switch (event.kind) {
    case EventKind.Started:
      return head;
    case EventKind.Skipped:
      return `${head} (reason: ${event.reason})`;
    case EventKind.Finished:
      return `${head} -> ${event.result.status}${formatCause(event.result.cause)}`;
  }
}

function formatCause(cause: unknown): string {
  if (cause === undefined) return '';
  if (cause instanceof Error) return ` [${cause.name}: ${cause.message}]`;
  return ` [${String(cause)}]`;
}

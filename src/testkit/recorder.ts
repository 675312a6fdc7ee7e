/**
 * Listener that records every delivered event into its own log.
 *
 * Attached to a bus, it keeps the bus-stamped event being delivered, so
 * sequence numbers and timestamps are the bus's own. Without a bus (for
 * callbacks driven by hand) it stamps a local sequence.
 */

import { EventInput, EventKind, ExecutionEvent } from '../domain/events';
import { NodeKind, TestIdentifier } from '../domain/node';
import { ExecutionResult } from '../domain/result';
import { ExecutionEventBus } from '../engine/event-bus';
import { ExecutionListener } from '../engine/listener';
import { Events } from './events';

export class EventRecorder implements ExecutionListener {
  readonly name = 'EventRecorder';
  private log: ExecutionEvent[] = [];
  private sessionEnded = false;
  private readonly sessionId: string;

  constructor(private readonly bus?: ExecutionEventBus) {
    this.sessionId = bus?.sessionId ?? 'unknown';
  }

  onStarted(testIdentifier: TestIdentifier): void {
    this.record({ kind: EventKind.Started, testIdentifier });
  }

  onSkipped(testIdentifier: TestIdentifier, reason: string): void {
    this.record({ kind: EventKind.Skipped, testIdentifier, reason });
  }

  onFinished(testIdentifier: TestIdentifier, result: ExecutionResult): void {
    this.record({ kind: EventKind.Finished, testIdentifier, result });
  }

  sessionFinished(): void {
    this.sessionEnded = true;
  }

  isSessionFinished(): boolean {
    return this.sessionEnded;
  }

  /** Snapshot of everything recorded so far. */
  allEvents(): Events {
    return new Events(this.log, 'All');
  }

  testEvents(): Events {
    return new Events(
      this.log.filter((e) => e.testIdentifier.kind === NodeKind.Test),
      'Test',
    );
  }

  containerEvents(): Events {
    return new Events(
      this.log.filter((e) => e.testIdentifier.kind === NodeKind.Container),
      'Container',
    );
  }

  private record(input: EventInput): void {
    const delivered = this.bus?.currentEvent();
    if (delivered && delivered.kind === input.kind && delivered.testIdentifier === input.testIdentifier) {
      this.log.push(delivered);
      return;
    }
    this.log.push({
      ...input,
      sequence: this.log.length + 1,
      sessionId: this.sessionId,
      timestamp: new Date().toISOString(),
    });
  }
}

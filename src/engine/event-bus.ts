/**
 * Execution Event Bus.
 *
 * The single producer of a session's lifecycle events. Each published event
 * is stamped with the next sequence number and delivered synchronously to
 * every registered listener, in registration order, before the next event
 * is delivered. The bus validates ordering per unique id; container
 * completeness is the executor's business.
 */

import { v4 as uuid } from 'uuid';
import {
  TypedError,
  ListenerError,
  duplicateRootError,
  listenerCallbackError,
  parentNotStartedError,
  registrationClosedError,
  sessionClosedError,
} from '../domain/errors';
import { EventInput, EventKind, ExecutionEvent } from '../domain/events';
import { NodeState, targetStateFor } from '../domain/lifecycle';
import { TestIdentifier, isRoot } from '../domain/node';
import { ExecutionResult } from '../domain/result';
import { UniqueId } from '../domain/identifier';
import { Logger, sessionLogger } from '../logger';
import { ExecutionListener, listenerName } from './listener';
import { isTerminalNodeState, transitionNodeState } from './state-machine';

export type ListenerCallback = 'onStarted' | 'onSkipped' | 'onFinished' | 'sessionFinished';

/** A fault raised by a listener, kept apart from test results. */
export interface ListenerFailure {
  listener: string;
  callback: ListenerCallback;
  /** The node being delivered when the listener threw; absent for sessionFinished. */
  testIdentifier?: TestIdentifier;
  error: TypedError;
  /** The value the listener threw. */
  cause: unknown;
}

/** Event bus configuration. */
export interface EventBusConfig {
  /** Session id; generated when omitted. */
  sessionId: string;
  /** Invoked for every listener failure, after it was recorded. */
  onListenerError?: (failure: ListenerFailure) => void;
}

/** Error thrown for events the bus refuses to deliver. */
export class EventBusError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'EventBusError';
  }
}

export class ExecutionEventBus {
  readonly sessionId: string;
  private listeners: ExecutionListener[] = [];
  private states = new Map<string, NodeState>();
  private failures: ListenerFailure[] = [];
  private pending: ExecutionEvent[] = [];
  private sequence = 0;
  private rootId?: UniqueId;
  private ended = false;
  private delivering = false;
  private inFlight?: ExecutionEvent;
  private teardownDone = false;
  private onListenerError?: (failure: ListenerFailure) => void;
  private log: Logger;

  constructor(listeners: ExecutionListener[] = [], config?: Partial<EventBusConfig>) {
    this.sessionId = config?.sessionId ?? `session_${uuid()}`;
    this.onListenerError = config?.onListenerError;
    this.log = sessionLogger(this.sessionId);
    for (const listener of listeners) {
      this.register(listener);
    }
  }

  /** Add a listener. Only allowed before the first event. */
  register(listener: ExecutionListener): void {
    if (this.sequence > 0) {
      throw new EventBusError(registrationClosedError(this.sessionId));
    }
    this.listeners.push(listener);
  }

  started(testIdentifier: TestIdentifier): ExecutionEvent {
    return this.publish({ kind: EventKind.Started, testIdentifier });
  }

  skipped(testIdentifier: TestIdentifier, reason: string): ExecutionEvent {
    return this.publish({ kind: EventKind.Skipped, testIdentifier, reason });
  }

  finished(testIdentifier: TestIdentifier, result: ExecutionResult): ExecutionEvent {
    return this.publish({ kind: EventKind.Finished, testIdentifier, result });
  }

  /**
   * Validate, stamp and deliver an event. A publish issued from inside a
   * listener callback is queued behind the event being delivered.
   */
  publish(input: EventInput): ExecutionEvent {
    const node = input.testIdentifier;
    const id = node.uniqueId.toString();

    if (this.ended) {
      throw new EventBusError(sessionClosedError(this.sessionId, id));
    }
    this.checkHierarchy(node);

    const current = this.states.get(id) ?? NodeState.NotStarted;
    const transition = transitionNodeState(id, current, targetStateFor(input.kind));
    if (!transition.success) {
      throw new EventBusError(transition.error);
    }
    this.states.set(id, transition.newStatus);

    if (this.sequence === 0) {
      this.log.debug('Session started', { listeners: this.listeners.length });
    }
    this.sequence += 1;
    const event: ExecutionEvent = {
      ...input,
      sequence: this.sequence,
      sessionId: this.sessionId,
      timestamp: new Date().toISOString(),
    };

    if (isRoot(node)) {
      this.rootId = node.uniqueId;
      if (isTerminalNodeState(transition.newStatus)) {
        this.ended = true;
      }
    }

    this.pending.push(event);
    if (!this.delivering) {
      this.drain();
    }
    return event;
  }

  /**
   * End the session without a root terminal event. Listeners receive
   * sessionFinished() exactly once, whichever comes first.
   */
  close(): void {
    this.ended = true;
    if (!this.delivering) {
      this.finishSession();
    }
  }

  isEnded(): boolean {
    return this.ended;
  }

  /** Lifecycle state of a node as seen by this bus. */
  stateOf(uniqueId: UniqueId): NodeState {
    return this.states.get(uniqueId.toString()) ?? NodeState.NotStarted;
  }

  /** The stamped event whose callbacks are running, if any. */
  currentEvent(): ExecutionEvent | undefined {
    return this.inFlight;
  }

  /** Number of events published so far. */
  eventCount(): number {
    return this.sequence;
  }

  getListenerFailures(): ListenerFailure[] {
    return [...this.failures];
  }

  private checkHierarchy(node: TestIdentifier): void {
    const id = node.uniqueId.toString();
    if (node.parentId === undefined) {
      if (this.rootId && !this.rootId.equals(node.uniqueId)) {
        throw new EventBusError(duplicateRootError(this.sessionId, this.rootId.toString(), id));
      }
      return;
    }
    const parentState = this.states.get(node.parentId.toString()) ?? NodeState.NotStarted;
    if (parentState !== NodeState.Started) {
      throw new EventBusError(parentNotStartedError(id, node.parentId.toString(), parentState));
    }
  }

  private drain(): void {
    this.delivering = true;
    try {
      let next = this.pending.shift();
      while (next !== undefined) {
        this.inFlight = next;
        this.deliver(next);
        next = this.pending.shift();
      }
    } finally {
      this.delivering = false;
      this.inFlight = undefined;
    }
    if (this.ended) {
      this.finishSession();
    }
  }

  private deliver(event: ExecutionEvent): void {
    for (const listener of this.listeners) {
      try {
        switch (event.kind) {
          case EventKind.Started:
            listener.onStarted(event.testIdentifier);
            break;
          case EventKind.Skipped:
            listener.onSkipped(event.testIdentifier, event.reason);
            break;
          case EventKind.Finished:
            listener.onFinished(event.testIdentifier, event.result);
            break;
        }
      } catch (err) {
        this.recordFailure(listener, callbackFor(event), err, event.testIdentifier);
      }
    }
  }

  private finishSession(): void {
    if (this.teardownDone) return;
    this.teardownDone = true;
    for (const listener of this.listeners) {
      if (!listener.sessionFinished) continue;
      try {
        listener.sessionFinished();
      } catch (err) {
        this.recordFailure(listener, 'sessionFinished', err);
      }
    }
    this.log.debug('Session finished', {
      events: this.sequence,
      listenerFailures: this.failures.length,
    });
  }

  private recordFailure(
    listener: ExecutionListener,
    callback: ListenerCallback,
    cause: unknown,
    testIdentifier?: TestIdentifier,
  ): void {
    const name = listenerName(listener);
    const error = cause instanceof ListenerError ? cause.typedError : listenerCallbackError(name, callback, cause);
    const failure: ListenerFailure = { listener: name, callback, testIdentifier, error, cause };
    this.failures.push(failure);

    this.log.error('Listener failed', {
      listener: name,
      callback,
      code: error.code,
      error: error.message,
      uniqueId: testIdentifier?.uniqueId.toString(),
    });

    if (this.onListenerError) {
      try {
        this.onListenerError(failure);
      } catch (hookErr) {
        this.log.error('Listener error hook failed', {
          error: hookErr instanceof Error ? hookErr.message : String(hookErr),
        });
      }
    }
  }
}

function callbackFor(event: ExecutionEvent): ListenerCallback {
  switch (event.kind) {
    case EventKind.Started:
      return 'onStarted';
    case EventKind.Skipped:
      return 'onSkipped';
    case EventKind.Finished:
      return 'onFinished';
  }
}

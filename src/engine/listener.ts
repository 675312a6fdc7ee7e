/**
 * Listener contract consumed by the event bus.
 */

import { TestIdentifier } from '../domain/node';
import { ExecutionResult } from '../domain/result';

export interface ExecutionListener {
  /** Name used in listener failure reports. Defaults to the class name. */
  readonly name?: string;
  onStarted(testIdentifier: TestIdentifier): void;
  onSkipped(testIdentifier: TestIdentifier, reason: string): void;
  onFinished(testIdentifier: TestIdentifier, result: ExecutionResult): void;
  /** Called once after the session's root reached a terminal state, or on close(). */
  sessionFinished?(): void;
}

/** Base class with no-op callbacks; override what you need. */
export abstract class BaseExecutionListener implements ExecutionListener {
  onStarted(_testIdentifier: TestIdentifier): void {}
  onSkipped(_testIdentifier: TestIdentifier, _reason: string): void {}
  onFinished(_testIdentifier: TestIdentifier, _result: ExecutionResult): void {}
}

export function listenerName(listener: ExecutionListener): string {
  return listener.name ?? listener.constructor.name;
}

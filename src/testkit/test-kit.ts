/**
 * One-call execution of a test tree with recording.
 *
 * Usage:
 *   const results = await executeTree(engine('unit', [...]));
 *   results.testEvents()
 *     .assertStatistics((stats) => stats.started(3).succeeded(3))
 *     .assertEventsMatchLoosely(event(testNode(uniqueId(id)), finishedSuccessfully()));
 */

import { ContainerDefinition } from '../domain/test-tree';
import { ExecutionEventBus, ListenerFailure } from '../engine/event-bus';
import { TreeExecutor } from '../engine/executor';
import { ExecutionListener } from '../engine/listener';
import { Events } from './events';
import { EventRecorder } from './recorder';

export interface ExecuteTreeOptions {
  /** Registered after the recorder, in the given order. */
  listeners?: ExecutionListener[];
  parallel?: boolean;
  sessionId?: string;
  onListenerError?: (failure: ListenerFailure) => void;
}

export interface ExecutionResults {
  sessionId: string;
  allEvents(): Events;
  testEvents(): Events;
  containerEvents(): Events;
  listenerFailures(): ListenerFailure[];
}

export async function executeTree(
  root: ContainerDefinition,
  options: ExecuteTreeOptions = {},
): Promise<ExecutionResults> {
  const bus = new ExecutionEventBus([], {
    sessionId: options.sessionId,
    onListenerError: options.onListenerError,
  });
  const recorder = new EventRecorder(bus);
  bus.register(recorder);
  for (const listener of options.listeners ?? []) {
    bus.register(listener);
  }

  await new TreeExecutor(bus, { parallel: options.parallel ?? false }).execute(root);

  return {
    sessionId: bus.sessionId,
    allEvents: () => recorder.allEvents(),
    testEvents: () => recorder.testEvents(),
    containerEvents: () => recorder.containerEvents(),
    listenerFailures: () => bus.getListenerFailures(),
  };
}

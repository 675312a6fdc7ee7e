/**
 * Per-node lifecycle.
 *
 * not_started -> skipped (terminal)
 * not_started -> started -> finished (terminal)
 */

import { EventKind } from './events';

export enum NodeState {
  NotStarted = 'not_started',
  Started = 'started',
  Skipped = 'skipped',
  Finished = 'finished',
}

/** Valid state transitions for a node. */
export const VALID_NODE_TRANSITIONS: Record<NodeState, NodeState[]> = {
  [NodeState.NotStarted]: [NodeState.Started, NodeState.Skipped],
  [NodeState.Started]: [NodeState.Finished],
  [NodeState.Skipped]: [],
  [NodeState.Finished]: [],
};

/** The state an event of the given kind moves its node into. */
export function targetStateFor(kind: EventKind): NodeState {
  switch (kind) {
    case EventKind.Started:
      return NodeState.Started;
    case EventKind.Skipped:
      return NodeState.Skipped;
    case EventKind.Finished:
      return NodeState.Finished;
  }
}

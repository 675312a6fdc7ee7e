/**
 * Node state machine.
 *
 * Enforces valid lifecycle transitions per unique id, producing typed
 * errors on invalid transitions.
 */

import { NodeState, VALID_NODE_TRANSITIONS } from '../domain/lifecycle';
import { TypedError, invalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a node state transition. */
export function transitionNodeState(
  uniqueId: string,
  current: NodeState,
  target: NodeState,
): TransitionResult<NodeState> {
  const validTargets = VALID_NODE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: invalidTransitionError(uniqueId, current, target),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a node state is terminal. */
export function isTerminalNodeState(state: NodeState): boolean {
  return state === NodeState.Skipped || state === NodeState.Finished;
}

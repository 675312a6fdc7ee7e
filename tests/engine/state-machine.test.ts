import { transitionNodeState, isTerminalNodeState } from '../../src/engine/state-machine';
import { NodeState, targetStateFor } from '../../src/domain/lifecycle';
import { EventKind } from '../../src/domain/events';

const ID = '[engine:unit]/[method:a()]';

describe('Node State Machine', () => {
  test('valid transition: not_started -> started', () => {
    const result = transitionNodeState(ID, NodeState.NotStarted, NodeState.Started);
    expect(result).toEqual({ success: true, newStatus: NodeState.Started });
  });

  test('valid transition: not_started -> skipped', () => {
    const result = transitionNodeState(ID, NodeState.NotStarted, NodeState.Skipped);
    expect(result.success).toBe(true);
  });

  test('valid transition: started -> finished', () => {
    const result = transitionNodeState(ID, NodeState.Started, NodeState.Finished);
    expect(result.success).toBe(true);
  });

  test('invalid transition: not_started -> finished', () => {
    const result = transitionNodeState(ID, NodeState.NotStarted, NodeState.Finished);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('EVENT.INVALID_TRANSITION');
    expect(result.error.message).toBe(`Invalid lifecycle transition for ${ID}: not_started -> finished`);
  });

  test('invalid transition: started -> started', () => {
    expect(transitionNodeState(ID, NodeState.Started, NodeState.Started).success).toBe(false);
  });

  test('invalid transition: started -> skipped', () => {
    expect(transitionNodeState(ID, NodeState.Started, NodeState.Skipped).success).toBe(false);
  });

  test('no transition leaves a terminal state', () => {
    for (const target of Object.values(NodeState)) {
      expect(transitionNodeState(ID, NodeState.Skipped, target).success).toBe(false);
      expect(transitionNodeState(ID, NodeState.Finished, target).success).toBe(false);
    }
  });

  test('terminal state detection', () => {
    expect(isTerminalNodeState(NodeState.Skipped)).toBe(true);
    expect(isTerminalNodeState(NodeState.Finished)).toBe(true);
    expect(isTerminalNodeState(NodeState.Started)).toBe(false);
    expect(isTerminalNodeState(NodeState.NotStarted)).toBe(false);
  });

  test('event kinds map to target states', () => {
    expect(targetStateFor(EventKind.Started)).toBe(NodeState.Started);
    expect(targetStateFor(EventKind.Skipped)).toBe(NodeState.Skipped);
    expect(targetStateFor(EventKind.Finished)).toBe(NodeState.Finished);
  });
});

/**
 * Node descriptors handed to listeners.
 */

import { UniqueId } from './identifier';

/** Only test nodes produce outcomes; containers aggregate descendants. */
export enum NodeKind {
  Container = 'container',
  Test = 'test',
}

/** Describes one node of the execution tree. */
export interface TestIdentifier {
  uniqueId: UniqueId;
  /** Absent for the session root. */
  parentId?: UniqueId;
  kind: NodeKind;
  displayName: string;
}

export function isTest(node: TestIdentifier): boolean {
  return node.kind === NodeKind.Test;
}

export function isContainer(node: TestIdentifier): boolean {
  return node.kind === NodeKind.Container;
}

export function isRoot(node: TestIdentifier): boolean {
  return node.parentId === undefined;
}

/** Build a descriptor; the display name defaults to the last segment value. */
export function createTestIdentifier(params: {
  uniqueId: UniqueId;
  kind: NodeKind;
  parentId?: UniqueId;
  displayName?: string;
}): TestIdentifier {
  return Object.freeze({
    uniqueId: params.uniqueId,
    parentId: params.parentId,
    kind: params.kind,
    displayName: params.displayName ?? params.uniqueId.lastSegment().value,
  });
}

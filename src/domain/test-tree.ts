/**
 * Test tree definitions.
 *
 * The already-discovered tree the reference executor walks. Static nodes
 * carry their own segment; nodes produced by a test factory get their ids
 * lazily, when execution reaches them.
 */

import { Segment, SegmentType } from './identifier';

export type TestBody = () => void | Promise<void>;

interface DefinitionBase {
  segment: Segment;
  displayName?: string;
  /** Reason the node is disabled; a disabled node is skipped with its subtree. */
  disabled?: string;
}

export interface ContainerDefinition extends DefinitionBase {
  kind: 'container';
  children: NodeDefinition[];
}

export interface TestDefinition extends DefinitionBase {
  kind: 'test';
  body: TestBody;
}

export interface FactoryDefinition extends DefinitionBase {
  kind: 'factory';
  factory: () => DynamicNode[] | Promise<DynamicNode[]>;
}

export type NodeDefinition = ContainerDefinition | TestDefinition | FactoryDefinition;

export type DynamicNode =
  | { kind: 'dynamic-test'; displayName: string; body: TestBody }
  | { kind: 'dynamic-container'; displayName: string; children: DynamicNode[] };

export interface NodeOptions {
  displayName?: string;
  disabled?: string;
}

export function engine(engineId: string, children: NodeDefinition[]): ContainerDefinition {
  return container(SegmentType.Engine, engineId, children);
}

export function container(
  type: string,
  value: string,
  children: NodeDefinition[],
  options: NodeOptions = {},
): ContainerDefinition {
  return { kind: 'container', segment: { type, value }, children, ...options };
}

export function testCase(type: string, value: string, body: TestBody, options: NodeOptions = {}): TestDefinition {
  return { kind: 'test', segment: { type, value }, body, ...options };
}

export function testFactory(
  type: string,
  value: string,
  factory: () => DynamicNode[] | Promise<DynamicNode[]>,
  options: NodeOptions = {},
): FactoryDefinition {
  return { kind: 'factory', segment: { type, value }, factory, ...options };
}

export function dynamicTest(displayName: string, body: TestBody): DynamicNode {
  return { kind: 'dynamic-test', displayName, body };
}

export function dynamicContainer(displayName: string, children: DynamicNode[]): DynamicNode {
  return { kind: 'dynamic-container', displayName, children };
}

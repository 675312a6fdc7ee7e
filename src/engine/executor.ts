/**
 * Tree Executor, the reference driver for the event bus.
 *
 * Walks an already-discovered tree depth-first, publishing started/skipped/
 * finished events for every node. Test bodies may be async; with `parallel`
 * enabled sibling subtrees run concurrently and their events interleave in
 * completion order.
 */

import { SegmentType, UniqueId } from '../domain/identifier';
import { NodeKind, TestIdentifier, createTestIdentifier } from '../domain/node';
import { ExecutionResult, aborted, failed, successful } from '../domain/result';
import {
  ContainerDefinition,
  DynamicNode,
  FactoryDefinition,
  NodeDefinition,
  TestBody,
} from '../domain/test-tree';
import { ExecutionEventBus } from './event-bus';
import { TestAbortedError } from './outcomes';

/** Executor configuration. */
export interface ExecutorConfig {
  /** Run sibling subtrees concurrently. */
  parallel: boolean;
}

const DEFAULT_CONFIG: ExecutorConfig = {
  parallel: false,
};

type Task = () => Promise<void>;

export class TreeExecutor {
  private config: ExecutorConfig;

  constructor(
    private bus: ExecutionEventBus,
    config?: Partial<ExecutorConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Execute the tree rooted at `root`; resolves after the root's terminal event. */
  async execute(root: ContainerDefinition): Promise<void> {
    await this.executeNode(root, UniqueId.root(root.segment.type, root.segment.value));
  }

  private async executeNode(def: NodeDefinition, uniqueId: UniqueId, parentId?: UniqueId): Promise<void> {
    const node = createTestIdentifier({
      uniqueId,
      parentId,
      kind: def.kind === 'test' ? NodeKind.Test : NodeKind.Container,
      displayName: def.displayName,
    });

    if (def.disabled !== undefined) {
      this.bus.skipped(node, def.disabled);
      return;
    }

    this.bus.started(node);
    let result: ExecutionResult;
    switch (def.kind) {
      case 'test':
        result = await runBody(def.body);
        break;
      case 'container':
        await this.runAll(
          def.children.map((child) => () =>
            this.executeNode(child, uniqueId.append(child.segment.type, child.segment.value), uniqueId),
          ),
        );
        result = successful();
        break;
      case 'factory':
        result = await this.executeFactory(def, node);
        break;
    }
    this.bus.finished(node, result);
  }

  private async executeFactory(def: FactoryDefinition, node: TestIdentifier): Promise<ExecutionResult> {
    let generated: DynamicNode[];
    try {
      generated = await def.factory();
    } catch (err) {
      return toResult(err);
    }
    await this.runDynamicChildren(generated, node.uniqueId);
    return successful();
  }

  private async runDynamicChildren(children: DynamicNode[], parentId: UniqueId): Promise<void> {
    await this.runAll(children.map((child, index) => () => this.executeDynamic(child, index + 1, parentId)));
  }

  private async executeDynamic(def: DynamicNode, position: number, parentId: UniqueId): Promise<void> {
    const type = def.kind === 'dynamic-test' ? SegmentType.DynamicTest : SegmentType.DynamicContainer;
    const node = createTestIdentifier({
      uniqueId: parentId.append(type, `#${position}`),
      parentId,
      kind: def.kind === 'dynamic-test' ? NodeKind.Test : NodeKind.Container,
      displayName: def.displayName,
    });

    this.bus.started(node);
    let result: ExecutionResult;
    if (def.kind === 'dynamic-test') {
      result = await runBody(def.body);
    } else {
      await this.runDynamicChildren(def.children, node.uniqueId);
      result = successful();
    }
    this.bus.finished(node, result);
  }

  private async runAll(tasks: Task[]): Promise<void> {
    if (this.config.parallel) {
      await Promise.all(tasks.map((task) => task()));
      return;
    }
    for (const task of tasks) {
      await task();
    }
  }
}

async function runBody(body: TestBody): Promise<ExecutionResult> {
  try {
    await body();
    return successful();
  } catch (err) {
    return toResult(err);
  }
}

function toResult(err: unknown): ExecutionResult {
  return err instanceof TestAbortedError ? aborted(err) : failed(err);
}

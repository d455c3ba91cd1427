/**
 * Plain-data snapshot of the graph behind a node, for an external renderer.
 */
import type { Node } from "./node.js";
import type { Operation } from "./operation.js";

export interface NodeInfo {
  readonly id: number;
  readonly name: string | undefined;
  readonly generation: number;
  /** `null` for a placeholder. */
  readonly shape: number[] | null;
  readonly dtype: string | null;
}

export interface OperationInfo {
  readonly id: number;
  readonly name: string;
  readonly generation: number;
  /** Node ids, in argument order. */
  readonly inputs: number[];
  /** Node ids of outputs still alive. */
  readonly outputs: number[];
}

export interface GraphSnapshot {
  readonly nodes: NodeInfo[];
  readonly operations: OperationInfo[];
}

function nodeInfo(node: Node): NodeInfo {
  return {
    id: node.id,
    name: node.name,
    generation: node.generation,
    shape: node.data ? [...node.data.shape] : null,
    dtype: node.data ? node.data.dtype : null,
  };
}

/**
 * Walk every operation reachable from `root` through creator links. Nodes
 * and operations are listed in discovery order; operation ids are local to
 * the snapshot.
 */
export function traceGraph(root: Node): GraphSnapshot {
  const nodes = new Map<Node, NodeInfo>();
  const opIds = new Map<Operation, number>();
  const operations: OperationInfo[] = [];

  const addNode = (n: Node): void => {
    if (!nodes.has(n)) nodes.set(n, nodeInfo(n));
  };

  addNode(root);
  const stack: Operation[] = root.creator ? [root.creator] : [];
  while (stack.length > 0) {
    const op = stack.pop();
    if (!op || opIds.has(op)) continue;
    opIds.set(op, opIds.size);

    const outputs: number[] = [];
    for (const ref of op.outputs) {
      const y = ref.deref();
      if (!y) continue;
      addNode(y);
      outputs.push(y.id);
    }
    for (const x of op.inputs) {
      addNode(x);
      if (x.creator) stack.push(x.creator);
    }
    operations.push({
      id: opIds.size - 1,
      name: op.name,
      generation: op.generation,
      inputs: op.inputs.map((x) => x.id),
      outputs,
    });
  }
  return { nodes: [...nodes.values()], operations };
}

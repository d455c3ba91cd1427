/**
 * Node: a graph vertex holding a buffer, its accumulated gradient and the
 * operation that produced it.
 *
 * Also hosts the backward engine, which walks creator operations in
 * decreasing generation order and pushes gradients to their inputs.
 */
import {
  AutogradError,
  NodeTypeError,
  ShapeError,
  formatShape,
  isTensorData,
  shapeSize,
  shapesEqual,
  type Dtype,
  type Shape,
  type TensorData,
} from "@rungrad/core";
import { getBackend, usingConfig } from "./config.js";
import { GradSum, type Operation } from "./operation.js";

let _nextId = 0;

export interface BackwardOptions {
  /** Keep gradients on intermediate nodes instead of clearing them once consumed. */
  readonly retainGrad?: boolean;
  /** Record the backward computation itself so gradients can be differentiated again. */
  readonly createGraph?: boolean;
}

export class Node {
  readonly id: number;
  name: string | undefined;
  data: TensorData | null;
  grad: Node | null = null;
  creator: Operation | null = null;
  generation = 0;

  constructor(data: TensorData | null, name?: string) {
    if (data !== null && !isTensorData(data)) {
      throw new NodeTypeError({
        message: `Node data must be a tensor buffer or null, got ${describe(data)}`,
      });
    }
    this.id = _nextId++;
    this.data = data;
    this.name = name;
  }

  /** The buffer, for nodes that are not placeholders. */
  get value(): TensorData {
    if (this.data === null) {
      throw new AutogradError({ message: `Node ${this.label} is a placeholder with no data` });
    }
    return this.data;
  }

  get shape(): Shape {
    return this.value.shape;
  }

  get ndim(): number {
    return this.value.shape.length;
  }

  get size(): number {
    return shapeSize(this.value.shape);
  }

  get dtype(): Dtype {
    return this.value.dtype;
  }

  get label(): string {
    return this.name ?? `#${this.id}`;
  }

  setCreator(op: Operation): void {
    this.creator = op;
    this.generation = op.generation + 1;
  }

  cleargrad(): void {
    this.grad = null;
  }

  /** Sever the link to the creator; `data` is untouched. */
  unchain(): void {
    this.creator = null;
  }

  /**
   * Detach this node and every node upstream of it from their creators, so
   * later backward passes stop here.
   */
  unchainBackward(): void {
    const seen = new Set<Operation>();
    const stack: Operation[] = [];
    if (this.creator) stack.push(this.creator);
    this.unchain();
    while (stack.length > 0) {
      const op = stack.pop();
      if (!op || seen.has(op)) continue;
      seen.add(op);
      for (const x of op.inputs) {
        if (x.creator) {
          stack.push(x.creator);
          x.unchain();
        }
      }
    }
  }

  backward(options: BackwardOptions = {}): void {
    backward(this, options);
  }

  toString(): string {
    if (this.data === null) return `Node(${this.label}, placeholder)`;
    return `Node(${this.label}, ${formatShape(this.data.shape)} ${this.data.dtype})`;
  }
}

function describe(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value !== "object" || value === null) return typeof value;
  return value.constructor?.name ?? "object";
}

// ── Backward engine ─────────────────────────────────────────────────────────

/** Insert keeping ascending generation order; equal generations keep arrival order. */
function enqueue(queue: Operation[], op: Operation): void {
  let i = queue.length;
  while (i > 0 && queue[i - 1].generation > op.generation) i--;
  queue.splice(i, 0, op);
}

function accumulate(x: Node, gx: Node): void {
  const xShape = x.value.shape;
  const gShape = gx.value.shape;
  if (!shapesEqual(xShape, gShape)) {
    throw new ShapeError({
      message: `gradient shape ${formatShape(gShape)} does not match ${x.label} shape ${formatShape(xShape)}`,
    });
  }
  x.grad = x.grad === null ? gx : new GradSum().callOne(x.grad, gx);
}

/**
 * Backpropagate from `node`. Seeds `node.grad` with ones when absent, then
 * runs each reachable operation's backward rule once, largest generation
 * first, so every consumer of an output has delivered its gradient before
 * the output's creator runs.
 */
export function backward(node: Node, options: BackwardOptions = {}): void {
  const { retainGrad = false, createGraph = false } = options;
  const B = getBackend();

  if (node.grad === null) {
    node.grad = new Node(B.ones(node.value.shape, node.value.dtype));
  }

  const queue: Operation[] = [];
  const seen = new Set<Operation>();
  const push = (op: Operation): void => {
    if (seen.has(op)) return;
    seen.add(op);
    enqueue(queue, op);
  };
  if (node.creator) push(node.creator);

  while (queue.length > 0) {
    const op = queue.pop();
    if (!op) break;
    const outputs = op.outputs.map((ref) => ref.deref());
    // Outputs that were dropped, or never reached by a gradient, contribute zeros.
    const gys = outputs.map((y, i) => {
      if (y?.grad) return y.grad;
      const meta = op.outputMeta[i];
      return new Node(B.zeros(meta.shape, meta.dtype));
    });

    usingConfig("enableBackprop", createGraph, () => {
      const gxs = op.runBackward(gys);
      for (let i = 0; i < op.inputs.length; i++) {
        const gx = gxs[i];
        if (gx === null) continue;
        const x = op.inputs[i];
        accumulate(x, gx);
        if (x.creator) push(x.creator);
      }
    });

    if (!retainGrad) {
      for (const y of outputs) {
        if (y) y.grad = null;
      }
    }
  }
}

/**
 * Operation base class and the graph builder.
 *
 * An operation pairs a forward rule over raw buffers with a backward rule over
 * Nodes. Because backward is written with the same differentiable functions
 * as user code, running it with recording on traces a graph of the gradient
 * computation itself, which is what makes higher-order gradients work.
 */
import {
  AutogradError,
  isFloatDtype,
  isTensorData,
  type Backend,
  type Dtype,
  type Shape,
  type TensorData,
} from "@rungrad/core";
import { getBackend, getConfig } from "./config.js";
import { Node } from "./node.js";

/** Anything an operation accepts: a node, a raw buffer, or a number (wrapped as a scalar). */
export type Input = Node | TensorData | number;

/** What an operation returns from backward: one gradient, or one per input (`null` = none). */
export type Gradients = Node | readonly (Node | null)[];

export interface OutputMeta {
  readonly shape: Shape;
  readonly dtype: Dtype;
}

function scalarDtype(inputs: readonly Input[]): Dtype {
  for (const x of inputs) {
    if (typeof x === "number") continue;
    const data = x instanceof Node ? x.data : x;
    if (data && isFloatDtype(data.dtype)) return data.dtype;
  }
  return "f32";
}

/** Wrap a raw input into a leaf Node; nodes pass through. */
export function asNode(x: Input, B: Backend = getBackend(), dtype: Dtype = "f32"): Node {
  if (x instanceof Node) return x;
  if (typeof x === "number") return new Node(B.scalar(x, dtype));
  return new Node(x);
}

export abstract class Operation {
  abstract readonly name: string;
  /** Input nodes, held strongly so backward can read them. Empty when not recording. */
  inputs: Node[] = [];
  /** Output nodes, held weakly so intermediates can be collected. */
  outputs: WeakRef<Node>[] = [];
  /** Shape and dtype of each output, kept for zero gradients of dropped outputs. */
  outputMeta: OutputMeta[] = [];
  generation = 0;
  private applied = false;

  abstract forward(xs: readonly TensorData[], B: Backend): TensorData | readonly TensorData[];

  abstract backward(gys: readonly Node[]): Gradients;

  /**
   * Apply this operation. Wraps raw inputs, runs forward, and when gradient
   * recording is on wires the outputs to this operation.
   */
  call(...inputs: Input[]): Node | Node[] {
    const outputs = this.apply(inputs);
    return outputs.length === 1 ? outputs[0] : outputs;
  }

  /** `call` for operations with exactly one output. */
  callOne(...inputs: Input[]): Node {
    const outputs = this.apply(inputs);
    if (outputs.length !== 1) {
      throw new AutogradError({
        message: `${this.name} produced ${outputs.length} outputs, expected one`,
      });
    }
    return outputs[0];
  }

  /** The live output node at `i`, if it has not been collected. */
  output(i = 0): Node | undefined {
    return this.outputs[i]?.deref();
  }

  /** Run backward and normalise the result to one entry per input. */
  runBackward(gys: readonly Node[]): (Node | null)[] {
    const result = this.backward(gys);
    const gxs = result instanceof Node ? [result] : [...result];
    if (gxs.length !== this.inputs.length) {
      throw new AutogradError({
        message: `${this.name}.backward returned ${gxs.length} gradients for ${this.inputs.length} inputs`,
      });
    }
    return gxs;
  }

  private apply(rawInputs: readonly Input[]): Node[] {
    if (this.applied) {
      throw new AutogradError({
        message: `${this.name} was already applied; create a new operation per call`,
      });
    }
    if (rawInputs.length === 0) {
      throw new AutogradError({ message: `${this.name} called with no inputs` });
    }
    this.applied = true;

    const B = getBackend();
    const dtype = scalarDtype(rawInputs);
    const inputs = rawInputs.map((x) => asNode(x, B, dtype));
    const xs = inputs.map((x) => {
      if (x.data === null) {
        throw new AutogradError({ message: `${this.name} received placeholder node ${x.label}` });
      }
      return x.data;
    });

    const ys = this.forward(xs, B);
    const outputs = (isTensorData(ys) ? [ys] : [...ys]).map((y) => new Node(y));

    if (getConfig().enableBackprop) {
      this.generation = Math.max(...inputs.map((x) => x.generation));
      for (const y of outputs) {
        y.setCreator(this);
        for (const x of inputs) {
          if (y.generation <= x.generation) {
            throw new AutogradError({
              message: `${this.name}: output generation ${y.generation} does not exceed input generation ${x.generation}`,
            });
          }
        }
      }
      this.inputs = inputs;
      this.outputs = outputs.map((y) => new WeakRef(y));
      this.outputMeta = outputs.map((y) => ({ shape: y.value.shape, dtype: y.value.dtype }));
    }
    return outputs;
  }
}

/**
 * Element-wise sum of two equally shaped gradients. The backward engine uses
 * it to accumulate gradients from several consumers.
 */
export class GradSum extends Operation {
  readonly name = "GradSum";

  forward([a, b]: readonly TensorData[], B: Backend): TensorData {
    return B.add(a, b);
  }

  backward([gy]: readonly Node[]): Gradients {
    return [gy, gy];
  }
}

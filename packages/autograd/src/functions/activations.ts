import { normalizeAxis, type Backend, type TensorData } from "@rungrad/core";
import { getBackend } from "../config.js";
import { Node } from "../node.js";
import { Operation, type Gradients, type Input } from "../operation.js";
import { mul, rsub, sub } from "./math.js";
import { sum } from "./tensor.js";

class Sigmoid extends Operation {
  readonly name = "Sigmoid";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    // 0.5 * tanh(0.5x) + 0.5 stays finite for large |x|.
    const half = B.scalar(0.5, x.dtype);
    return B.add(B.scale(B.tanh(B.scale(x, 0.5)), 0.5), half);
  }
  backward([gy]: readonly Node[]): Gradients {
    const y = this.output() ?? sigmoid(this.inputs[0]);
    return mul(gy, mul(y, rsub(y, 1)));
  }
}

class ReLU extends Operation {
  readonly name = "ReLU";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.maximum(x, B.scalar(0, x.dtype));
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x] = this.inputs;
    const B = getBackend();
    const mask = new Node(B.greater(x.value, B.scalar(0, x.dtype)));
    return mul(gy, mask);
  }
}

class Softmax extends Operation {
  readonly name = "Softmax";
  constructor(private readonly axis: number) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    const axis = normalizeAxis(this.axis, x.shape.length);
    const shifted = B.sub(x, B.max(x, axis, true));
    const e = B.exp(shifted);
    return B.div(e, B.sum(e, axis, true));
  }
  backward([gy]: readonly Node[]): Gradients {
    const y = this.output() ?? softmax(this.inputs[0], this.axis);
    const gx = mul(y, gy);
    return sub(gx, mul(y, sum(gx, this.axis, true)));
  }
}

export function sigmoid(x: Input): Node {
  return new Sigmoid().callOne(x);
}

export function relu(x: Input): Node {
  return new ReLU().callOne(x);
}

/** Softmax along `axis` (default 1, the class axis of a batch). */
export function softmax(x: Input, axis = 1): Node {
  return new Softmax(axis).callOne(x);
}

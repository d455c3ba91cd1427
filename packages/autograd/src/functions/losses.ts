import { ShapeError, formatShape, type Backend, type TensorData } from "@rungrad/core";
import { getBackend } from "../config.js";
import { Node } from "../node.js";
import { Operation, type Gradients, type Input } from "../operation.js";
import { softmax } from "./activations.js";
import { mul, neg, sub } from "./math.js";
import { broadcastTo, sumTo } from "./tensor.js";

/** Size of the leading axis; a scalar counts as one sample. */
function batchSize(shape: readonly number[]): number {
  return shape.length === 0 ? 1 : shape[0];
}

class MeanSquaredError extends Operation {
  readonly name = "MeanSquaredError";
  forward([x0, x1]: readonly TensorData[], B: Backend): TensorData {
    const diff = B.sub(x0, x1);
    return B.scale(B.sum(B.mul(diff, diff)), 1 / batchSize(diff.shape));
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x0, x1] = this.inputs;
    const diff = sub(x0, x1);
    const gx = mul(mul(broadcastTo(gy, diff.shape), diff), 2 / batchSize(diff.shape));
    return [sumTo(gx, x0.shape), sumTo(neg(gx), x1.shape)];
  }
}

class SoftmaxCrossEntropy extends Operation {
  readonly name = "SoftmaxCrossEntropy";
  forward([x, t]: readonly TensorData[], B: Backend): TensorData {
    if (x.shape.length !== 2 || t.shape.length !== 1 || t.shape[0] !== x.shape[0]) {
      throw new ShapeError({
        message: `softmaxCrossEntropy expects logits [N, C] and targets [N], got ${formatShape(x.shape)} and ${formatShape(t.shape)}`,
      });
    }
    const [n, c] = x.shape;
    const logp = B.sub(x, B.logsumexp(x, 1));
    const picked = B.sum(B.mul(logp, B.oneHot(t, c, logp.dtype)));
    return B.scale(picked, -1 / n);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x, t] = this.inputs;
    const [n, c] = x.shape;
    const B = getBackend();
    const y = softmax(x, 1);
    const target = new Node(B.oneHot(t.value, c, y.dtype));
    return [mul(sub(y, target), mul(gy, 1 / n)), null];
  }
}

/** `sum((x0 - x1)^2) / N`, with N the size of the leading axis. */
export function meanSquaredError(x0: Input, x1: Input): Node {
  return new MeanSquaredError().callOne(x0, x1);
}

/**
 * Mean cross-entropy of softmax(`x`) against integer class targets `t`.
 * `t` receives no gradient.
 */
export function softmaxCrossEntropy(x: Input, t: Input): Node {
  return new SoftmaxCrossEntropy().callOne(x, t);
}

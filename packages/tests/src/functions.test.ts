import { describe, it, expect } from "vitest";
import { CpuRefBackend } from "@rungrad/tensor";
import { ShapeError, slice, take } from "@rungrad/core";
import {
  Node,
  add, sub, rsub, mul, div, rdiv, neg, pow, square, exp, log, sin, cos, tanh,
  reshape, transpose, sum, broadcastTo, sumTo, matmul, linear, max, min, getItem,
  sigmoid, relu, softmax, meanSquaredError, softmaxCrossEntropy,
} from "@rungrad/autograd";

const B = new CpuRefBackend();

function node(data: number[], shape: number[]): Node {
  return new Node(B.fromArray(data, shape, "f64"));
}

function values(n: Node): number[] {
  return Array.from(n.value.data);
}

function grad(n: Node): number[] {
  if (n.grad === null) throw new Error(`${n.label} has no gradient`);
  return Array.from(n.grad.value.data);
}

function expectClose(actual: number[], expected: number[], digits = 10): void {
  expect(actual.length).toBe(expected.length);
  actual.forEach((v, i) => expect(v).toBeCloseTo(expected[i], digits));
}

describe("arithmetic", () => {
  it("sub routes a negated gradient to a broadcast operand", () => {
    const x0 = node([1, 2, 3], [3]);
    const x1 = node([1], []);
    const y = sub(x0, x1);
    y.backward();
    expect(values(y)).toEqual([0, 1, 2]);
    expect(grad(x0)).toEqual([1, 1, 1]);
    expect(grad(x1)).toEqual([-3]);
  });

  it("mul", () => {
    const a = node([2, 3], [2]);
    const b = node([4, 5], [2]);
    mul(a, b).backward();
    expect(grad(a)).toEqual([4, 5]);
    expect(grad(b)).toEqual([2, 3]);
  });

  it("div follows the quotient rule", () => {
    const x0 = node([6], []);
    const x1 = node([3], []);
    const y = div(x0, x1);
    y.backward();
    expect(values(y)).toEqual([2]);
    expectClose(grad(x0), [1 / 3]);
    expectClose(grad(x1), [-6 / 9]);
  });

  it("reflected sub and div", () => {
    const x = node([2], []);
    const y = rsub(x, 1);
    expect(values(y)).toEqual([-1]);
    y.backward();
    expect(grad(x)).toEqual([-1]);

    const z = node([2], []);
    const r = rdiv(z, 1);
    expect(values(r)).toEqual([0.5]);
    r.backward();
    expect(grad(z)).toEqual([-0.25]);
  });

  it("neg, pow and square", () => {
    const x = node([2], []);
    neg(x).backward();
    expect(grad(x)).toEqual([-1]);

    const p = node([2], []);
    const y = pow(p, 3);
    expect(values(y)).toEqual([8]);
    y.backward();
    expect(grad(p)).toEqual([12]);

    const s = node([3], []);
    square(s).backward();
    expect(grad(s)).toEqual([6]);
  });

  it("exp and log", () => {
    const x = node([0], []);
    exp(x).backward();
    expect(grad(x)).toEqual([1]);

    const l = node([2], []);
    log(l).backward();
    expect(grad(l)).toEqual([0.5]);
  });

  it("sin, cos and tanh", () => {
    const a = node([0.3], []);
    sin(a).backward();
    expectClose(grad(a), [Math.cos(0.3)]);

    const b = node([0.3], []);
    cos(b).backward();
    expectClose(grad(b), [-Math.sin(0.3)]);

    const c = node([0.3], []);
    tanh(c).backward();
    expectClose(grad(c), [1 - Math.tanh(0.3) ** 2]);
  });
});

describe("shape operations", () => {
  it("reshape returns the same node when the shape matches", () => {
    const x = node([1, 2, 3, 4, 5, 6], [2, 3]);
    expect(reshape(x, [2, 3])).toBe(x);
    expect(broadcastTo(x, [2, 3])).toBe(x);
    expect(sumTo(x, [2, 3])).toBe(x);
  });

  it("reshape backward restores the input shape", () => {
    const x = node([1, 2, 3, 4, 5, 6], [2, 3]);
    const y = reshape(x, [6]);
    expect(y.shape).toEqual([6]);
    y.backward();
    expect(x.grad?.shape).toEqual([2, 3]);
  });

  it("transpose with and without axes", () => {
    const x = node([1, 2, 3, 4, 5, 6], [2, 3]);
    const y = transpose(x);
    expect(y.shape).toEqual([3, 2]);
    expect(values(y)).toEqual([1, 4, 2, 5, 3, 6]);
    mul(y, node([1, 2, 3, 4, 5, 6], [3, 2])).backward();
    // Gradient is the weight matrix transposed back.
    expect(grad(x)).toEqual([1, 3, 5, 2, 4, 6]);

    const z = node([0, 1, 2, 3, 4, 5], [1, 2, 3]);
    const t = transpose(z, [2, 0, 1]);
    expect(t.shape).toEqual([3, 1, 2]);
    t.backward();
    expect(z.grad?.shape).toEqual([1, 2, 3]);
  });

  it("sum over axes with and without keepdims", () => {
    const x = node([1, 2, 3, 4, 5, 6], [2, 3]);
    const y = sum(x, 0);
    expect(values(y)).toEqual([5, 7, 9]);
    mul(y, node([1, 2, 3], [3])).backward();
    expect(grad(x)).toEqual([1, 2, 3, 1, 2, 3]);

    const k = node([1, 2, 3, 4, 5, 6], [2, 3]);
    const yk = sum(k, -1, true);
    expect(yk.shape).toEqual([2, 1]);
    mul(yk, node([10, 20], [2, 1])).backward();
    expect(grad(k)).toEqual([10, 10, 10, 20, 20, 20]);

    const all = node([1, 2, 3, 4], [2, 2]);
    const s = sum(all);
    expect(s.shape).toEqual([]);
    expect(values(s)).toEqual([10]);
  });

  it("broadcastTo and sumTo are each other's gradient", () => {
    const x = node([1, 2, 3], [3]);
    const y = broadcastTo(x, [2, 3]);
    y.backward();
    expect(grad(x)).toEqual([2, 2, 2]);

    const z = node([1, 2, 3, 4, 5, 6], [2, 3]);
    const s = sumTo(z, [1, 3]);
    expect(values(s)).toEqual([5, 7, 9]);
    s.backward();
    expect(grad(z)).toEqual([1, 1, 1, 1, 1, 1]);
  });

  it("sumTo rejects an incompatible target", () => {
    expect(() => sumTo(node([1, 2, 3], [3]), [2])).toThrow(ShapeError);
  });
});

describe("matmul and linear", () => {
  it("matmul backward", () => {
    const x = node([1, 2, 3, 4], [2, 2]);
    const w = node([5, 6, 7, 8], [2, 2]);
    const y = matmul(x, w);
    expect(values(y)).toEqual([19, 22, 43, 50]);
    y.backward();
    expect(grad(x)).toEqual([11, 15, 11, 15]);
    expect(grad(w)).toEqual([4, 4, 6, 6]);
  });

  it("matmul with a vector operand", () => {
    const v = node([1, 2], [2]);
    const m = node([1, 2, 3, 4], [2, 2]);
    const y = matmul(v, m);
    expect(y.shape).toEqual([2]);
    expect(values(y)).toEqual([7, 10]);
    y.backward();
    expect(grad(v)).toEqual([3, 7]);
    expect(grad(m)).toEqual([1, 1, 2, 2]);
  });

  it("batched matmul reduces the shared weight gradient", () => {
    const x = node([1, 0, 0, 1, 2, 0, 0, 2], [2, 2, 2]);
    const w = node([1, 2, 3, 4], [2, 2]);
    const y = matmul(x, w);
    expect(y.shape).toEqual([2, 2, 2]);
    y.backward();
    expect(w.grad?.shape).toEqual([2, 2]);
    // Sum over the batch of x^T · ones.
    expect(grad(w)).toEqual([3, 3, 3, 3]);
  });

  it("linear without a bias has two inputs", () => {
    const x = node([1, 2, 3, 4], [2, 2]);
    const w = node([5, 6, 7, 8], [2, 2]);
    const y = linear(x, w);
    expect(y.creator?.inputs.length).toBe(2);
    y.backward();
    expect(grad(x)).toEqual([11, 15, 11, 15]);
    expect(grad(w)).toEqual([4, 4, 6, 6]);
  });

  it("linear reduces the bias gradient over the batch", () => {
    const x = node([1, 2, 3, 4], [2, 2]);
    const w = node([5, 6, 7, 8], [2, 2]);
    const b = node([1, -1], [2]);
    const y = linear(x, w, b);
    expect(values(y)).toEqual([20, 21, 44, 49]);
    y.backward();
    expect(b.grad?.shape).toEqual([2]);
    expect(grad(b)).toEqual([2, 2]);
  });

  it("linear on a batch of matrices reduces the weight and bias gradients", () => {
    const x = node([1, 0, 0, 1, 2, 0, 0, 2], [2, 2, 2]);
    const w = node([1, 2, 3, 4], [2, 2]);
    const b = node([1, -1], [2]);
    const y = linear(x, w, b);
    expect(values(y)).toEqual([2, 1, 4, 3, 3, 3, 7, 7]);
    sum(y).backward();
    expect(grad(x)).toEqual([3, 7, 3, 7, 3, 7, 3, 7]);
    expect(grad(w)).toEqual([3, 3, 3, 3]);
    expect(grad(b)).toEqual([4, 4]);
  });
});

describe("max and min", () => {
  it("max routes the gradient to every maximal position", () => {
    const x = node([1, 5, 5, 2, 0, 1], [2, 3]);
    const y = max(x, 1);
    expect(values(y)).toEqual([5, 2]);
    y.backward();
    expect(grad(x)).toEqual([0, 1, 1, 1, 0, 0]);
  });

  it("min over all axes", () => {
    const x = node([3, 1, 2], [3]);
    const y = min(x);
    expect(y.shape).toEqual([]);
    y.backward();
    expect(grad(x)).toEqual([0, 1, 0]);
  });

  it("keepdims keeps the reduced axis", () => {
    const x = node([1, 5, 3, 2], [2, 2]);
    const y = max(x, 0, true);
    expect(y.shape).toEqual([1, 2]);
    expect(values(y)).toEqual([3, 5]);
  });
});

describe("getItem", () => {
  it("accumulates gradients on repeated indices", () => {
    const x = node([1, 2, 3, 4], [4]);
    const y = getItem(x, take([0, 0, 2]));
    expect(values(y)).toEqual([1, 1, 3]);
    y.backward();
    expect(grad(x)).toEqual([2, 0, 1, 0]);
  });

  it("an integer selects a row", () => {
    const x = node([1, 2, 3, 4, 5, 6], [2, 3]);
    const y = getItem(x, 1);
    expect(values(y)).toEqual([4, 5, 6]);
    y.backward();
    expect(grad(x)).toEqual([0, 0, 0, 1, 1, 1]);
  });

  it("per-axis selectors", () => {
    const x = node([1, 2, 3, 4, 5, 6], [2, 3]);
    const y = getItem(x, [slice(0, 2), slice(1)]);
    expect(y.shape).toEqual([2, 2]);
    expect(values(y)).toEqual([2, 3, 5, 6]);
    y.backward();
    expect(grad(x)).toEqual([0, 1, 1, 0, 1, 1]);
  });
});

describe("activations and losses", () => {
  it("sigmoid", () => {
    const x = node([0], []);
    const y = sigmoid(x);
    expect(values(y)).toEqual([0.5]);
    y.backward();
    expect(grad(x)).toEqual([0.25]);
  });

  it("relu masks non-positive inputs", () => {
    const x = node([-1, 0, 2], [3]);
    const y = relu(x);
    expect(values(y)).toEqual([0, 0, 2]);
    y.backward();
    expect(grad(x)).toEqual([0, 0, 1]);
  });

  it("softmax rows sum to one and the summed gradient vanishes", () => {
    const x = node([1, 2, 3, 0, 0, 0], [2, 3]);
    const y = softmax(x);
    const rows = values(sum(y, 1));
    expectClose(rows, [1, 1]);
    expectClose(values(y).slice(3), [1 / 3, 1 / 3, 1 / 3]);
    y.backward();
    expectClose(grad(x), [0, 0, 0, 0, 0, 0]);
  });

  it("meanSquaredError divides by the batch size", () => {
    const x0 = node([1, 2], [2]);
    const x1 = node([0, 0], [2]);
    const y = meanSquaredError(x0, x1);
    expect(values(y)).toEqual([2.5]);
    y.backward();
    expect(grad(x0)).toEqual([1, 2]);
    expect(grad(x1)).toEqual([-1, -2]);
  });

  it("softmaxCrossEntropy on uniform logits", () => {
    const x = node([0, 0, 0, 0, 0, 0], [2, 3]);
    const t = new Node(B.fromArray([0, 2], [2], "i32"));
    const y = softmaxCrossEntropy(x, t);
    expectClose(values(y), [Math.log(3)]);
    y.backward();
    expectClose(grad(x), [-1 / 3, 1 / 6, 1 / 6, 1 / 6, 1 / 6, -1 / 3]);
    expect(t.grad).toBeNull();
  });

  it("softmaxCrossEntropy rejects mismatched targets", () => {
    const x = node([0, 0, 0, 0, 0, 0], [2, 3]);
    const t = B.fromArray([0, 1, 2], [3], "i32");
    expect(() => softmaxCrossEntropy(x, t)).toThrow(ShapeError);
  });
});

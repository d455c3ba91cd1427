import { describe, it, expect } from "vitest";
import { CpuRefBackend } from "@rungrad/tensor";
import { take, type Backend, type TensorData } from "@rungrad/core";
import {
  Node, Operation, type Gradients,
  numericalDiff, gradientCheck,
  add, mul, div, sin, tanh, exp, sum, square, matmul, linear, getItem,
  softmax, softmaxCrossEntropy, sigmoid,
  conv2d, deconv2d, conv2dGradW, pooling, im2col, col2im,
} from "@rungrad/autograd";

const B = new CpuRefBackend(1234);

/** sin forward with an identity backward. */
class SinWithoutChainRule extends Operation {
  readonly name = "SinWithoutChainRule";
  forward([x]: readonly TensorData[], backend: Backend): TensorData {
    return backend.sin(x);
  }
  backward([gy]: readonly Node[]): Gradients {
    return gy;
  }
}

function randn(shape: number[]): TensorData {
  return B.randn(shape, "f64");
}

/** Distinct, well separated values so max pooling has no near-ties. */
function spread(shape: number[]): TensorData {
  const size = shape.reduce((a, b) => a * b, 1);
  const data = Array.from({ length: size }, (_, i) => ((i * 7) % size) * 0.1 - 0.5);
  return B.fromArray(data, shape, "f64");
}

function expectPass(report: ReturnType<typeof gradientCheck>): void {
  for (const input of report.inputs) {
    expect(input.maxAbsDiff, `input ${input.index}`).toBeLessThan(1e-5);
  }
  expect(report.ok).toBe(true);
}

describe("numericalDiff", () => {
  it("approximates the derivative of x^2 at 2", () => {
    const g = numericalDiff((x) => square(x), B.fromArray([2], [], "f64"));
    expect(g.data[0]).toBeCloseTo(4, 8);
  });

  it("treats non-scalar outputs as summed", () => {
    const g = numericalDiff((x) => mul(x, 3), B.fromArray([1, 2], [2], "f64"));
    expect(Array.from(g.data).map((v) => Math.round(v * 1e6) / 1e6)).toEqual([3, 3]);
  });
});

describe("gradientCheck", () => {
  it("agrees on element-wise math", () => {
    expectPass(gradientCheck((x) => tanh(x), [randn([3, 2])]));
    expectPass(gradientCheck((x) => sin(x), [randn([4])]));
    expectPass(gradientCheck((x) => sigmoid(exp(x)), [randn([2, 2])]));
    expectPass(gradientCheck((a, b) => div(a, add(square(b), 1)), [randn([2, 3]), randn([3])]));
  });

  it("agrees on batched matmul", () => {
    expectPass(gradientCheck((a, b) => matmul(a, b), [randn([2, 3, 4]), randn([4, 2])]));
  });

  it("agrees on linear over a batch of matrices", () => {
    const f = (x: Node, w: Node, b: Node) => tanh(linear(x, w, b));
    expectPass(gradientCheck(f, [randn([2, 3, 4]), randn([4, 2]), randn([2])]));
  });

  it("agrees on softmax and softmaxCrossEntropy", () => {
    const t = B.fromArray([2, 0, 1], [3], "i32");
    const weights = randn([3, 4]);
    expectPass(gradientCheck((x) => mul(softmax(x), weights), [randn([3, 4])]));
    expectPass(gradientCheck((x) => softmaxCrossEntropy(x, t), [randn([3, 4])]));
  });

  it("agrees on getItem with repeated indices", () => {
    expectPass(gradientCheck((x) => square(getItem(x, take([1, 1, 0]))), [randn([3, 2])]));
  });

  it("agrees on conv2d with bias and padding", () => {
    const f = (x: Node, w: Node, b: Node) => conv2d(x, w, b, 1, 1);
    expectPass(gradientCheck(f, [randn([2, 2, 4, 4]), randn([3, 2, 3, 3]), randn([3])]));
  });

  it("agrees on strided conv2d", () => {
    const f = (x: Node, w: Node) => square(conv2d(x, w, null, 2, 1));
    expectPass(gradientCheck(f, [randn([1, 1, 5, 5]), randn([2, 1, 3, 3])]));
  });

  it("agrees on deconv2d", () => {
    const f = (x: Node, w: Node, b: Node) => square(deconv2d(x, w, b, 2, 1));
    expectPass(gradientCheck(f, [randn([1, 2, 3, 3]), randn([2, 1, 3, 3]), randn([1])]));
  });

  it("agrees on conv2dGradW in both inputs", () => {
    const f = (x: Node, gy: Node) => square(conv2dGradW(x, gy, 3, 1, 1));
    expectPass(gradientCheck(f, [randn([1, 2, 4, 4]), randn([1, 2, 4, 4])]));
  });

  it("agrees on max pooling", () => {
    const f = (x: Node) => square(pooling(x, 2, 2));
    expectPass(gradientCheck(f, [spread([1, 2, 4, 4])]));
  });

  it("agrees on im2col and col2im", () => {
    expectPass(gradientCheck((x) => square(im2col(x, 2, 1, 1)), [randn([1, 1, 3, 3])]));
    const cols = randn([1, 1, 2, 2, 2, 2]);
    expectPass(gradientCheck((c) => square(col2im(c, [1, 1, 3, 3], 2)), [cols]));
  });

  it("reports a wrong gradient", () => {
    const report = gradientCheck((x) => new SinWithoutChainRule().callOne(x), [B.fromArray([0.5, 1], [2], "f64")]);
    expect(report.ok).toBe(false);
    expect(report.inputs[0].ok).toBe(false);
    expect(report.inputs[0].analytic).toEqual([1, 1]);
    expect(report.inputs[0].numeric[0]).toBeCloseTo(Math.cos(0.5), 6);
  });

  it("reports zeros for an input the output does not depend on", () => {
    const report = gradientCheck((x, _unused) => sum(x), [randn([2]), randn([3])]);
    expect(report.ok).toBe(true);
    expect(report.inputs[1].analytic).toEqual([0, 0, 0]);
  });
});

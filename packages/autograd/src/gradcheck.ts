/**
 * Finite-difference gradient checking.
 */
import type { TensorData } from "@rungrad/core";
import { getBackend } from "./config.js";
import { Node } from "./node.js";

export interface GradientCheckOptions {
  readonly eps?: number;
  readonly atol?: number;
  readonly rtol?: number;
}

export interface InputGradientCheck {
  readonly index: number;
  readonly analytic: number[];
  readonly numeric: number[];
  readonly maxAbsDiff: number;
  readonly ok: boolean;
}

export interface GradientCheckReport {
  readonly ok: boolean;
  readonly inputs: InputGradientCheck[];
}

function total(y: Node): number {
  const B = getBackend();
  return B.toArray(B.sum(y.value))[0];
}

/**
 * Central differences of `sum(f(x))` with respect to every element of `x`.
 * `f` may itself call `backward`; each evaluation gets a fresh input node.
 */
export function numericalDiff(f: (x: Node) => Node, x: TensorData, eps = 1e-4): TensorData {
  const B = getBackend();
  const base = B.toArray(x);
  const at = (values: number[]): number => total(f(new Node(B.fromArray(values, x.shape, x.dtype))));

  const grad = base.map((v, i) => {
    const plus = [...base];
    const minus = [...base];
    plus[i] = v + eps;
    minus[i] = v - eps;
    return (at(plus) - at(minus)) / (2 * eps);
  });
  return B.fromArray(grad, x.shape, x.dtype);
}

/**
 * Compare the gradients `backward` produces for `sum(f(...inputs))` with
 * central differences, input by input.
 */
export function gradientCheck(
  f: (...xs: Node[]) => Node,
  inputs: readonly TensorData[],
  options: GradientCheckOptions = {},
): GradientCheckReport {
  const { eps = 1e-4, atol = 1e-5, rtol = 1e-4 } = options;
  const B = getBackend();

  const nodes = inputs.map((x) => new Node(x));
  f(...nodes).backward();

  const checks = inputs.map((x, index): InputGradientCheck => {
    const grad = nodes[index].grad;
    const analytic = grad ? B.toArray(grad.value) : new Array<number>(x.data.length).fill(0);
    const numeric = B.toArray(
      numericalDiff((xi) => f(...inputs.map((other, j) => (j === index ? xi : new Node(other)))), x, eps),
    );
    let maxAbsDiff = 0;
    let ok = true;
    for (let i = 0; i < analytic.length; i++) {
      const diff = Math.abs(analytic[i] - numeric[i]);
      maxAbsDiff = Math.max(maxAbsDiff, diff);
      if (!(diff <= atol + rtol * Math.abs(numeric[i]))) ok = false;
    }
    return { index, analytic, numeric, maxAbsDiff, ok };
  });

  return { ok: checks.every((c) => c.ok), inputs: checks };
}

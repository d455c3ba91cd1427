/**
 * Shape, reduction, contraction and indexing operations.
 */
import {
  keepdimsShape,
  normalizeAxes,
  normalizeAxis,
  shapesEqual,
  type Axis,
  type Backend,
  type Index,
  type Shape,
  type TensorData,
} from "@rungrad/core";
import { getBackend } from "../config.js";
import { Node } from "../node.js";
import { Operation, asNode, type Gradients, type Input } from "../operation.js";
import { mul } from "./math.js";

// ── Reshape / transpose ────────────────────────────────────────────────────

class Reshape extends Operation {
  readonly name = "Reshape";
  private xShape: Shape = [];
  constructor(private readonly shape: Shape) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    this.xShape = x.shape;
    return B.reshape(x, this.shape);
  }
  backward([gy]: readonly Node[]): Gradients {
    return reshape(gy, this.xShape);
  }
}

class Transpose extends Operation {
  readonly name = "Transpose";
  private inverse: number[] | undefined;
  constructor(private readonly axes: readonly number[] | undefined) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    const ndim = x.shape.length;
    if (this.axes !== undefined) {
      const perm = this.axes.map((a) => normalizeAxis(a, ndim));
      this.inverse = perm.map((_, i) => perm.indexOf(i));
    }
    return B.permute(x, this.axes);
  }
  backward([gy]: readonly Node[]): Gradients {
    return transpose(gy, this.inverse);
  }
}

/** Reshape `x`; one dimension may be -1. Returns `x` itself when the shape already matches. */
export function reshape(x: Input, shape: Shape): Node {
  const node = asNode(x);
  if (shapesEqual(node.shape, shape)) return node;
  return new Reshape(shape).callOne(node);
}

/** Permute axes; with no `axes` the dimensions are reversed. */
export function transpose(x: Input, axes?: readonly number[]): Node {
  return new Transpose(axes).callOne(x);
}

/** Swap the last two axes. */
export function matrixTranspose(x: Input): Node {
  const node = asNode(x);
  const ndim = node.ndim;
  if (ndim < 2) return node;
  const axes = Array.from({ length: ndim }, (_, i) => i);
  axes[ndim - 2] = ndim - 1;
  axes[ndim - 1] = ndim - 2;
  return transpose(node, axes);
}

// ── Sum / broadcast ────────────────────────────────────────────────────────

class Sum extends Operation {
  readonly name = "Sum";
  private xShape: Shape = [];
  private axes: number[] = [];
  constructor(
    private readonly axis: Axis | undefined,
    private readonly keepdims: boolean,
  ) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    this.xShape = x.shape;
    this.axes = normalizeAxes(this.axis, x.shape.length);
    return B.sum(x, this.axes, this.keepdims);
  }
  backward([gy]: readonly Node[]): Gradients {
    const kept = this.keepdims ? gy : reshape(gy, keepdimsShape(this.xShape, this.axes));
    return broadcastTo(kept, this.xShape);
  }
}

class BroadcastTo extends Operation {
  readonly name = "BroadcastTo";
  private xShape: Shape = [];
  constructor(private readonly shape: Shape) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    this.xShape = x.shape;
    return B.broadcastTo(x, this.shape);
  }
  backward([gy]: readonly Node[]): Gradients {
    return sumTo(gy, this.xShape);
  }
}

class SumTo extends Operation {
  readonly name = "SumTo";
  private xShape: Shape = [];
  constructor(private readonly shape: Shape) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    this.xShape = x.shape;
    return B.sumTo(x, this.shape);
  }
  backward([gy]: readonly Node[]): Gradients {
    return broadcastTo(gy, this.xShape);
  }
}

/** Sum over `axis` (all axes when omitted or null); negative axes count from the end. */
export function sum(x: Input, axis?: Axis, keepdims = false): Node {
  return new Sum(axis, keepdims).callOne(x);
}

export function broadcastTo(x: Input, shape: Shape): Node {
  const node = asNode(x);
  if (shapesEqual(node.shape, shape)) return node;
  return new BroadcastTo(shape).callOne(node);
}

/** Sum over broadcast axes so the result has `shape`. */
export function sumTo(x: Input, shape: Shape): Node {
  const node = asNode(x);
  if (shapesEqual(node.shape, shape)) return node;
  return new SumTo(shape).callOne(node);
}

// ── Matmul / linear ────────────────────────────────────────────────────────

class MatMul extends Operation {
  readonly name = "MatMul";
  forward([x, w]: readonly TensorData[], B: Backend): TensorData {
    return B.matmul(x, w);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x, w] = this.inputs;
    const gx = matmul(gy, matrixTranspose(w));
    const gw = matmul(matrixTranspose(x), gy);
    return [sumTo(gx, x.shape), sumTo(gw, w.shape)];
  }
}

class Linear extends Operation {
  readonly name = "Linear";
  forward([x, w, b]: readonly TensorData[], B: Backend): TensorData {
    const y = B.matmul(x, w);
    return b === undefined ? y : B.add(y, b);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x, w, b] = this.inputs;
    const gx = matmul(gy, matrixTranspose(w));
    const gw = matmul(matrixTranspose(x), gy);
    const grads = [sumTo(gx, x.shape), sumTo(gw, w.shape)];
    return b === undefined ? grads : [...grads, sumTo(gy, b.shape)];
  }
}

/**
 * Matrix product with batch broadcasting. 1-D operands are promoted to
 * matrices and the added axis is removed from the result.
 */
export function matmul(x: Input, w: Input): Node {
  const a = asNode(x);
  const b = asNode(w);
  if (a.ndim >= 2 && b.ndim >= 2) return new MatMul().callOne(a, b);
  if (a.ndim === 0 || b.ndim === 0) return mul(a, b);
  const a2 = a.ndim === 1 ? reshape(a, [1, a.shape[0]]) : a;
  const b2 = b.ndim === 1 ? reshape(b, [b.shape[0], 1]) : b;
  const y = new MatMul().callOne(a2, b2);
  const outShape = y.shape.slice(0, -2);
  if (a.ndim !== 1) outShape.push(y.shape[y.ndim - 2]);
  if (b.ndim !== 1) outShape.push(y.shape[y.ndim - 1]);
  return reshape(y, outShape);
}

/** `x · W + b`; without a bias only `x` and `W` are inputs. */
export function linear(x: Input, w: Input, b?: Input | null): Node {
  const op = new Linear();
  return b === undefined || b === null ? op.callOne(x, w) : op.callOne(x, w, b);
}

// ── Max / min ──────────────────────────────────────────────────────────────

/** Reduction to an extreme value; the gradient goes to every position equal to it. */
abstract class Extremum extends Operation {
  private xShape: Shape = [];
  private axes: number[] = [];
  private extreme: TensorData | undefined;
  constructor(
    private readonly axis: Axis | undefined,
    private readonly keepdims: boolean,
  ) {
    super();
  }

  protected abstract reduce(x: TensorData, axes: readonly number[], B: Backend): TensorData;

  forward([x]: readonly TensorData[], B: Backend): TensorData {
    this.xShape = x.shape;
    this.axes = normalizeAxes(this.axis, x.shape.length);
    const kept = this.reduce(x, this.axes, B);
    this.extreme = kept;
    if (this.keepdims) return kept;
    return B.reshape(kept, x.shape.filter((_, i) => !this.axes.includes(i)));
  }

  backward([gy]: readonly Node[]): Gradients {
    const [x] = this.inputs;
    const B = getBackend();
    const extreme = this.extreme ?? this.reduce(x.value, this.axes, B);
    const mask = new Node(B.equal(x.value, extreme));
    const kept = reshape(gy, keepdimsShape(this.xShape, this.axes));
    return mul(broadcastTo(kept, this.xShape), mask);
  }
}

class Max extends Extremum {
  readonly name = "Max";
  protected reduce(x: TensorData, axes: readonly number[], B: Backend): TensorData {
    return B.max(x, axes, true);
  }
}

class Min extends Extremum {
  readonly name = "Min";
  protected reduce(x: TensorData, axes: readonly number[], B: Backend): TensorData {
    return B.min(x, axes, true);
  }
}

export function max(x: Input, axis?: Axis, keepdims = false): Node {
  return new Max(axis, keepdims).callOne(x);
}

export function min(x: Input, axis?: Axis, keepdims = false): Node {
  return new Min(axis, keepdims).callOne(x);
}

// ── Indexing ───────────────────────────────────────────────────────────────

class GetItem extends Operation {
  readonly name = "GetItem";
  constructor(private readonly index: Index) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.select(x, this.index);
  }
  backward([gy]: readonly Node[]): Gradients {
    return getItemGrad(gy, this.index, this.inputs[0].shape);
  }
}

class GetItemGrad extends Operation {
  readonly name = "GetItemGrad";
  constructor(
    private readonly index: Index,
    private readonly inShape: Shape,
  ) {
    super();
  }
  forward([gy]: readonly TensorData[], B: Backend): TensorData {
    return B.scatterAdd(this.inShape, this.index, gy);
  }
  backward([ggx]: readonly Node[]): Gradients {
    return getItem(ggx, this.index);
  }
}

/**
 * Select part of `x`. An integer drops its axis, a slice or an index list
 * keeps it; several selectors apply to leading axes in order.
 */
export function getItem(x: Input, index: Index): Node {
  return new GetItem(index).callOne(x);
}

/** Scatter-add `gy` into zeros of `inShape` at `index`; repeated positions accumulate. */
export function getItemGrad(gy: Input, index: Index, inShape: Shape): Node {
  return new GetItemGrad(index, inShape).callOne(gy);
}

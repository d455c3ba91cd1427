/**
 * Broadcast helpers, shared between the CPU ref backend and autograd ops.
 *
 * These implement NumPy-style broadcasting: shapes are right-aligned, dimensions
 * of size 1 are stretched to match the other operand.
 */
import { ShapeError } from "./errors.js";
import { formatShape, type Shape } from "./types.js";

/**
 * Broadcast two shapes and return [resultShape, stridesA, stridesB].
 * Supports: same shape, scalar broadcast, and general N-dimensional broadcast.
 */
export function broadcastShapes(sa: Shape, sb: Shape): [number[], number[], number[]] {
  const ndim = Math.max(sa.length, sb.length);
  const result: number[] = new Array<number>(ndim);
  const padA = ndim - sa.length;
  const padB = ndim - sb.length;

  for (let i = 0; i < ndim; i++) {
    const da = i < padA ? 1 : sa[i - padA];
    const db = i < padB ? 1 : sb[i - padB];
    if (da !== db && da !== 1 && db !== 1) {
      throw new ShapeError({
        message: `Cannot broadcast shapes ${formatShape(sa)} and ${formatShape(sb)}`,
      });
    }
    result[i] = Math.max(da, db);
  }

  // Build strides: if a dimension is 1 (and needs broadcasting), stride = 0.
  const stridesA = new Array<number>(ndim);
  const stridesB = new Array<number>(ndim);
  let strA = 1;
  let strB = 1;
  for (let i = ndim - 1; i >= 0; i--) {
    const da = i < padA ? 1 : sa[i - padA];
    const db = i < padB ? 1 : sb[i - padB];
    stridesA[i] = da === 1 && result[i] !== 1 ? 0 : strA;
    stridesB[i] = db === 1 && result[i] !== 1 ? 0 : strB;
    strA *= da;
    strB *= db;
  }

  return [result, stridesA, stridesB];
}

/**
 * Convert a flat index in the result to flat indices in a and b using broadcast strides.
 */
export function broadcastIndices(
  flatIdx: number,
  resultShape: Shape,
  stridesA: readonly number[],
  stridesB: readonly number[],
): [number, number] {
  const ndim = resultShape.length;
  let idxA = 0;
  let idxB = 0;
  let remainder = flatIdx;
  for (let d = ndim - 1; d >= 0; d--) {
    const coord = remainder % resultShape[d];
    remainder = (remainder - coord) / resultShape[d];
    idxA += coord * stridesA[d];
    idxB += coord * stridesB[d];
  }
  return [idxA, idxB];
}

/**
 * Compute broadcast strides for expanding a source shape into a target shape.
 * Returns stride array where dimensions of size 1 in src have stride 0.
 * Throws if target is not a broadcast of src.
 */
export function broadcastStrides(srcShape: Shape, targetShape: Shape): number[] {
  const ndim = targetShape.length;
  const pad = ndim - srcShape.length;
  if (pad < 0) {
    throw new ShapeError({
      message: `Cannot broadcast ${formatShape(srcShape)} to ${formatShape(targetShape)}`,
    });
  }
  const strides = new Array<number>(ndim);
  let str = 1;
  for (let i = ndim - 1; i >= 0; i--) {
    const srcDim = i < pad ? 1 : srcShape[i - pad];
    if (srcDim !== 1 && srcDim !== targetShape[i]) {
      throw new ShapeError({
        message: `Cannot broadcast ${formatShape(srcShape)} to ${formatShape(targetShape)}`,
      });
    }
    strides[i] = srcDim === 1 && targetShape[i] !== 1 ? 0 : str;
    str *= srcDim;
  }
  return strides;
}

/** Normalise a possibly-negative axis to [0, ndim). */
export function normalizeAxis(axis: number, ndim: number): number {
  const a = axis < 0 ? axis + ndim : axis;
  if (!Number.isInteger(a) || a < 0 || a >= ndim) {
    throw new ShapeError({ message: `axis ${axis} out of range for ndim ${ndim}` });
  }
  return a;
}

/** Axis argument accepted by reductions: one axis, several, or all (null). */
export type Axis = number | readonly number[] | null;

/** Resolve a reduction axis argument to sorted, unique, non-negative axes. */
export function normalizeAxes(axis: Axis | undefined, ndim: number): number[] {
  if (axis === null || axis === undefined) {
    return Array.from({ length: ndim }, (_, i) => i);
  }
  const list = typeof axis === "number" ? [axis] : axis;
  const out = [...new Set(list.map((a) => normalizeAxis(a, ndim)))];
  return out.sort((x, y) => x - y);
}

/**
 * Axes to reduce (with keepdims) so that `shape` collapses onto `target`:
 * every leading axis plus each target axis of size 1 that is larger in `shape`.
 * The number of leading axes to squeeze afterwards is returned alongside.
 */
export function sumToAxes(shape: Shape, target: Shape): { axes: number[]; lead: number } {
  const lead = shape.length - target.length;
  if (lead < 0) {
    throw new ShapeError({
      message: `Cannot sum ${formatShape(shape)} to ${formatShape(target)}`,
    });
  }
  const axes: number[] = [];
  for (let i = 0; i < lead; i++) axes.push(i);
  for (let i = 0; i < target.length; i++) {
    const sx = shape[i + lead];
    if (target[i] === 1) {
      if (sx !== 1) axes.push(i + lead);
    } else if (target[i] !== sx) {
      throw new ShapeError({
        message: `Cannot sum ${formatShape(shape)} to ${formatShape(target)}`,
      });
    }
  }
  return { axes, lead };
}

/**
 * Shape of a reduction result with the reduced axes kept as size 1.
 * Used to bring a reduced gradient back to a broadcastable shape.
 */
export function keepdimsShape(inputShape: Shape, axes: readonly number[]): number[] {
  return inputShape.map((d, i) => (axes.includes(i) ? 1 : d));
}

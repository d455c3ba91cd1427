/**
 * Basic and integer-array indexing for `select` / `scatterAdd`.
 *
 * An index is one selector or a list of per-axis selectors. Axes that are not
 * mentioned are taken whole.
 */
import { ShapeError } from "./errors.js";
import { formatShape, type Shape } from "./types.js";

/** Half-open slice with a positive step. Omitted bounds cover the whole axis. */
export interface SliceSpec {
  readonly kind: "slice";
  readonly start?: number;
  readonly stop?: number;
  readonly step?: number;
}

/** Integer-array selector: picks the listed positions along one axis, repeats allowed. */
export interface TakeSpec {
  readonly kind: "take";
  readonly indices: readonly number[];
}

export type IndexSelector = number | SliceSpec | TakeSpec;
export type Index = IndexSelector | readonly IndexSelector[];

export function slice(start?: number, stop?: number, step?: number): SliceSpec {
  return { kind: "slice", start, stop, step };
}

export function take(indices: readonly number[]): TakeSpec {
  return { kind: "take", indices };
}

/** Per-axis source positions and whether each axis survives in the result. */
export interface ResolvedIndex {
  readonly positions: readonly (readonly number[])[];
  readonly keep: readonly boolean[];
  readonly outShape: number[];
}

function wrap(i: number, dim: number, axis: number): number {
  const j = i < 0 ? i + dim : i;
  if (!Number.isInteger(j) || j < 0 || j >= dim) {
    throw new ShapeError({ message: `index ${i} is out of bounds for axis ${axis} with size ${dim}` });
  }
  return j;
}

function clampBound(b: number, dim: number): number {
  const v = b < 0 ? b + dim : b;
  return Math.min(Math.max(v, 0), dim);
}

function isSelectorList(index: Index): index is readonly IndexSelector[] {
  return Array.isArray(index);
}

export function resolveIndex(shape: Shape, index: Index): ResolvedIndex {
  const selectors = isSelectorList(index) ? index : [index];
  if (selectors.length > shape.length) {
    throw new ShapeError({
      message: `too many indices (${selectors.length}) for shape ${formatShape(shape)}`,
    });
  }
  if (selectors.filter((s) => typeof s !== "number" && s.kind === "take").length > 1) {
    throw new ShapeError({ message: "at most one integer-array selector is supported" });
  }

  const positions: number[][] = [];
  const keep: boolean[] = [];
  for (let axis = 0; axis < shape.length; axis++) {
    const dim = shape[axis];
    const sel: IndexSelector = axis < selectors.length ? selectors[axis] : { kind: "slice" };
    if (typeof sel === "number") {
      positions.push([wrap(sel, dim, axis)]);
      keep.push(false);
    } else if (sel.kind === "take") {
      positions.push(sel.indices.map((i) => wrap(i, dim, axis)));
      keep.push(true);
    } else {
      const step = sel.step ?? 1;
      if (!Number.isInteger(step) || step <= 0) {
        throw new ShapeError({ message: `slice step must be a positive integer, got ${step}` });
      }
      const start = sel.start === undefined ? 0 : clampBound(sel.start, dim);
      const stop = sel.stop === undefined ? dim : clampBound(sel.stop, dim);
      const list: number[] = [];
      for (let i = start; i < stop; i += step) list.push(i);
      positions.push(list);
      keep.push(true);
    }
  }

  const outShape: number[] = [];
  for (let axis = 0; axis < shape.length; axis++) {
    if (keep[axis]) outShape.push(positions[axis].length);
  }
  return { positions, keep, outShape };
}

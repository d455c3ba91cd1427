/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context } from "effect";
import type { Axis } from "./broadcast.js";
import type { Index } from "./indexing.js";
import type { Dtype, NumericArray, Shape } from "./types.js";
import type { Pair } from "./window.js";

// ── Tensor (lightweight handle) ────────────────────────────────────────────
export interface TensorData {
  readonly shape: Shape;
  readonly dtype: Dtype;
  readonly data: NumericArray;
}

export function isTensorData(value: unknown): value is TensorData {
  if (typeof value !== "object" || value === null) return false;
  if (!("shape" in value) || !("dtype" in value) || !("data" in value)) return false;
  const { shape, dtype, data } = value;
  if (!Array.isArray(shape) || !shape.every((d) => Number.isInteger(d) && d >= 0)) return false;
  if (dtype !== "f32" && dtype !== "f64" && dtype !== "i32") return false;
  return data instanceof Float32Array || data instanceof Float64Array || data instanceof Int32Array;
}

// ── Backend ────────────────────────────────────────────────────────────────
/**
 * The numeric backend the engine runs on. Every method returns a fresh
 * buffer; inputs are never written.
 */
export interface Backend {
  readonly name: string;

  // creation
  zeros(shape: Shape, dtype?: Dtype): TensorData;
  ones(shape: Shape, dtype?: Dtype): TensorData;
  full(shape: Shape, value: number, dtype?: Dtype): TensorData;
  scalar(value: number, dtype?: Dtype): TensorData;
  randn(shape: Shape, dtype?: Dtype): TensorData;
  /** Uniform samples in [0, 1). */
  rand(shape: Shape, dtype?: Dtype): TensorData;
  fromArray(data: readonly number[], shape: Shape, dtype?: Dtype): TensorData;
  /** Reseed the backend's random stream. */
  seed(s: number): void;

  // broadcasting binary math
  add(a: TensorData, b: TensorData): TensorData;
  sub(a: TensorData, b: TensorData): TensorData;
  mul(a: TensorData, b: TensorData): TensorData;
  div(a: TensorData, b: TensorData): TensorData;
  maximum(a: TensorData, b: TensorData): TensorData;
  /** 1 where a == b, else 0, in the common float dtype. */
  equal(a: TensorData, b: TensorData): TensorData;
  /** 1 where a > b, else 0, in the common float dtype. */
  greater(a: TensorData, b: TensorData): TensorData;

  // element-wise
  neg(a: TensorData): TensorData;
  exp(a: TensorData): TensorData;
  log(a: TensorData): TensorData;
  sqrt(a: TensorData): TensorData;
  pow(a: TensorData, exponent: number): TensorData;
  sin(a: TensorData): TensorData;
  cos(a: TensorData): TensorData;
  tanh(a: TensorData): TensorData;
  scale(a: TensorData, s: number): TensorData;
  cast(a: TensorData, dtype: Dtype): TensorData;

  // reductions
  sum(a: TensorData, axis?: Axis, keepdims?: boolean): TensorData;
  max(a: TensorData, axis?: Axis, keepdims?: boolean): TensorData;
  min(a: TensorData, axis?: Axis, keepdims?: boolean): TensorData;
  /** i32 indices of the maximum along one axis (first wins on ties); the axis is dropped. */
  argmax(a: TensorData, axis: number): TensorData;
  /** log(sum(exp(a))) along one axis, kept as size 1. */
  logsumexp(a: TensorData, axis: number): TensorData;

  // shape
  reshape(a: TensorData, shape: Shape): TensorData;
  /** Reorder axes; `axes` defaults to reversing them. */
  permute(a: TensorData, axes?: readonly number[]): TensorData;
  broadcastTo(a: TensorData, shape: Shape): TensorData;
  /** Sum over broadcast axes so that the result has `shape`. */
  sumTo(a: TensorData, shape: Shape): TensorData;

  // linear algebra
  matmul(a: TensorData, b: TensorData): TensorData;

  // indexing
  select(a: TensorData, index: Index): TensorData;
  /** Zeros of `shape` with `values` added at `index`; repeated positions accumulate. */
  scatterAdd(shape: Shape, index: Index, values: TensorData): TensorData;
  /** [...indices.shape, depth] with 1 at each index. */
  oneHot(indices: TensorData, depth: number, dtype?: Dtype): TensorData;

  // windowing (NCHW)
  /** [N, C, H, W] → [N, C, KH, KW, OH, OW]. */
  im2col(x: TensorData, kernel: Pair, stride: Pair, pad: Pair): TensorData;
  /** [N, C, KH, KW, OH, OW] → `imgShape`, overlapping windows summed. */
  col2im(col: TensorData, imgShape: Shape, kernel: Pair, stride: Pair, pad: Pair): TensorData;

  // utility
  clone(a: TensorData): TensorData;
  toArray(a: TensorData): number[];
  allClose(a: TensorData, b: TensorData, atol?: number, rtol?: number): boolean;
}

export class BackendService extends Context.Tag("BackendService")<
  BackendService,
  Backend
>() {}

/**
 * cpu_ref -- Reference CPU backend for the rungrad engine.
 *
 * Every operation is implemented with straightforward loops over typed arrays.
 * The goal is correctness, not speed.
 */

import {
  type Axis,
  type Backend,
  type TensorData,
  type Dtype,
  type Index,
  type NumericArray,
  type Pair,
  type Shape,
  ShapeError,
  broadcastIndices,
  broadcastShapes,
  broadcastStrides,
  commonDtype,
  convOutSize,
  dtypeArray,
  formatShape,
  isFloatDtype,
  keepdimsShape,
  normalizeAxes,
  normalizeAxis,
  resolveIndex,
  shapeSize,
  shapeStrides,
  shapesEqual,
  sumToAxes,
  SeededRng,
} from "@rungrad/core";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTensor(shape: Shape, dtype: Dtype, data: NumericArray): TensorData {
  return { shape: [...shape], dtype, data };
}

function allocTensor(shape: Shape, dtype: Dtype): TensorData {
  const Ctor = dtypeArray(dtype);
  return makeTensor(shape, dtype, new Ctor(shapeSize(shape)));
}

function floatDtype(d: Dtype): Dtype {
  return isFloatDtype(d) ? d : "f32";
}

function binaryOp(
  a: TensorData,
  b: TensorData,
  fn: (x: number, y: number) => number,
  dtype?: Dtype,
): TensorData {
  const d = dtype ?? commonDtype(a.dtype, b.dtype);
  const [resultShape, stridesA, stridesB] = broadcastShapes(a.shape, b.shape);
  const size = shapeSize(resultShape);
  const Ctor = dtypeArray(d);
  const out = new Ctor(size);
  for (let i = 0; i < size; i++) {
    const [ia, ib] = broadcastIndices(i, resultShape, stridesA, stridesB);
    out[i] = fn(a.data[ia], b.data[ib]);
  }
  return makeTensor(resultShape, d, out);
}

function unaryOp(a: TensorData, fn: (x: number) => number, dtype?: Dtype): TensorData {
  const d = dtype ?? a.dtype;
  const Ctor = dtypeArray(d);
  const out = new Ctor(a.data.length);
  for (let i = 0; i < a.data.length; i++) {
    out[i] = fn(a.data[i]);
  }
  return makeTensor(a.shape, d, out);
}

/** Multi-index <-> flat index conversion helpers. */
function flatToMulti(flat: number, shape: Shape): number[] {
  const ndim = shape.length;
  const coords = new Array<number>(ndim);
  let rem = flat;
  for (let d = ndim - 1; d >= 0; d--) {
    coords[d] = rem % shape[d];
    rem = (rem - coords[d]) / shape[d];
  }
  return coords;
}

function multiToFlat(coords: readonly number[], strides: readonly number[]): number {
  let idx = 0;
  for (let d = 0; d < coords.length; d++) {
    idx += coords[d] * strides[d];
  }
  return idx;
}

/**
 * Fold every element of `a` into the slot of its reduced position.
 * `init` seeds each output slot, `fold` combines the running value with an element.
 */
function reduceOp(
  a: TensorData,
  axis: Axis | undefined,
  keepdims: boolean,
  init: number,
  fold: (acc: number, x: number) => number,
): TensorData {
  const ndim = a.shape.length;
  const axes = normalizeAxes(axis, ndim);
  const keptShape = keepdimsShape(a.shape, axes);
  const outShape = keepdims ? keptShape : a.shape.filter((_, i) => !axes.includes(i));
  const size = shapeSize(keptShape);
  if (a.data.length === 0 && size > 0 && !Number.isFinite(init)) {
    throw new ShapeError({ message: `Cannot reduce an empty axis of ${formatShape(a.shape)}` });
  }
  const acc = new Float64Array(size).fill(init);
  const keptStrides = shapeStrides(keptShape);
  for (let i = 0; i < a.data.length; i++) {
    const coords = flatToMulti(i, a.shape);
    for (const ax of axes) coords[ax] = 0;
    const o = multiToFlat(coords, keptStrides);
    acc[o] = fold(acc[o], a.data[i]);
  }
  const Ctor = dtypeArray(a.dtype);
  return makeTensor(outShape, a.dtype, Ctor.from(acc));
}

// ---------------------------------------------------------------------------
// CpuRefBackend
// ---------------------------------------------------------------------------

export class CpuRefBackend implements Backend {
  readonly name = "cpu_ref";
  private readonly rng: SeededRng;

  constructor(seed = 42) {
    this.rng = new SeededRng(seed);
  }

  seed(s: number): void {
    this.rng.seed(s);
  }

  // ── creation ────────────────────────────────────────────────────────────

  zeros(shape: Shape, dtype: Dtype = "f32"): TensorData {
    return allocTensor(shape, dtype);
  }

  ones(shape: Shape, dtype: Dtype = "f32"): TensorData {
    const t = allocTensor(shape, dtype);
    t.data.fill(1);
    return t;
  }

  full(shape: Shape, value: number, dtype: Dtype = "f32"): TensorData {
    const t = allocTensor(shape, dtype);
    t.data.fill(value);
    return t;
  }

  scalar(value: number, dtype: Dtype = "f32"): TensorData {
    return this.full([], value, dtype);
  }

  randn(shape: Shape, dtype: Dtype = "f32"): TensorData {
    const t = allocTensor(shape, dtype);
    for (let i = 0; i < t.data.length; i++) {
      t.data[i] = this.rng.nextGauss();
    }
    return t;
  }

  rand(shape: Shape, dtype: Dtype = "f32"): TensorData {
    const t = allocTensor(shape, dtype);
    for (let i = 0; i < t.data.length; i++) {
      t.data[i] = this.rng.next();
    }
    return t;
  }

  fromArray(data: readonly number[], shape: Shape, dtype: Dtype = "f32"): TensorData {
    const size = shapeSize(shape);
    if (data.length !== size) {
      throw new ShapeError({
        message: `Data length ${data.length} does not match shape size ${size} of ${formatShape(shape)}`,
      });
    }
    const Ctor = dtypeArray(dtype);
    return makeTensor(shape, dtype, Ctor.from(data));
  }

  // ── broadcasting binary math ────────────────────────────────────────────

  add(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x + y);
  }

  sub(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x - y);
  }

  mul(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x * y);
  }

  div(a: TensorData, b: TensorData): TensorData {
    // Integer operands still divide as reals.
    return binaryOp(a, b, (x, y) => x / y, floatDtype(commonDtype(a.dtype, b.dtype)));
  }

  maximum(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => (x >= y ? x : y));
  }

  equal(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => (x === y ? 1 : 0), floatDtype(commonDtype(a.dtype, b.dtype)));
  }

  greater(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => (x > y ? 1 : 0), floatDtype(commonDtype(a.dtype, b.dtype)));
  }

  // ── element-wise ────────────────────────────────────────────────────────

  neg(a: TensorData): TensorData {
    return unaryOp(a, (x) => -x);
  }

  exp(a: TensorData): TensorData {
    return unaryOp(a, Math.exp, floatDtype(a.dtype));
  }

  log(a: TensorData): TensorData {
    return unaryOp(a, Math.log, floatDtype(a.dtype));
  }

  sqrt(a: TensorData): TensorData {
    return unaryOp(a, Math.sqrt, floatDtype(a.dtype));
  }

  pow(a: TensorData, exponent: number): TensorData {
    const dtype = Number.isInteger(exponent) && exponent >= 0 ? a.dtype : floatDtype(a.dtype);
    return unaryOp(a, (x) => Math.pow(x, exponent), dtype);
  }

  sin(a: TensorData): TensorData {
    return unaryOp(a, Math.sin, floatDtype(a.dtype));
  }

  cos(a: TensorData): TensorData {
    return unaryOp(a, Math.cos, floatDtype(a.dtype));
  }

  tanh(a: TensorData): TensorData {
    return unaryOp(a, Math.tanh, floatDtype(a.dtype));
  }

  scale(a: TensorData, s: number): TensorData {
    const dtype = Number.isInteger(s) ? a.dtype : floatDtype(a.dtype);
    return unaryOp(a, (x) => x * s, dtype);
  }

  cast(a: TensorData, dtype: Dtype): TensorData {
    if (dtype === a.dtype) return this.clone(a);
    return unaryOp(a, (x) => x, dtype);
  }

  // ── reductions ──────────────────────────────────────────────────────────

  sum(a: TensorData, axis?: Axis, keepdims = false): TensorData {
    return reduceOp(a, axis, keepdims, 0, (acc, x) => acc + x);
  }

  max(a: TensorData, axis?: Axis, keepdims = false): TensorData {
    return reduceOp(a, axis, keepdims, -Infinity, (acc, x) => (x > acc ? x : acc));
  }

  min(a: TensorData, axis?: Axis, keepdims = false): TensorData {
    return reduceOp(a, axis, keepdims, Infinity, (acc, x) => (x < acc ? x : acc));
  }

  argmax(a: TensorData, axis: number): TensorData {
    const ndim = a.shape.length;
    const ax = normalizeAxis(axis, ndim);
    const dimSize = a.shape[ax];
    const outShape = a.shape.filter((_, i) => i !== ax);
    const strides = shapeStrides(a.shape);
    const axStride = strides[ax];
    const outSize = shapeSize(outShape);
    const out = new Int32Array(outSize);

    for (let i = 0; i < outSize; i++) {
      const outCoords = flatToMulti(i, outShape);
      const inCoords = [...outCoords.slice(0, ax), 0, ...outCoords.slice(ax)];
      const base = multiToFlat(inCoords, strides);
      let best = 0;
      let bestVal = -Infinity;
      for (let j = 0; j < dimSize; j++) {
        const v = a.data[base + j * axStride];
        if (v > bestVal) {
          bestVal = v;
          best = j;
        }
      }
      out[i] = best;
    }
    return makeTensor(outShape, "i32", out);
  }

  logsumexp(a: TensorData, axis: number): TensorData {
    const ndim = a.shape.length;
    const ax = normalizeAxis(axis, ndim);
    const dimSize = a.shape[ax];
    const outShape = keepdimsShape(a.shape, [ax]);
    const strides = shapeStrides(a.shape);
    const axStride = strides[ax];
    const outSize = shapeSize(outShape);
    const dtype = floatDtype(a.dtype);
    const Ctor = dtypeArray(dtype);
    const out = new Ctor(outSize);

    for (let i = 0; i < outSize; i++) {
      const coords = flatToMulti(i, outShape);
      const base = multiToFlat(coords, strides);

      // Find max for numerical stability
      let max = -Infinity;
      for (let j = 0; j < dimSize; j++) {
        const v = a.data[base + j * axStride];
        if (v > max) max = v;
      }
      let sumExp = 0;
      for (let j = 0; j < dimSize; j++) {
        sumExp += Math.exp(a.data[base + j * axStride] - max);
      }
      out[i] = max + Math.log(sumExp);
    }
    return makeTensor(outShape, dtype, out);
  }

  // ── shape ───────────────────────────────────────────────────────────────

  reshape(a: TensorData, shape: Shape): TensorData {
    const resolved = [...shape];
    const inferred = resolved.indexOf(-1);
    if (inferred >= 0) {
      const known = shapeSize(resolved.filter((_, i) => i !== inferred));
      resolved[inferred] = known === 0 ? 0 : shapeSize(a.shape) / known;
    }
    if (shapeSize(resolved) !== shapeSize(a.shape) || !resolved.every(Number.isInteger)) {
      throw new ShapeError({
        message: `Cannot reshape ${formatShape(a.shape)} to ${formatShape(shape)}: size mismatch`,
      });
    }
    // Data is contiguous, just copy with the new shape
    const Ctor = dtypeArray(a.dtype);
    return makeTensor(resolved, a.dtype, Ctor.from(a.data));
  }

  permute(a: TensorData, axes?: readonly number[]): TensorData {
    const ndim = a.shape.length;
    const perm = axes === undefined
      ? Array.from({ length: ndim }, (_, i) => ndim - 1 - i)
      : axes.map((ax) => normalizeAxis(ax, ndim));
    if (perm.length !== ndim || new Set(perm).size !== ndim) {
      throw new ShapeError({
        message: `axes [${axes?.join(", ")}] are not a permutation of ${ndim} dimensions`,
      });
    }

    const newShape = perm.map((p) => a.shape[p]);
    const srcStrides = shapeStrides(a.shape);
    const totalSize = shapeSize(a.shape);
    const Ctor = dtypeArray(a.dtype);
    const out = new Ctor(totalSize);

    for (let i = 0; i < totalSize; i++) {
      const coords = flatToMulti(i, newShape);
      let src = 0;
      for (let d = 0; d < ndim; d++) src += coords[d] * srcStrides[perm[d]];
      out[i] = a.data[src];
    }
    return makeTensor(newShape, a.dtype, out);
  }

  broadcastTo(a: TensorData, shape: Shape): TensorData {
    const strides = broadcastStrides(a.shape, shape);
    const size = shapeSize(shape);
    const Ctor = dtypeArray(a.dtype);
    const out = new Ctor(size);
    for (let i = 0; i < size; i++) {
      out[i] = a.data[multiToFlat(flatToMulti(i, shape), strides)];
    }
    return makeTensor(shape, a.dtype, out);
  }

  sumTo(a: TensorData, shape: Shape): TensorData {
    if (shapesEqual(a.shape, shape)) return this.clone(a);
    const { axes } = sumToAxes(a.shape, shape);
    const summed = this.sum(a, axes, true);
    return this.reshape(summed, shape);
  }

  // ── linear algebra ──────────────────────────────────────────────────────

  matmul(a: TensorData, b: TensorData): TensorData {
    // 1-D operands are promoted to matrices and the added axis dropped afterwards.
    const aShape = a.shape.length === 1 ? [1, a.shape[0]] : a.shape;
    const bShape = b.shape.length === 1 ? [b.shape[0], 1] : b.shape;
    const aNdim = aShape.length;
    const bNdim = bShape.length;

    if (aNdim < 2 || bNdim < 2) {
      throw new ShapeError({
        message: `matmul requires at least 1D tensors, got ${formatShape(a.shape)} x ${formatShape(b.shape)}`,
      });
    }

    const M = aShape[aNdim - 2];
    const K = aShape[aNdim - 1];
    const N = bShape[bNdim - 1];

    if (bShape[bNdim - 2] !== K) {
      throw new ShapeError({
        message: `matmul shape mismatch: ${formatShape(a.shape)} x ${formatShape(b.shape)}`,
      });
    }

    // Compute batch dimensions
    const aBatch = aShape.slice(0, aNdim - 2);
    const bBatch = bShape.slice(0, bNdim - 2);

    // Broadcast batch dimensions
    const maxBatchDims = Math.max(aBatch.length, bBatch.length);
    const batchShape: number[] = [];
    for (let i = 0; i < maxBatchDims; i++) {
      const ai = i < aBatch.length ? aBatch[aBatch.length - 1 - i] : 1;
      const bi = i < bBatch.length ? bBatch[bBatch.length - 1 - i] : 1;
      if (ai !== bi && ai !== 1 && bi !== 1) {
        throw new ShapeError({
          message: `matmul batch shape mismatch: ${formatShape(a.shape)} x ${formatShape(b.shape)}`,
        });
      }
      batchShape.unshift(Math.max(ai, bi));
    }

    const batchSize = shapeSize(batchShape);
    const dtype = commonDtype(a.dtype, b.dtype);
    const Ctor = dtypeArray(dtype);
    const out = new Ctor(batchSize * M * N);

    const aMK = M * K;
    const bKN = K * N;
    const oMN = M * N;

    // For each batch index, compute the corresponding a and b offsets
    // (handling broadcasting)
    const aBatchStrides: number[] = [];
    const bBatchStrides: number[] = [];
    {
      let aStride = aMK;
      for (let i = aBatch.length - 1; i >= 0; i--) {
        aBatchStrides.unshift(aBatch[i] === 1 ? 0 : aStride);
        aStride *= aBatch[i];
      }
      let bStride = bKN;
      for (let i = bBatch.length - 1; i >= 0; i--) {
        bBatchStrides.unshift(bBatch[i] === 1 ? 0 : bStride);
        bStride *= bBatch[i];
      }
    }

    for (let batch = 0; batch < batchSize; batch++) {
      let rem = batch;
      let aOff = 0;
      let bOff = 0;
      for (let d = batchShape.length - 1; d >= 0; d--) {
        const coord = rem % batchShape[d];
        rem = (rem - coord) / batchShape[d];
        const aIdx = d - (batchShape.length - aBatch.length);
        const bIdx = d - (batchShape.length - bBatch.length);
        if (aIdx >= 0) aOff += coord * aBatchStrides[aIdx];
        if (bIdx >= 0) bOff += coord * bBatchStrides[bIdx];
      }

      const oOff = batch * oMN;
      for (let m = 0; m < M; m++) {
        for (let n = 0; n < N; n++) {
          let sum = 0;
          for (let k = 0; k < K; k++) {
            sum += a.data[aOff + m * K + k] * b.data[bOff + k * N + n];
          }
          out[oOff + m * N + n] = sum;
        }
      }
    }

    const outShape = [...batchShape];
    if (a.shape.length !== 1) outShape.push(M);
    if (b.shape.length !== 1) outShape.push(N);
    return makeTensor(outShape, dtype, out);
  }

  // ── indexing ────────────────────────────────────────────────────────────

  select(a: TensorData, index: Index): TensorData {
    const { positions, outShape } = resolveIndex(a.shape, index);
    const strides = shapeStrides(a.shape);
    const Ctor = dtypeArray(a.dtype);
    const out = new Ctor(shapeSize(outShape));
    let o = 0;
    const visit = (axis: number, offset: number): void => {
      if (axis === positions.length) {
        out[o++] = a.data[offset];
        return;
      }
      for (const p of positions[axis]) visit(axis + 1, offset + p * strides[axis]);
    };
    visit(0, 0);
    return makeTensor(outShape, a.dtype, out);
  }

  scatterAdd(shape: Shape, index: Index, values: TensorData): TensorData {
    const { positions, outShape } = resolveIndex(shape, index);
    const src = shapesEqual(values.shape, outShape) ? values : this.broadcastTo(values, outShape);
    const strides = shapeStrides(shape);
    const Ctor = dtypeArray(values.dtype);
    const out = new Ctor(shapeSize(shape));
    let i = 0;
    const visit = (axis: number, offset: number): void => {
      if (axis === positions.length) {
        out[offset] += src.data[i++];
        return;
      }
      for (const p of positions[axis]) visit(axis + 1, offset + p * strides[axis]);
    };
    visit(0, 0);
    return makeTensor(shape, values.dtype, out);
  }

  oneHot(indices: TensorData, depth: number, dtype: Dtype = "f32"): TensorData {
    const out = allocTensor([...indices.shape, depth], dtype);
    for (let i = 0; i < indices.data.length; i++) {
      const k = indices.data[i];
      if (!Number.isInteger(k) || k < 0 || k >= depth) {
        throw new ShapeError({ message: `one-hot index ${k} is out of range for depth ${depth}` });
      }
      out.data[i * depth + k] = 1;
    }
    return out;
  }

  // ── windowing ───────────────────────────────────────────────────────────

  im2col(x: TensorData, kernel: Pair, stride: Pair, pad: Pair): TensorData {
    if (x.shape.length !== 4) {
      throw new ShapeError({ message: `im2col expects an NCHW tensor, got ${formatShape(x.shape)}` });
    }
    const [N, C, H, W] = x.shape;
    const [KH, KW] = kernel;
    const [SH, SW] = stride;
    const [PH, PW] = pad;
    const OH = convOutSize(H, KH, SH, PH);
    const OW = convOutSize(W, KW, SW, PW);
    if (OH <= 0 || OW <= 0) {
      throw new ShapeError({
        message: `kernel [${KH}, ${KW}] does not fit input ${formatShape(x.shape)} with pad [${PH}, ${PW}]`,
      });
    }
    const outShape = [N, C, KH, KW, OH, OW];
    const out = allocTensor(outShape, x.dtype);
    const outStrides = shapeStrides(outShape);
    const inStrides = shapeStrides(x.shape);

    for (let n = 0; n < N; n++) {
      for (let c = 0; c < C; c++) {
        for (let kh = 0; kh < KH; kh++) {
          for (let kw = 0; kw < KW; kw++) {
            for (let oh = 0; oh < OH; oh++) {
              const h = kh + oh * SH - PH;
              for (let ow = 0; ow < OW; ow++) {
                const w = kw + ow * SW - PW;
                // Out-of-image positions read the zero padding.
                if (h < 0 || h >= H || w < 0 || w >= W) continue;
                const dst = multiToFlat([n, c, kh, kw, oh, ow], outStrides);
                out.data[dst] = x.data[multiToFlat([n, c, h, w], inStrides)];
              }
            }
          }
        }
      }
    }
    return out;
  }

  col2im(col: TensorData, imgShape: Shape, kernel: Pair, stride: Pair, pad: Pair): TensorData {
    if (imgShape.length !== 4 || col.shape.length !== 6) {
      throw new ShapeError({
        message: `col2im expects a 6-D column tensor and an NCHW shape, got ${formatShape(col.shape)} and ${formatShape(imgShape)}`,
      });
    }
    const [N, C, H, W] = imgShape;
    const [KH, KW] = kernel;
    const [SH, SW] = stride;
    const [PH, PW] = pad;
    const OH = convOutSize(H, KH, SH, PH);
    const OW = convOutSize(W, KW, SW, PW);
    const expected = [N, C, KH, KW, OH, OW];
    if (!shapesEqual(col.shape, expected)) {
      throw new ShapeError({
        message: `col2im column shape ${formatShape(col.shape)} does not match ${formatShape(expected)}`,
      });
    }
    const out = allocTensor(imgShape, col.dtype);
    const colStrides = shapeStrides(col.shape);
    const imgStrides = shapeStrides(imgShape);

    for (let n = 0; n < N; n++) {
      for (let c = 0; c < C; c++) {
        for (let kh = 0; kh < KH; kh++) {
          for (let kw = 0; kw < KW; kw++) {
            for (let oh = 0; oh < OH; oh++) {
              const h = kh + oh * SH - PH;
              for (let ow = 0; ow < OW; ow++) {
                const w = kw + ow * SW - PW;
                if (h < 0 || h >= H || w < 0 || w >= W) continue;
                out.data[multiToFlat([n, c, h, w], imgStrides)] +=
                  col.data[multiToFlat([n, c, kh, kw, oh, ow], colStrides)];
              }
            }
          }
        }
      }
    }
    return out;
  }

  // ── utility ─────────────────────────────────────────────────────────────

  clone(a: TensorData): TensorData {
    const Ctor = dtypeArray(a.dtype);
    return makeTensor(a.shape, a.dtype, Ctor.from(a.data));
  }

  toArray(a: TensorData): number[] {
    return Array.from(a.data);
  }

  allClose(a: TensorData, b: TensorData, atol = 1e-5, rtol = 1e-8): boolean {
    if (!shapesEqual(a.shape, b.shape)) return false;
    for (let i = 0; i < a.data.length; i++) {
      const diff = Math.abs(a.data[i] - b.data[i]);
      if (diff > atol + rtol * Math.abs(b.data[i])) return false;
    }
    return true;
  }
}

/**
 * Convolution, transposed convolution and max pooling over NCHW tensors.
 *
 * Windows are unfolded into a column tensor `[N, C, KH, KW, OH, OW]` and
 * contracted with the kernel by a matrix product. Kernels are laid out as
 * `[OC, C, KH, KW]` for conv2d and `[C, OC, KH, KW]` for deconv2d.
 */
import {
  AutogradError,
  ShapeError,
  convOutSize,
  deconvOutSize,
  formatShape,
  pair,
  type Backend,
  type Pair,
  type PairLike,
  type Shape,
  type TensorData,
} from "@rungrad/core";
import type { Node } from "../node.js";
import { Operation, type Gradients, type Input } from "../operation.js";
import { sum } from "./tensor.js";

/** Window geometry shared by every operation in this module. */
interface Window {
  readonly kernel: Pair;
  readonly stride: Pair;
  readonly pad: Pair;
}

function expectRank(x: TensorData, rank: number, what: string): void {
  if (x.shape.length !== rank) {
    throw new ShapeError({ message: `${what} expects a ${rank}-D tensor, got ${formatShape(x.shape)}` });
  }
}

/** `[N, C, KH, KW, OH, OW]` → `[N*OH*OW, C*KH*KW]`. */
function colsToRows(col: TensorData, B: Backend): TensorData {
  const [n, c, kh, kw, oh, ow] = col.shape;
  return B.reshape(B.permute(col, [0, 4, 5, 1, 2, 3]), [n * oh * ow, c * kh * kw]);
}

/** Forward of conv2d on buffers: `x [N, C, H, W]`, `w [OC, C, KH, KW]`. */
function convForward(x: TensorData, w: TensorData, b: TensorData | undefined, win: Window, B: Backend): TensorData {
  expectRank(x, 4, "conv2d input");
  expectRank(w, 4, "conv2d kernel");
  const [oc, c, kh, kw] = w.shape;
  if (x.shape[1] !== c) {
    throw new ShapeError({
      message: `conv2d kernel ${formatShape(w.shape)} does not match input channels of ${formatShape(x.shape)}`,
    });
  }
  const col = B.im2col(x, [kh, kw], win.stride, win.pad);
  const [n, , , , oh, ow] = col.shape;
  const rows = colsToRows(col, B);
  let y = B.matmul(rows, B.permute(B.reshape(w, [oc, c * kh * kw])));
  if (b !== undefined) y = B.add(y, b);
  return B.permute(B.reshape(y, [n, oh, ow, oc]), [0, 3, 1, 2]);
}

/** Forward of deconv2d on buffers: `x [N, C, H, W]`, `w [C, OC, KH, KW]`. */
function deconvForward(
  x: TensorData,
  w: TensorData,
  b: TensorData | undefined,
  win: Window,
  outSize: Pair | undefined,
  B: Backend,
): TensorData {
  expectRank(x, 4, "deconv2d input");
  expectRank(w, 4, "deconv2d kernel");
  const [c, oc, kh, kw] = w.shape;
  const [n, xc, h, wd] = x.shape;
  if (xc !== c) {
    throw new ShapeError({
      message: `deconv2d kernel ${formatShape(w.shape)} does not match input channels of ${formatShape(x.shape)}`,
    });
  }
  const [sh, sw] = win.stride;
  const [ph, pw] = win.pad;
  const [outH, outW] = outSize ?? [deconvOutSize(h, kh, sh, ph), deconvOutSize(wd, kw, sw, pw)];
  if (convOutSize(outH, kh, sh, ph) !== h || convOutSize(outW, kw, sw, pw) !== wd) {
    throw new ShapeError({
      message: `deconv2d output size [${outH}, ${outW}] is inconsistent with input ${formatShape(x.shape)}`,
    });
  }
  // [OC*KH*KW, C] · [C, N*H*W] → [OC, KH, KW, N, H, W]
  const wm = B.permute(B.reshape(w, [c, oc * kh * kw]));
  const xm = B.reshape(B.permute(x, [1, 0, 2, 3]), [c, n * h * wd]);
  const gcol = B.permute(B.reshape(B.matmul(wm, xm), [oc, kh, kw, n, h, wd]), [3, 0, 1, 2, 4, 5]);
  const y = B.col2im(gcol, [n, oc, outH, outW], [kh, kw], win.stride, win.pad);
  return b === undefined ? y : B.add(y, B.reshape(b, [1, oc, 1, 1]));
}

/** Kernel gradient on buffers: `x [N, C, H, W]`, `gy [N, OC, OH, OW]` → `[OC, C, KH, KW]`. */
function kernelGradForward(x: TensorData, gy: TensorData, win: Window, B: Backend): TensorData {
  const col = B.im2col(x, win.kernel, win.stride, win.pad);
  const [n, c, kh, kw, oh, ow] = col.shape;
  const oc = gy.shape[1];
  const gym = B.reshape(B.permute(gy, [1, 0, 2, 3]), [oc, n * oh * ow]);
  return B.reshape(B.matmul(gym, colsToRows(col, B)), [oc, c, kh, kw]);
}

function kernelWindow(w: Shape, stride: Pair, pad: Pair): Window {
  return { kernel: [w[2], w[3]], stride, pad };
}

// ── Convolution ────────────────────────────────────────────────────────────

class Conv2d extends Operation {
  readonly name = "Conv2d";
  constructor(
    private readonly stride: Pair,
    private readonly pad: Pair,
  ) {
    super();
  }
  forward([x, w, b]: readonly TensorData[], B: Backend): TensorData {
    return convForward(x, w, b, kernelWindow(w.shape, this.stride, this.pad), B);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x, w, b] = this.inputs;
    const win = kernelWindow(w.shape, this.stride, this.pad);
    const gx = deconv2d(gy, w, null, this.stride, this.pad, [x.shape[2], x.shape[3]]);
    const gw = new Conv2dGradW(win).callOne(x, gy);
    return b === undefined ? [gx, gw] : [gx, gw, sum(gy, [0, 2, 3])];
  }
}

class Deconv2d extends Operation {
  readonly name = "Deconv2d";
  constructor(
    private readonly stride: Pair,
    private readonly pad: Pair,
    private readonly outSize: Pair | undefined,
  ) {
    super();
  }
  forward([x, w, b]: readonly TensorData[], B: Backend): TensorData {
    return deconvForward(x, w, b, kernelWindow(w.shape, this.stride, this.pad), this.outSize, B);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x, w, b] = this.inputs;
    const win = kernelWindow(w.shape, this.stride, this.pad);
    const gx = conv2d(gy, w, null, this.stride, this.pad);
    // The kernel maps x's channels to gy's, so its gradient is conv2dGradW with the roles swapped.
    const gw = new Conv2dGradW(win).callOne(gy, x);
    return b === undefined ? [gx, gw] : [gx, gw, sum(gy, [0, 2, 3])];
  }
}

/** Gradient of a convolution kernel, differentiable in both of its inputs. */
class Conv2dGradW extends Operation {
  readonly name = "Conv2dGradW";
  constructor(private readonly win: Window) {
    super();
  }
  forward([x, gy]: readonly TensorData[], B: Backend): TensorData {
    return kernelGradForward(x, gy, this.win, B);
  }
  backward([ggw]: readonly Node[]): Gradients {
    const [x] = this.inputs;
    const { stride, pad } = this.win;
    const gx = deconv2d(this.inputs[1], ggw, null, stride, pad, [x.shape[2], x.shape[3]]);
    const ggy = conv2d(x, ggw, null, stride, pad);
    return [gx, ggy];
  }
}

/**
 * 2-D convolution. `x` is `[N, C, H, W]`, `w` is `[OC, C, KH, KW]`, `b` is
 * `[OC]` or absent. Output spatial size is `floor((in + 2*pad - k) / stride) + 1`.
 */
export function conv2d(x: Input, w: Input, b?: Input | null, stride: PairLike = 1, pad: PairLike = 0): Node {
  const op = new Conv2d(pair(stride), pair(pad));
  return b === undefined || b === null ? op.callOne(x, w) : op.callOne(x, w, b);
}

/**
 * Transposed convolution. `w` is `[C, OC, KH, KW]`; the output spatial size
 * defaults to `stride * (in - 1) + k - 2 * pad`.
 */
export function deconv2d(
  x: Input,
  w: Input,
  b?: Input | null,
  stride: PairLike = 1,
  pad: PairLike = 0,
  outSize?: PairLike,
): Node {
  const op = new Deconv2d(pair(stride), pair(pad), outSize === undefined ? undefined : pair(outSize));
  return b === undefined || b === null ? op.callOne(x, w) : op.callOne(x, w, b);
}

/** Kernel gradient of a convolution of `x` that produced a gradient `gy`. */
export function conv2dGradW(x: Input, gy: Input, kernelSize: PairLike, stride: PairLike = 1, pad: PairLike = 0): Node {
  return new Conv2dGradW({ kernel: pair(kernelSize), stride: pair(stride), pad: pair(pad) }).callOne(x, gy);
}

// ── Im2col / col2im ────────────────────────────────────────────────────────

class Im2col extends Operation {
  readonly name = "Im2col";
  constructor(private readonly win: Window) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    expectRank(x, 4, "im2col");
    return B.im2col(x, this.win.kernel, this.win.stride, this.win.pad);
  }
  backward([gy]: readonly Node[]): Gradients {
    return new Col2im(this.inputs[0].shape, this.win).callOne(gy);
  }
}

class Col2im extends Operation {
  readonly name = "Col2im";
  constructor(
    private readonly imgShape: Shape,
    private readonly win: Window,
  ) {
    super();
  }
  forward([col]: readonly TensorData[], B: Backend): TensorData {
    return B.col2im(col, this.imgShape, this.win.kernel, this.win.stride, this.win.pad);
  }
  backward([gx]: readonly Node[]): Gradients {
    return new Im2col(this.win).callOne(gx);
  }
}

/** Unfold windows of `x [N, C, H, W]` into `[N, C, KH, KW, OH, OW]`. */
export function im2col(x: Input, kernelSize: PairLike, stride: PairLike = 1, pad: PairLike = 0): Node {
  return new Im2col({ kernel: pair(kernelSize), stride: pair(stride), pad: pair(pad) }).callOne(x);
}

/** Fold `[N, C, KH, KW, OH, OW]` columns back into `imgShape`, summing overlaps. */
export function col2im(col: Input, imgShape: Shape, kernelSize: PairLike, stride: PairLike = 1, pad: PairLike = 0): Node {
  return new Col2im(imgShape, { kernel: pair(kernelSize), stride: pair(stride), pad: pair(pad) }).callOne(col);
}

// ── Max pooling ────────────────────────────────────────────────────────────

/** Window columns as `[N, C, OH, OW, KH*KW]`. */
function windowRows(x: TensorData, win: Window, B: Backend): TensorData {
  const col = B.im2col(x, win.kernel, win.stride, win.pad);
  const [n, c, kh, kw, oh, ow] = col.shape;
  return B.permute(B.reshape(col, [n, c, kh * kw, oh, ow]), [0, 1, 3, 4, 2]);
}

/** Scatter `gy [N, C, OH, OW]` to the winning window positions of an image of `imgShape`. */
function scatterToWinners(gy: TensorData, indexes: TensorData, imgShape: Shape, win: Window, B: Backend): TensorData {
  const [kh, kw] = win.kernel;
  const [n, c, oh, ow] = gy.shape;
  const hot = B.oneHot(indexes, kh * kw, gy.dtype);
  const gcol = B.mul(hot, B.reshape(gy, [n, c, oh, ow, 1]));
  const cols = B.permute(B.reshape(gcol, [n, c, oh, ow, kh, kw]), [0, 1, 4, 5, 2, 3]);
  return B.col2im(cols, imgShape, win.kernel, win.stride, win.pad);
}

/** Pick the recorded winning position of every window of `x`. */
function gatherWinners(x: TensorData, indexes: TensorData, win: Window, B: Backend): TensorData {
  const rows = windowRows(x, win, B);
  const depth = rows.shape[4];
  return B.sum(B.mul(rows, B.oneHot(indexes, depth, rows.dtype)), 4);
}

class Pooling extends Operation {
  readonly name = "Pooling";
  private indexes: TensorData | undefined;
  constructor(private readonly win: Window) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    expectRank(x, 4, "pooling");
    const rows = windowRows(x, this.win, B);
    this.indexes = B.argmax(rows, 4);
    return B.max(rows, 4);
  }
  backward([gy]: readonly Node[]): Gradients {
    return new Pooling2dGrad(this.win, this.inputs[0].shape, this.winners()).callOne(gy);
  }
  private winners(): TensorData {
    if (this.indexes === undefined) {
      throw new AutogradError({ message: "pooling backward ran before forward" });
    }
    return this.indexes;
  }
}

/** Gradient of max pooling: routes each window's gradient to its arg-max position. */
class Pooling2dGrad extends Operation {
  readonly name = "Pooling2dGrad";
  constructor(
    private readonly win: Window,
    private readonly imgShape: Shape,
    private readonly indexes: TensorData,
  ) {
    super();
  }
  forward([gy]: readonly TensorData[], B: Backend): TensorData {
    return scatterToWinners(gy, this.indexes, this.imgShape, this.win, B);
  }
  backward([ggx]: readonly Node[]): Gradients {
    return new Pooling2dWithIndexes(this.win, this.imgShape, this.indexes).callOne(ggx);
  }
}

/** Max pooling that replays a recorded arg-max map instead of searching again. */
class Pooling2dWithIndexes extends Operation {
  readonly name = "Pooling2dWithIndexes";
  constructor(
    private readonly win: Window,
    private readonly imgShape: Shape,
    private readonly indexes: TensorData,
  ) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return gatherWinners(x, this.indexes, this.win, B);
  }
  backward([gy]: readonly Node[]): Gradients {
    return new Pooling2dGrad(this.win, this.imgShape, this.indexes).callOne(gy);
  }
}

/** Max pooling of `x [N, C, H, W]`; stride defaults to 1 and pad to 0. */
export function pooling(x: Input, kernelSize: PairLike, stride: PairLike = 1, pad: PairLike = 0): Node {
  return new Pooling({ kernel: pair(kernelSize), stride: pair(stride), pad: pair(pad) }).callOne(x);
}

/**
 * Window geometry for convolution and pooling over NCHW images.
 */

export type Pair = readonly [number, number];

/** A scalar applies to both spatial axes. */
export type PairLike = number | Pair;

export function pair(x: PairLike): Pair {
  return typeof x === "number" ? [x, x] : x;
}

export function convOutSize(size: number, kernel: number, stride: number, pad: number): number {
  return Math.floor((size + pad * 2 - kernel) / stride) + 1;
}

export function deconvOutSize(size: number, kernel: number, stride: number, pad: number): number {
  return stride * (size - 1) + kernel - 2 * pad;
}

/**
 * Core types for the rungrad system.
 */

// ── Dtype ──────────────────────────────────────────────────────────────────
export type Dtype = "f32" | "f64" | "i32";

export const dtypes: readonly Dtype[] = ["f32", "f64", "i32"];

/** Array types backing tensor data. */
export type NumericArray = Float32Array | Float64Array | Int32Array;

export function dtypeBytes(d: Dtype): number {
  switch (d) {
    case "f32": return 4;
    case "f64": return 8;
    case "i32": return 4;
  }
}

export function dtypeArray(d: Dtype) {
  switch (d) {
    case "f32": return Float32Array;
    case "f64": return Float64Array;
    case "i32": return Int32Array;
  }
}

export function isDtype(value: unknown): value is Dtype {
  return value === "f32" || value === "f64" || value === "i32";
}

export function isFloatDtype(d: Dtype): boolean {
  return d === "f32" || d === "f64";
}

/** Resolve the common dtype for a binary op (promote to wider float if mixed). */
export function commonDtype(a: Dtype, b: Dtype): Dtype {
  if (a === b) return a;
  if (a === "f64" || b === "f64") return "f64";
  if (a === "f32" || b === "f32") return "f32";
  return "i32";
}

// ── Shape helpers ──────────────────────────────────────────────────────────
export type Shape = readonly number[];

export function shapeSize(shape: Shape): number {
  let s = 1;
  for (const d of shape) s *= d;
  return s;
}

export function shapeStrides(shape: Shape): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

export function shapesEqual(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function formatShape(shape: Shape): string {
  return `[${shape.join(", ")}]`;
}

// ── Engine config ──────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface EngineConfig {
  /** Record creator links and generations when operations run. */
  readonly enableBackprop: boolean;
  /** Training mode; read by train-only operations such as dropout. */
  readonly train: boolean;
  /** Name of the active backend in the backend registry. */
  readonly backend: string;
  /** Dtype used by factory helpers when none is given. */
  readonly dtype: Dtype;
  readonly seed: number;
  readonly logLevel: LogLevelName;
}

export const defaultEngineConfig: EngineConfig = {
  enableBackprop: true,
  train: true,
  backend: "cpu_ref",
  dtype: "f32",
  seed: 42,
  logLevel: "info",
};

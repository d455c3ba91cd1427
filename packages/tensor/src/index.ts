/**
 * @rungrad/tensor -- Tensor backends for the rungrad engine.
 */

export { CpuRefBackend } from "./cpu_ref.js";

export type {
  Backend,
  TensorData,
} from "@rungrad/core";

export type { Dtype, Shape } from "@rungrad/core";

// ── Backend registry ──────────────────────────────────────────────────────

import { BackendRegistry } from "@rungrad/core";
import { CpuRefBackend } from "./cpu_ref.js";

export const backendRegistry = new BackendRegistry().register("cpu_ref", (seed) => new CpuRefBackend(seed));

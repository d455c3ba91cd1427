/**
 * Effect entry points over the synchronous engine: thrown engine errors land
 * in the typed error channel, and each run is logged and traced.
 */
import { Effect } from "effect";
import { AutogradError, ShapeError, type TensorData } from "@rungrad/core";
import { gradientCheck, type GradientCheckOptions, type GradientCheckReport } from "./gradcheck.js";
import { traceGraph } from "./graph.js";
import type { BackwardOptions, Node } from "./node.js";

export type EngineError = AutogradError | ShapeError;

function toEngineError(e: unknown): EngineError {
  if (e instanceof AutogradError || e instanceof ShapeError) return e;
  return new AutogradError({ message: e instanceof Error ? e.message : String(e), cause: e });
}

/** Backpropagate from `node`. */
export function runBackward(node: Node, options: BackwardOptions = {}): Effect.Effect<void, EngineError> {
  return Effect.gen(function* () {
    const { operations } = traceGraph(node);
    yield* Effect.logDebug(`backward from ${node.label}: ${operations.length} operations`);
    yield* Effect.try({ try: () => node.backward(options), catch: toEngineError });
  }).pipe(Effect.withSpan("autograd.backward"));
}

/** Run `gradientCheck` and log the largest deviation per input. */
export function checkGradients(
  f: (...xs: Node[]) => Node,
  inputs: readonly TensorData[],
  options: GradientCheckOptions = {},
): Effect.Effect<GradientCheckReport, EngineError> {
  return Effect.gen(function* () {
    const report = yield* Effect.try({ try: () => gradientCheck(f, inputs, options), catch: toEngineError });
    for (const input of report.inputs) {
      yield* Effect.logDebug(
        `gradient check input ${input.index}: max |analytic - numeric| = ${input.maxAbsDiff.toExponential(3)}${input.ok ? "" : " (FAIL)"}`,
      );
    }
    return report;
  }).pipe(Effect.withSpan("autograd.gradientCheck"));
}

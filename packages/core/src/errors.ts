/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** A Node was constructed from a value that is neither a buffer nor null. */
export class NodeTypeError extends Data.TaggedError("NodeTypeError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ShapeError extends Data.TaggedError("ShapeError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Graph misuse: reused operations, placeholder inputs, broken generation order. */
export class AutogradError extends Data.TaggedError("AutogradError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class StateDictError extends Data.TaggedError("StateDictError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

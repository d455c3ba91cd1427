import { AutogradError, isFloatDtype } from "@rungrad/core";
import { getBackend, getConfig } from "../config.js";
import { Node } from "../node.js";
import { asNode, type Input } from "../operation.js";
import { mul } from "./math.js";

/**
 * Inverted dropout: zero each element with probability `ratio` and scale the
 * survivors by `1 / (1 - ratio)`. Identity when training mode is off.
 * The mask comes from the active backend's seeded stream and is a constant
 * of the graph.
 */
export function dropout(x: Input, ratio = 0.5): Node {
  if (!(ratio >= 0 && ratio < 1)) {
    throw new AutogradError({ message: `dropout ratio must be in [0, 1), got ${ratio}` });
  }
  const node = asNode(x);
  if (!getConfig().train || ratio === 0) return node;

  const B = getBackend();
  const dtype = isFloatDtype(node.dtype) ? node.dtype : "f32";
  const keep = B.greater(B.rand(node.shape, dtype), B.scalar(ratio, dtype));
  return mul(node, new Node(B.scale(keep, 1 / (1 - ratio))));
}

/**
 * Parameter containers.
 *
 * A Module discovers its parameters by scanning its own properties: every
 * value that is a Parameter or a nested Module is part of the tree. Keys in
 * the flattened view are property names joined with "/".
 */
import {
  StateDictError,
  formatShape,
  shapesEqual,
} from "@rungrad/core";
import { getBackend } from "./config.js";
import { Node } from "./node.js";

/** Serialised parameters, one entry per flattened key. */
export type StateDict = Record<string, { shape: number[]; data: number[] }>;

/** A leaf Node that a Module owns and an optimizer updates. */
export class Parameter extends Node {}

export abstract class Module {
  /** Own Parameters and Modules, in property order. */
  private children(): [string, Parameter | Module][] {
    const out: [string, Parameter | Module][] = [];
    for (const [key, value] of Object.entries(this)) {
      if (value instanceof Parameter || value instanceof Module) out.push([key, value]);
    }
    return out;
  }

  /** Every Parameter in the tree, depth first. */
  *params(): Generator<Parameter> {
    for (const [, child] of this.children()) {
      if (child instanceof Module) yield* child.params();
      else yield child;
    }
  }

  cleargrads(): void {
    for (const p of this.params()) p.cleargrad();
  }

  flattenParams(prefix = ""): Map<string, Parameter> {
    const out = new Map<string, Parameter>();
    for (const [key, child] of this.children()) {
      const name = prefix ? `${prefix}/${key}` : key;
      if (child instanceof Module) {
        for (const [k, p] of child.flattenParams(name)) out.set(k, p);
      } else {
        out.set(name, child);
      }
    }
    return out;
  }

  /** Plain-data copy of every non-placeholder parameter. */
  stateDict(): StateDict {
    const B = getBackend();
    const state: StateDict = {};
    for (const [name, p] of this.flattenParams()) {
      if (p.data === null) continue;
      state[name] = { shape: [...p.data.shape], data: B.toArray(p.data) };
    }
    return state;
  }

  /**
   * Replace parameter buffers from `state`. Every parameter must be present
   * with a matching shape; placeholders take the saved shape.
   */
  loadStateDict(state: StateDict): void {
    const B = getBackend();
    for (const [name, p] of this.flattenParams()) {
      const saved = state[name];
      if (saved === undefined) {
        throw new StateDictError({ message: `Missing parameter "${name}" in state dict` });
      }
      if (p.data !== null && !shapesEqual(p.data.shape, saved.shape)) {
        throw new StateDictError({
          message: `Parameter "${name}" has shape ${formatShape(p.data.shape)}, state dict has ${formatShape(saved.shape)}`,
        });
      }
      p.data = B.fromArray(saved.data, saved.shape, p.data?.dtype);
    }
  }
}

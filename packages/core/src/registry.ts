/**
 * Named backend factories. Each factory builds a fresh backend whose random
 * stream starts from the given seed.
 */
import { ConfigError } from "./errors.js";
import type { Backend } from "./interfaces.js";

export type BackendFactory = (seed: number) => Backend;

export class BackendRegistry {
  private readonly factories = new Map<string, BackendFactory>();

  register(name: string, factory: BackendFactory): this {
    if (this.factories.has(name)) {
      throw new ConfigError({ message: `Backend "${name}" is already registered` });
    }
    this.factories.set(name, factory);
    return this;
  }

  create(name: string, seed: number): Backend {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ConfigError({
        message: `Unknown backend "${name}". Registered: ${this.list().join(", ")}`,
      });
    }
    return factory(seed);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  list(): string[] {
    return [...this.factories.keys()];
  }
}

/**
 * Effect layers for dependency injection.
 *
 * The engine itself is synchronous and reads its backend from process-wide
 * state; these layers let Effect programs choose that backend as a service.
 */
import { Effect, Layer } from "effect";
import { BackendService, ConfigError, type Backend } from "@rungrad/core";
import { getConfig, usingBackend } from "@rungrad/autograd";
import { backendRegistry } from "@rungrad/tensor";

// ── Backend Layers ─────────────────────────────────────────────────────────

export const BackendFrom = (backend: Backend) =>
  Layer.succeed(BackendService, backend);

/**
 * Build the named backend from the registry, seeded from `seed` or the
 * engine config. Unknown names fail with `ConfigError`.
 */
export const BackendFromRegistry = (name: string, seed?: number) =>
  Layer.effect(
    BackendService,
    Effect.try({
      try: () => backendRegistry.create(name, seed ?? getConfig().seed),
      catch: (e) =>
        e instanceof ConfigError ? e : new ConfigError({ message: `Cannot build backend "${name}"`, cause: e }),
    }),
  );

/** Run a synchronous engine computation with the service's backend active. */
export const withBackendService = <A>(fn: () => A): Effect.Effect<A, never, BackendService> =>
  Effect.flatMap(BackendService, (backend) => Effect.sync(() => usingBackend(backend, fn)));

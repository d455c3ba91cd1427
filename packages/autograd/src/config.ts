/**
 * Process-wide engine state: the mode flags, the active backend and the
 * settings they were resolved from.
 *
 * Single-threaded use only. Scoped overrides restore the previous value on
 * every exit path, including throws.
 */
import {
  ConfigError,
  defaultEngineConfig,
  isDtype,
  type Backend,
  type EngineConfig,
  type LogLevelName,
} from "@rungrad/core";
import { backendRegistry } from "@rungrad/tensor";

/** The two boolean modes that can be overridden for a dynamic extent. */
export type ModeFlag = "enableBackprop" | "train";

const logLevels: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

let config: EngineConfig = defaultEngineConfig;
let backend: Backend | null = null;

export function getConfig(): EngineConfig {
  return config;
}

function validate(partial: Partial<EngineConfig>): void {
  if (partial.backend !== undefined && !backendRegistry.has(partial.backend)) {
    throw new ConfigError({
      message: `Unknown backend "${partial.backend}". Registered: ${backendRegistry.list().join(", ")}`,
    });
  }
  if (partial.dtype !== undefined && !isDtype(partial.dtype)) {
    throw new ConfigError({ message: `Invalid dtype "${String(partial.dtype)}"` });
  }
  if (partial.logLevel !== undefined && !logLevels.includes(partial.logLevel)) {
    throw new ConfigError({ message: `Invalid log level "${String(partial.logLevel)}"` });
  }
  if (partial.seed !== undefined && !Number.isInteger(partial.seed)) {
    throw new ConfigError({ message: `Seed must be an integer, got ${partial.seed}` });
  }
}

/**
 * Merge settings into the process-wide config. Changing the backend name or
 * the seed drops the cached backend so the next op builds a fresh one.
 */
export function configure(partial: Partial<EngineConfig>): EngineConfig {
  validate(partial);
  const next = { ...config, ...partial };
  if (next.backend !== config.backend || next.seed !== config.seed) backend = null;
  config = next;
  return config;
}

export function resetConfig(): void {
  config = defaultEngineConfig;
  backend = null;
}

/** Read engine settings from `RUNGRAD_*` environment variables. */
export function configFromEnv(env: Record<string, string | undefined>): Partial<EngineConfig> {
  const out: { -readonly [K in keyof EngineConfig]?: EngineConfig[K] } = {};
  const backendName = env.RUNGRAD_BACKEND;
  if (backendName) out.backend = backendName;

  const dtype = env.RUNGRAD_DTYPE;
  if (dtype) {
    if (!isDtype(dtype)) throw new ConfigError({ message: `RUNGRAD_DTYPE: invalid dtype "${dtype}"` });
    out.dtype = dtype;
  }

  const seed = env.RUNGRAD_SEED;
  if (seed) {
    const n = Number(seed);
    if (!Number.isInteger(n)) throw new ConfigError({ message: `RUNGRAD_SEED: not an integer "${seed}"` });
    out.seed = n;
  }

  const level = env.RUNGRAD_LOG_LEVEL?.toLowerCase();
  if (level) {
    const match = logLevels.find((l) => l === level);
    if (!match) throw new ConfigError({ message: `RUNGRAD_LOG_LEVEL: invalid level "${level}"` });
    out.logLevel = match;
  }
  return out;
}

// ── Scoped mode overrides ──────────────────────────────────────────────────

export function usingConfig<T>(name: ModeFlag, value: boolean, fn: () => T): T {
  const prev = config;
  config = { ...config, [name]: value };
  try {
    return fn();
  } finally {
    // Only the overridden flag is restored; other settings changed inside stay.
    config = { ...config, [name]: prev[name] };
  }
}

/** Run `fn` without recording graph edges. */
export function noGrad<T>(fn: () => T): T {
  return usingConfig("enableBackprop", false, fn);
}

/** Run `fn` with training mode off. */
export function evalMode<T>(fn: () => T): T {
  return usingConfig("train", false, fn);
}

// ── Backend selection ──────────────────────────────────────────────────────

export function getBackend(): Backend {
  if (!backend) {
    backend = backendRegistry.create(config.backend, config.seed);
  }
  return backend;
}

/** Replace the active backend until the config's backend or seed changes. */
export function useBackend(b: Backend): void {
  backend = b;
}

export function usingBackend<T>(b: Backend, fn: () => T): T {
  const prev = backend;
  backend = b;
  try {
    return fn();
  } finally {
    backend = prev;
  }
}

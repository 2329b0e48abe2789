/**
 * Shared helpers reading environment variables in a predictable manner, plus
 * the conductor's own environment settings. Centralising the parsing keeps
 * coercion rules consistent between the CLI and the tests.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

type Env = Record<string, string | undefined>;

/** Normalises the raw value retrieved from the environment. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the variable as a boolean. Accepts "1/true/yes/on" and
 * "0/false/no/off"; anything else falls back to the default.
 */
export function readBool(name: string, defaultValue: boolean, env: Env = process.env): boolean {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (normalised === undefined) {
    return defaultValue;
  }
  if (TRUE_LITERALS.has(normalised)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalised)) {
    return false;
  }
  return defaultValue;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional integer when the variable contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions, env: Env = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Returns the trimmed string when the variable is set to a non-empty value. */
export function readOptionalString(name: string, env: Env = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable while validating that the literal belongs to the
 * allow-list. Comparison is case-insensitive.
 */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: Env = process.env,
): T {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (normalised === undefined) {
    return defaultValue;
  }
  return allowed.find((value) => value.toLowerCase() === normalised) ?? defaultValue;
}

/** Dispatch knobs that can be tuned without touching the configuration file. */
export interface DispatchEnvOverrides {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  attemptTimeoutMs?: number;
  probeIntervalMs?: number;
}

/** Settings the conductor reads from its environment at start-up. */
export interface ConductorEnvSettings {
  /** Path of the YAML/JSON server configuration (`CONDUCTOR_CONFIG`). */
  configPath: string | undefined;
  /** Directory hosting the memory and graph snapshots (`CONDUCTOR_DATA_DIR`). */
  dataDir: string | undefined;
  /** Mirrored log file (`CONDUCTOR_LOG_FILE`). */
  logFile: string | undefined;
  /** Minimum level written by the CLI logger (`CONDUCTOR_LOG_LEVEL`). */
  logLevel: "debug" | "info" | "warn" | "error";
  /** Whether the in-process capability servers are registered (`CONDUCTOR_LOCAL_SERVERS`). */
  localServers: boolean;
  dispatch: DispatchEnvOverrides;
}

/** Reads every `CONDUCTOR_*` variable understood by the runtime. */
export function readConductorEnv(env: Env = process.env): ConductorEnvSettings {
  const dispatch: DispatchEnvOverrides = {};
  const maxAttempts = readOptionalInt("CONDUCTOR_DISPATCH_MAX_ATTEMPTS", { min: 1, max: 20 }, env);
  if (maxAttempts !== undefined) dispatch.maxAttempts = maxAttempts;
  const baseDelayMs = readOptionalInt("CONDUCTOR_DISPATCH_BASE_DELAY_MS", { min: 0 }, env);
  if (baseDelayMs !== undefined) dispatch.baseDelayMs = baseDelayMs;
  const maxDelayMs = readOptionalInt("CONDUCTOR_DISPATCH_MAX_DELAY_MS", { min: 0 }, env);
  if (maxDelayMs !== undefined) dispatch.maxDelayMs = maxDelayMs;
  const attemptTimeoutMs = readOptionalInt("CONDUCTOR_DISPATCH_ATTEMPT_TIMEOUT_MS", { min: 1 }, env);
  if (attemptTimeoutMs !== undefined) dispatch.attemptTimeoutMs = attemptTimeoutMs;
  const probeIntervalMs = readOptionalInt("CONDUCTOR_DISPATCH_PROBE_INTERVAL_MS", { min: 0 }, env);
  if (probeIntervalMs !== undefined) dispatch.probeIntervalMs = probeIntervalMs;

  return {
    configPath: readOptionalString("CONDUCTOR_CONFIG", env),
    dataDir: readOptionalString("CONDUCTOR_DATA_DIR", env),
    logFile: readOptionalString("CONDUCTOR_LOG_FILE", env),
    logLevel: readEnum("CONDUCTOR_LOG_LEVEL", ["debug", "info", "warn", "error"] as const, "info", env),
    localServers: readBool("CONDUCTOR_LOCAL_SERVERS", true, env),
    dispatch,
  };
}

import type { LogLevel } from "./logger.js";

/** Options parsed from the command line. Unset values fall back to the environment. */
export interface ConductorCliOptions {
  configPath?: string;
  dataDir?: string;
  logFile?: string;
  logLevel?: LogLevel;
  /** `false` when `--no-local-servers` is given. */
  localServers?: boolean;
}

const FLAG_WITH_VALUE = new Set(["--config", "--data-dir", "--log-file", "--log-level"]);
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function requireNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`flag ${flag} cannot be empty`);
  }
  return trimmed;
}

/**
 * Parses `--flag value` and `--flag=value` forms. Unknown flags are rejected
 * so typos do not silently fall back to defaults.
 */
export function parseConductorCliOptions(argv: readonly string[]): ConductorCliOptions {
  const options: ConductorCliOptions = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? "";
    if (!arg.startsWith("--")) {
      continue;
    }

    const [flag = arg, inlineValue] = arg.split("=", 2);
    let value = inlineValue;
    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`flag ${flag} requires a value`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--config":
        options.configPath = requireNonEmpty(value ?? "", flag);
        break;
      case "--data-dir":
        options.dataDir = requireNonEmpty(value ?? "", flag);
        break;
      case "--log-file":
        options.logFile = requireNonEmpty(value ?? "", flag);
        break;
      case "--log-level": {
        const level = requireNonEmpty(value ?? "", flag).toLowerCase();
        if (!isLogLevel(level)) {
          throw new Error(`flag --log-level expects one of ${LOG_LEVELS.join(", ")}`);
        }
        options.logLevel = level;
        break;
      }
      case "--no-local-servers":
        options.localServers = false;
        break;
      default:
        throw new Error(`unknown flag ${flag}`);
    }
  }

  return options;
}

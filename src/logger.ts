import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getDispatchContext, type DispatchContext } from "./infra/dispatchContext.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const REDACTED = "[REDACTED]";

/** Payload keys whose values never reach the log once redaction is on. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "credential",
  "cookie",
]);

const ENABLE_DIRECTIVES = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const DISABLE_DIRECTIVES = new Set(["off", "false", "no", "0", "disable", "disabled"]);

export interface RedactionDirectives {
  enabled: boolean;
  tokens: string[];
}

/**
 * Reads `CONDUCTOR_LOG_REDACT`: a comma-separated list mixing toggles
 * (`on`, `off`...) and literal secrets to scrub. Literal secrets alone turn
 * redaction on; an explicit toggle always wins.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  let toggle: boolean | undefined;
  const tokens = new Set<string>();
  for (const directive of (raw ?? "").split(",")) {
    const trimmed = directive.trim();
    if (trimmed.length === 0) {
      continue;
    }
    const lowered = trimmed.toLowerCase();
    if (ENABLE_DIRECTIVES.has(lowered)) {
      toggle = true;
    } else if (DISABLE_DIRECTIVES.has(lowered)) {
      toggle = false;
    } else {
      tokens.add(trimmed);
    }
  }
  return { enabled: toggle ?? tokens.size > 0, tokens: [...tokens] };
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  server?: string;
  operation?: string;
  attempt?: number;
  workflow?: string;
  step?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
  /** Size in bytes past which the mirrored file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Files kept by rotation, the active one included. */
  readonly maxFileCount?: number;
  /** stdout by default; the stdio MCP transport owns stdout, so the CLI uses stderr. */
  readonly stream?: "stdout" | "stderr";
  /** Literal strings or patterns scrubbed from string values. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the toggle read from `CONDUCTOR_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  readonly onEntry?: (entry: LogEntry) => void;
}

/** Size-bounded log file. Rotated copies are suffixed `.1`, `.2`... oldest last. */
class RotatingLogFile {
  private directoryReady = false;

  constructor(
    private readonly filePath: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {}

  async append(line: string): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.filePath), { recursive: true });
      this.directoryReady = true;
    }
    const size = await this.currentSize();
    if (size > 0 && size + Buffer.byteLength(line, "utf8") > this.maxBytes) {
      await this.rotate();
    }
    await appendFile(this.filePath, line, "utf8");
  }

  /** Lets the next append recreate the directory after a failure. */
  reset(): void {
    this.directoryReady = false;
  }

  private async currentSize(): Promise<number> {
    try {
      return (await stat(this.filePath)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }
  }

  private async rotate(): Promise<void> {
    if (this.maxFiles === 1) {
      await rm(this.filePath, { force: true });
      return;
    }
    await rm(`${this.filePath}.${this.maxFiles - 1}`, { force: true });
    for (let generation = this.maxFiles - 2; generation >= 0; generation -= 1) {
      const from = generation === 0 ? this.filePath : `${this.filePath}.${generation}`;
      try {
        await rename(from, `${this.filePath}.${generation + 1}`);
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    }
  }
}

/**
 * JSON-lines logger. Entries carry the dispatch correlation fields of the
 * current async context and may be mirrored to a rotating file; file writes
 * are chained so lines keep their emission order.
 */
export class StructuredLogger {
  private readonly minRank: number;
  private readonly stream: "stdout" | "stderr";
  private readonly secrets: Array<string | RegExp>;
  private readonly redact: boolean;
  private readonly listener?: (entry: LogEntry) => void;
  private readonly file: RotatingLogFile | null;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(process.env.CONDUCTOR_LOG_REDACT);
    this.minRank = LEVEL_RANK[options.level ?? "debug"];
    this.stream = options.stream ?? "stdout";
    this.secrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redact = options.redactionEnabled ?? directives.enabled;
    this.listener = options.onEntry;
    this.file = options.logFile
      ? new RotatingLogFile(
          options.logFile,
          options.maxFileSizeBytes ?? 5 * 1024 * 1024,
          Math.max(1, options.maxFileCount ?? 5),
        )
      : null;
  }

  debug(message: string, payload?: unknown): void {
    this.emit("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.emit("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.emit("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.emit("error", message, payload);
  }

  /** Resolves once every queued file write has completed. */
  async flush(): Promise<void> {
    await this.pending;
  }

  private emit(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...correlationFields(getDispatchContext()),
    };
    if (payload !== undefined) {
      entry.payload = this.redact ? this.scrub(payload) : serialiseErrors(payload);
    }

    const line = `${JSON.stringify(entry)}\n`;
    process[this.stream].write(line);
    this.listener?.(structuredClone(entry));

    const file = this.file;
    if (file) {
      this.pending = this.pending.then(() =>
        file.append(line).catch((error: unknown) => {
          file.reset();
          reportInternalFailure("log_file_write_failed", error);
        }),
      );
    }
  }

  private scrub(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrubText(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.scrub(item));
    }
    if (value instanceof Error) {
      const { code, ...rest } = describeErrorValue(value);
      return { ...rest, message: this.scrubText(rest.message), ...(code === undefined ? {} : { code }) };
    }
    if (value !== null && typeof value === "object") {
      return Object.fromEntries(
        Object.entries(value).map(([key, nested]) => [
          key,
          SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : this.scrub(nested),
        ]),
      );
    }
    return value;
  }

  private scrubText(text: string): string {
    return this.secrets.reduce<string>((current, secret) => {
      if (typeof secret === "string") {
        return secret.length > 0 ? current.split(secret).join(REDACTED) : current;
      }
      return current.replace(secret, REDACTED);
    }, text);
  }
}

function correlationFields(context: DispatchContext | undefined): Partial<LogEntry> {
  const fields: Partial<LogEntry> = {};
  if (!context) {
    return fields;
  }
  if (context.server !== undefined) fields.server = context.server;
  if (context.operation !== undefined) fields.operation = context.operation;
  if (context.attempt !== undefined) fields.attempt = context.attempt;
  if (context.workflow !== undefined) fields.workflow = context.workflow;
  if (context.step !== undefined) fields.step = context.step;
  return fields;
}

interface SerialisedError {
  name: string;
  message: string;
  code?: string;
}

/** JSON.stringify drops the non-enumerable fields of an Error, so they are copied out. */
function describeErrorValue(error: Error): SerialisedError {
  const described: SerialisedError = { name: error.name, message: error.message };
  if ("code" in error && typeof error.code === "string") {
    described.code = error.code;
  }
  return described;
}

function serialiseErrors(value: unknown): unknown {
  if (value instanceof Error) {
    return describeErrorValue(value);
  }
  if (Array.isArray(value)) {
    return value.map(serialiseErrors);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, nested]) => [key, serialiseErrors(nested)]));
  }
  return value;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Failures of the logger itself go straight to stderr. */
function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { message: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

/** Placeholder inserted where a secret was scrubbed. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are replaced when structured redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "secret",
  "password",
]);

/**
 * Parses the `GRAPHBENCH_LOG_REDACT` environment variable. Directives are
 * comma separated: toggles such as `on`/`off` and literal substrings that must
 * be scrubbed from answer excerpts (`"on,test-secret"`). Providing substrings
 * without a toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  const directives = (raw ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];
  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB
const DEFAULT_MAX_FILE_COUNT = 5;
/** Longest answer excerpt kept in a log entry. */
const EXCERPT_LIMIT = 512;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files retained, the active one included. */
  readonly maxFileCount?: number;
  /** Substrings or patterns scrubbed from answer excerpts. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the toggle parsed from `GRAPHBENCH_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Listener invoked with a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Suppresses the stdout copy; used by tests and the CLI's `--quiet`. */
  readonly silent?: boolean;
}

/** Scored answer summary recorded by {@link StructuredLogger.logAttempt}. */
export interface AttemptLogEvent {
  instanceId: string;
  family: string;
  notation: string;
  correct: boolean;
  attempts: number;
  failure?: string | null;
  rawText?: string | null;
}

function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly silent: boolean;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.GRAPHBENCH_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.entryListener = options.onEntry;
    this.silent = options.silent ?? false;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Records one scored attempt. The raw answer is truncated and scrubbed
   * before it reaches the log.
   */
  logAttempt(event: AttemptLogEvent): void {
    this.log(event.correct ? "info" : "warn", "attempt_scored", {
      instance_id: event.instanceId,
      family: event.family,
      notation: event.notation,
      correct: event.correct,
      attempts: event.attempts,
      failure: event.failure ?? null,
      excerpt: event.rawText ? this.truncateAndRedact(event.rawText) : undefined,
    });
  }

  /** Waits for every pending file write. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const safePayload = payload !== undefined ? this.redactStructuredValue(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (!this.silent) {
      process.stdout.write(line);
    }
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          this.reportFailure("log_file_write_failed", err);
          this.logDirectoryReady = false;
        }
      })
      .catch((err: unknown) => {
        this.reportFailure("log_queue_failed", err);
        this.writeQueue = Promise.resolve();
      });
  }

  private reportFailure(message: string, err: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: err instanceof Error ? { message: err.message } : { error: String(err) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  private truncateAndRedact(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized.length <= EXCERPT_LIMIT ? sanitized : `${sanitized.slice(0, EXCERPT_LIMIT)}…`;
  }

  /**
   * Rotates the active file when appending `pendingBytes` would exceed the
   * size limit, keeping at most {@link maxFileCount} files.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await this.renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await this.renameIfPresent(logFile, `${logFile}.1`);
  }

  private async renameIfPresent(source: string, target: string): Promise<void> {
    try {
      await rename(source, target);
    } catch (error) {
      if (!hasErrnoCode(error, "ENOENT")) {
        throw error;
      }
    }
  }

  private redactStructuredValue(value: unknown): unknown {
    return this.redactionEnabled ? this.deepRedact(value) : value;
  }

  private deepRedact(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }
}

import fs from "fs";
import path from "path";
import { LOG_LEVELS, type LogLevel, type PublishConfig } from "./config.js";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  error(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  trace(message: string, meta?: LogMeta): void;
}

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

let configuredLevel: LogLevel = "info";
let minLevel = LEVELS[configuredLevel];
let consoleEnabled = false;
let logFile: string | undefined;

let stream: fs.WriteStream | null = null;

function ensureStream() {
  if (!logFile) return null;
  if (stream) return stream;
  const target = logFile;
  try {
    fs.mkdirSync(path.dirname(target), { recursive: true });
  } catch (e) {
    console.error("[logger] failed to create log directory", e);
  }
  try {
    const header = `# feed-publisher log (level=${configuredLevel}) started ${new Date().toISOString()}\n`;
    try {
      fs.appendFileSync(target, header);
    } catch (e) {
      console.error("[logger] failed to write log header", e);
    }
    const created = fs.createWriteStream(target, { flags: "a" });
    created.on("error", (err) => {
      console.error("[logger] write stream error", err);
      created.end();
      if (stream === created) stream = null;
    });
    stream = created;
  } catch (e) {
    console.error("[logger] failed to create log file stream", e);
    stream = null;
  }
  return stream;
}

/** Applies the `log` section of the configuration. Reopens the file stream when the target changes. */
export function configureLogger(options: PublishConfig["log"]) {
  configuredLevel = LOG_LEVELS.includes(options.level) ? options.level : "info";
  minLevel = LEVELS[configuredLevel];
  consoleEnabled = options.console;
  if (options.file !== logFile) {
    stream?.end();
    stream = null;
    logFile = options.file;
  }
  if (logFile) ensureStream();
}

/** Flushes and closes the log file, if one is open. */
export function closeLogger(): Promise<void> {
  const current = stream;
  stream = null;
  if (!current) return Promise.resolve();
  return new Promise((resolve) => current.end(() => resolve()));
}

export function getLogFilePath() {
  return logFile;
}

export function isFileLoggingActive() {
  return !!stream;
}

export function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    const base: Record<string, unknown> = {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) base[key] = serialize(v);
    }
    return base;
  }
  if (!value || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(serialize);
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = serialize(v);
  }
  return out;
}

function write(level: LogLevel, message: string, meta?: LogMeta) {
  if (LEVELS[level] > minLevel) return;
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    msg: message
  };
  if (meta !== undefined) entry.meta = serialize(meta);

  if (consoleEnabled) {
    const consoleMethod = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (entry.meta !== undefined) {
      consoleMethod(`[${level}] ${message}`, entry.meta);
    } else {
      consoleMethod(`[${level}] ${message}`);
    }
  }
  const s = ensureStream();
  if (s) {
    s.write(JSON.stringify(entry) + "\n");
  }
}

export const logger: Logger = {
  error(message, meta) { write("error", message, meta); },
  warn(message, meta) { write("warn", message, meta); },
  info(message, meta) { write("info", message, meta); },
  debug(message, meta) { write("debug", message, meta); },
  trace(message, meta) { write("trace", message, meta); }
};

/** Logger that adds `bindings` to every entry's metadata. */
export function childLogger(bindings: LogMeta, base: Logger = logger): Logger {
  return {
    error: (msg, meta) => base.error(msg, { ...bindings, ...meta }),
    warn: (msg, meta) => base.warn(msg, { ...bindings, ...meta }),
    info: (msg, meta) => base.info(msg, { ...bindings, ...meta }),
    debug: (msg, meta) => base.debug(msg, { ...bindings, ...meta }),
    trace: (msg, meta) => base.trace(msg, { ...bindings, ...meta })
  };
}

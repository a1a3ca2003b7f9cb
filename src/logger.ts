import { existsSync, mkdirSync, appendFileSync } from "fs";
import { join } from "path";

const LOGS_DIR = process.env.LOG_DIR ?? join(__dirname, "../logs");
const LOG_FILE = join(LOGS_DIR, "app.log");

type LogLevel = "info" | "warn" | "error" | "debug";

const LOG_COLORS: Record<LogLevel, string> = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const RESET = "\x1b[0m";

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveMinLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(raw) ? raw : "debug";
}

const fileOutputEnabled =
  process.env.LOG_TO_FILE !== "false" && process.env.NODE_ENV !== "test";
let fileWriteFailed = false;

if (fileOutputEnabled && !existsSync(LOGS_DIR)) {
  mkdirSync(LOGS_DIR, { recursive: true });
}

function getTimestamp(): string {
  return new Date().toLocaleString("en-CA", {
    timeZone: process.env.TZ ?? "UTC",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = getTimestamp();
  const extraArgs =
    args.length > 0
      ? " " +
        args
          .map((a) => {
            if (a instanceof Error) return a.message;
            return typeof a === "object" ? JSON.stringify(a) : String(a);
          })
          .join(" ")
      : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${extraArgs}`;
}

function writeToFile(entry: string): void {
  if (!fileOutputEnabled || fileWriteFailed) return;
  try {
    appendFileSync(LOG_FILE, entry + "\n", "utf-8");
  } catch (error) {
    // Report once, then keep logging to the console only
    fileWriteFailed = true;
    process.stderr.write(`Log file ${LOG_FILE} is not writable: ${error}\n`);
  }
}

function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveMinLevel()]) return;

  const entry = formatLogEntry(level, message, ...args);
  const color = LOG_COLORS[level];

  if (level === "error") {
    console.error(`${color}${entry}${RESET}`);
  } else if (level === "warn") {
    console.warn(`${color}${entry}${RESET}`);
  } else {
    console.log(`${color}${entry}${RESET}`);
  }

  // File output without color
  writeToFile(entry);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = {
  info: (message: string, ...args: unknown[]) => log("info", message, ...args),
  warn: (message: string, ...args: unknown[]) => log("warn", message, ...args),
  error: (message: string, ...args: unknown[]) =>
    log("error", message, ...args),
  debug: (message: string, ...args: unknown[]) =>
    log("debug", message, ...args),
};

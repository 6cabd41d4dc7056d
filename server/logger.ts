import { LogLevelSchema, type LogLevel } from "./src/config/env";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const initialLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
let currentLevel: LogLevel = initialLevel.success ? initialLevel.data : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatLine(message: string, source: string): string {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  return `${formattedTime} [${source}] ${message}`;
}

export function log(message: string, source = "express"): void {
  if (shouldLog("info")) {
    console.log(formatLine(message, source));
  }
}

export function logDebug(message: string, source = "express"): void {
  if (shouldLog("debug")) {
    console.debug(formatLine(message, source));
  }
}

export function logWarn(message: string, source = "express"): void {
  if (shouldLog("warn")) {
    console.warn(formatLine(message, source));
  }
}

export function logError(message: string, source = "express", error?: unknown): void {
  if (!shouldLog("error")) {
    return;
  }
  if (error === undefined) {
    console.error(formatLine(message, source));
  } else {
    console.error(formatLine(message, source), error);
  }
}

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(levelWeight, value);
}

const envLevel = process.env.REGISTRY_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const tags: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function emit(level: LogLevel, line: string): void {
  if (levelWeight[level] < levelWeight[threshold]) {
    return;
  }
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Override `REGISTRY_LOG_LEVEL` for the rest of the process.
 *
 * @throws Error for a level outside debug/info/error.
 */
export function setLogLevel(level: LogLevel): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  threshold = level;
}

/** CLI results, e.g. that the index is up to date. */
export function info(message: string): void {
  emit("info", tags.info(message));
}

/** Resolved commits, cache hits, HTTP status codes. */
export function debug(message: string): void {
  emit("debug", tags.debug(message));
}

/** Goes to stderr; the CLI reports the error cause chain here. */
export function error(message: string): void {
  emit("error", tags.error(message));
}

/**
 * Progress of a long step, printed as `   Unpacking sample v1.0.1` at info level.
 *
 * @param label - Verb, right-aligned in bold green.
 * @param message - Package or registry being worked on.
 */
export function status(label: string, message: string): void {
  emit("info", `${chalk.bold.green(label.padStart(12))} ${message}`);
}

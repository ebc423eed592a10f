/**
 * Logger Module
 * Structured logging using pino with console output
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

const roots = new Map<boolean, PinoLogger>();

/**
 * One root per output mode, so pino-pretty starts a single transport worker.
 */
function getRootLogger(pretty: boolean): PinoLogger {
  const existing = roots.get(pretty);
  if (existing) return existing;

  const baseOptions: pino.LoggerOptions = {
    name: "change-impact-engine",
    level: "trace",
  };

  const root = pretty
    ? pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      })
    : pino(baseOptions);
  roots.set(pretty, root);
  return root;
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "graph-builder", "centrality")
 * @param options - Optional configuration
 * @returns A child of the shared root logger, bound to `{ component }`
 *
 * @example
 * ```typescript
 * const logger = createLogger("graph-builder");
 * logger.info({ nodes: 12 }, "Dependency graph built");
 * logger.warn({ file }, "Skipping malformed summary");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), pretty = isDevelopment() } = options;
  return getRootLogger(pretty && level !== "silent").child({ component }, { level });
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;

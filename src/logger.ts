/**
 * Scoped line logger. Everything goes to stderr: stdout carries the bar
 * protocol and must stay clean.
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error", "none"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

const WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

interface LoggerConfig {
  level: LogLevel;
  stream: NodeJS.WritableStream;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: NodeJS.WritableStream;
}

const config: LoggerConfig = {
  level: "info",
  stream: process.stderr,
};

export function configureLogging(options: LoggerOptions): void {
  config.level = options.level ?? config.level;
  config.stream = options.stream ?? config.stream;
}

export function createLogger(component: string, ...scopes: string[]): Logger {
  return new Logger([component, ...scopes]);
}

export class Logger {
  constructor(private readonly scopes: string[]) {}

  child(scope: string): Logger {
    return new Logger([...this.scopes, scope]);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (WEIGHTS[level] < WEIGHTS[config.level]) return;
    const ts = new Date().toISOString();
    const scope = this.scopes.join("|");
    config.stream.write(
      `[${ts}][${level.toUpperCase()}][${scope}]${formatContext(context)} ${message}\n`
    );
  }
}

function formatContext(context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) return "";
  const entries = Object.entries(context)
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([key, value]) => `${key}=${stringifyValue(value)}`)
    .join(" ");
  return ` [${entries}]`;
}

function stringifyValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "string") {
    if (value.length === 0) return '""';
    if (/[\s"\\[\]]/.test(value)) return JSON.stringify(value);
    return value;
  }
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "object") {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

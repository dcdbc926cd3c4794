import type { LogLevel, Logger } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  constructor(name: string, level: LogLevel = "info") {
    this.prefix = `[${name}]`;
    this.threshold = LEVEL_ORDER[level];
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("debug")) return;
    console.debug(`${this.prefix} ${msg}${formatData(data)}`);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("info")) return;
    console.log(`${this.prefix} ${msg}${formatData(data)}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("warn")) return;
    console.warn(`${this.prefix} ⚠ ${msg}${formatData(data)}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("error")) return;
    console.error(`${this.prefix} ✗ ${msg}${formatData(data)}`);
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

function formatData(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : "";
}

export function createLogger(name: string, level: LogLevel = "info"): Logger {
  return new ConsoleLogger(name, level);
}

/**
 * @file src/logger.ts
 * @description Level-gated console logging. Every line is also offered to registered
 * line listeners before level filtering, which is how passive session discovery reads
 * the server's own diagnostics.
 */

import type { LogLevel } from './types.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LineListener = (line: string) => void;

export class Logger {
  private readonly listeners = new Set<LineListener>();

  constructor(private level: LogLevel = 'info') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Registers a listener that receives every logged message, whatever the level.
   * @returns A function that removes the listener.
   */
  onLine(listener: LineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  debug(message: string, ...details: unknown[]): void {
    this.emit('debug', message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.emit('info', message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.emit('warn', message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.emit('error', message, details);
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void {
    for (const listener of this.listeners) {
      listener(message);
    }

    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }

    switch (level) {
      case 'debug':
        console.debug(message, ...details);
        break;
      case 'info':
        console.log(message, ...details);
        break;
      case 'warn':
        console.warn(message, ...details);
        break;
      case 'error':
        console.error(message, ...details);
        break;
    }
  }
}

function levelFromEnv(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
  }
}

/** Process-wide logger; `startServer` applies the configured level. */
export const logger = new Logger(levelFromEnv(process.env['LOG_LEVEL']));

import type { LogLevel } from '../config.js';
import { MCP_SERVER_NAME } from '../server-metadata.js';

const RANK: Record<LogLevel, number> = { silent: 0, info: 1, debug: 2 };

export interface Logger {
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

// stdout carries the MCP stream, so every line goes to stderr.
export function createLogger(level: LogLevel): Logger {
  const write = (min: LogLevel, message: string, details: unknown[]): void => {
    if (RANK[level] < RANK[min]) return;
    console.error(`[${MCP_SERVER_NAME}] ${message}`, ...details);
  };

  return {
    info: (message, ...details) => write('info', message, details),
    debug: (message, ...details) => write('debug', message, details),
    // Errors are printed unless logging is switched off entirely.
    error: (message, ...details) => write('info', message, details),
  };
}

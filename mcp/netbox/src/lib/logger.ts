/**
 * Structured logging for the NetBox MCP server
 *
 * Lines go to stderr (stdout is reserved for the stdio MCP protocol).
 * LOG_LEVEL picks the threshold, LOG_FILE adds a JSON-lines copy.
 *
 *   log.info('Server started', { transport: 'stdio' });
 *   logToolCall('get_sites', { limit: 5 }, { success: true }, 42);
 */

import { appendFileSync } from 'node:fs';

const LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type LogLevel = (typeof LEVELS)[number];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function thresholdFromEnv(): LogLevel {
  const requested = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
  return isLogLevel(requested) ? requested : 'INFO';
}

const LOG_FILE = process.env.LOG_FILE;
const THRESHOLD = thresholdFromEnv();

function shouldLog(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(THRESHOLD);
}

function formatLog(entry: LogEntry): string {
  const { timestamp, level, message, data } = entry;
  if (data && Object.keys(data).length > 0) {
    return `[${timestamp}] [${level}] ${message} ${JSON.stringify(data)}`;
  }
  return `[${timestamp}] [${level}] ${message}`;
}

function writeLog(entry: LogEntry): void {
  if (!shouldLog(entry.level)) return;

  console.error(formatLog(entry));

  if (LOG_FILE) {
    try {
      appendFileSync(LOG_FILE, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`[logger] cannot write ${LOG_FILE}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

function createLogger(level: LogLevel) {
  return (message: string, data?: Record<string, unknown>): void => {
    writeLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
    });
  };
}

export const log = {
  debug: createLogger('DEBUG'),
  info: createLogger('INFO'),
  warn: createLogger('WARN'),
  error: createLogger('ERROR'),
};

const SECRET_KEYS = /token|secret|password|authorization/i;
const MAX_INLINE_ITEMS = 5;

/**
 * Mask secrets and summarize bulk payloads so audit lines stay readable.
 */
export function redactArgs(args: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    if (SECRET_KEYS.test(key)) {
      redacted[key] = '[redacted]';
    } else if (Array.isArray(value) && value.length > MAX_INLINE_ITEMS) {
      redacted[key] = `[${value.length} items]`;
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

/**
 * Audit line for a finished tool call
 */
export function logToolCall(
  toolName: string,
  args: Record<string, unknown>,
  result: { success: boolean; error?: string },
  durationMs: number
): void {
  const entry = {
    tool: toolName,
    args: redactArgs(args),
    success: result.success,
    error: result.error,
    durationMs,
  };

  if (result.success) {
    log.info(`Tool call: ${toolName}`, entry);
  } else {
    log.warn(`Tool call failed: ${toolName}`, entry);
  }
}

import { loadDebugConfig, LogLevel } from '../config/debug.js';

const debugConfig = loadDebugConfig();

export type DebugCategory =
  | 'index'
  | 'resolver'
  | 'composer'
  | 'codec'
  | 'validation'
  | 'extractor';

function categoryEnabled(category: DebugCategory): boolean {
  if (!debugConfig.enabled) {
    return false;
  }

  switch (category) {
    case 'index':
      return debugConfig.logIndex;
    case 'resolver':
      return debugConfig.logResolver;
    case 'composer':
      return debugConfig.logComposer;
    case 'codec':
      return debugConfig.logCodec;
    case 'validation':
      return debugConfig.logValidation;
    case 'extractor':
      return debugConfig.logExtractor;
    default:
      return false;
  }
}

interface LogEntry {
  timestamp: string;
  level: string;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[debugConfig.logLevel];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeError(error: Error): Record<string, unknown> {
  const described: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause !== undefined) {
    described.cause = error.cause instanceof Error ? describeError(error.cause) : error.cause;
  }
  return described;
}

const errorReplacer = (_key: string, val: unknown) =>
  val instanceof Error ? describeError(val) : val;

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[catalog:${category}]` : '[catalog]';
  const base = `${timestamp} [${level.toUpperCase()}] ${categoryStr} ${message}`;

  if (Object.keys(rest).length === 0) {
    return base;
  }

  try {
    return `${base}\n${JSON.stringify(rest, errorReplacer, 2)}`;
  } catch (error) {
    return `${base}\n[unserializable: ${errorMessage(error)}]`;
  }
}

function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, errorReplacer);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      _serializationError: `Failed to serialize: ${errorMessage(error)}`,
    });
  }
}

// stdout carries the MCP transport, so every line goes to stderr
function emit(entry: LogEntry): void {
  const output = debugConfig.logFormat === 'json' ? formatJson(entry) : formatPretty(entry);
  console.error(output);
}

class Logger {
  private createEntry(
    level: LogLevel,
    category: string | undefined,
    message: string,
    payload?: unknown
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (category) {
      entry.category = category;
    }

    if (payload === undefined) {
      return entry;
    }

    if (payload instanceof Error) {
      entry.error = describeError(payload);
    } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
      for (const [key, val] of Object.entries(payload)) {
        entry[key] = val instanceof Error ? describeError(val) : val;
      }
    } else {
      entry.data = payload;
    }

    return entry;
  }

  debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (!categoryEnabled(category) || !shouldLog(LogLevel.DEBUG)) {
      return;
    }

    emit(this.createEntry(LogLevel.DEBUG, category, message, payload));
  }

  info(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    emit(this.createEntry(LogLevel.INFO, undefined, message, payload));
  }

  warn(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.WARN)) {
      return;
    }

    emit(this.createEntry(LogLevel.WARN, undefined, message, payload));
  }

  error(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.ERROR)) {
      return;
    }

    emit(this.createEntry(LogLevel.ERROR, undefined, message, payload));
  }

  metric(metricName: string, payload: Record<string, unknown>): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    const entry = this.createEntry(LogLevel.INFO, undefined, metricName, payload);
    entry.type = 'metric';
    emit(entry);
  }

  /**
   * Time a synchronous or asynchronous function and emit a metric when it settles.
   * Failures are logged at error level and rethrown.
   */
  withTimer<T>(spanName: string, metadata: Record<string, unknown>, fn: () => T): T {
    const start = Date.now();

    const finish = (error?: unknown) => {
      const durationMs = Date.now() - start;
      if (error !== undefined) {
        this.error(`${spanName} failed`, { ...metadata, durationMs, error });
      } else if (debugConfig.enableStageTiming) {
        this.metric(spanName, { ...metadata, durationMs });
      }
    };

    let result: T;
    try {
      result = fn();
    } catch (error) {
      finish(error);
      throw error;
    }

    if (result instanceof Promise) {
      void result.then(
        () => finish(),
        (error: unknown) => finish(error)
      );
      return result;
    }

    finish();
    return result;
  }
}

export const logger = new Logger();

export function debugLog(category: DebugCategory, message: string, payload?: unknown) {
  logger.debug(category, message, payload);
}

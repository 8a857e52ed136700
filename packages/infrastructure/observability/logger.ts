/**
 * 構造化ログ（AgentCore Observability pattern）
 *
 * 1行1 JSON: timestamp / level / message / 任意フィールド / service
 */
import { loadEnvironment } from '../config/environment';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogFields): void;
  info(message: string, data?: LogFields): void;
  warn(message: string, data?: LogFields): void;
  error(message: string, data?: LogFields): void;
}

export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  /** 未指定時は LOG_LEVEL、さらに未指定なら defaultLevel */
  level?: LogLevel;
  defaultLevel?: LogLevel;
  sink?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

const consoleSink: LogSink = (line, level) => {
  if (SEVERITY[level] >= SEVERITY.WARN) {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function serializeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? loadEnvironment().logLevel ?? options.defaultLevel ?? 'INFO';
  const sink = options.sink ?? consoleSink;

  const log = (level: LogLevel, message: string, data?: LogFields) => {
    if (SEVERITY[level] < SEVERITY[threshold]) return;
    sink(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...data,
        service,
      }),
      level
    );
  };

  return {
    debug: (message, data) => log('DEBUG', message, data),
    info: (message, data) => log('INFO', message, data),
    warn: (message, data) => log('WARN', message, data),
    error: (message, data) => log('ERROR', message, data),
  };
}

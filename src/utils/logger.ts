export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR'
};

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  message: string;
  data?: LogData;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch ((value ?? '').trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

export function resolveMinLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const explicit = parseLogLevel(env.RECEIPT_LOG_LEVEL);
  if (explicit !== undefined) return explicit;
  return env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function extractErrorData(error: unknown): LogData {
  if (error instanceof Error) {
    const data: LogData = {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
    if (error.cause !== undefined) {
      data.cause = formatError(error.cause);
    }
    return data;
  }
  return { rawError: String(error) };
}

const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === 'ERROR') console.error(line);
  else if (entry.level === 'WARN') console.warn(line);
  else console.log(line);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? resolveMinLogLevel();
  const sink = options.sink ?? consoleSink;

  const log = (level: LogLevel, message: string, data?: LogData): void => {
    if (level < minLevel) return;

    let payload = data;
    // Errors do not survive JSON.stringify, flatten them first
    if (payload && payload.error !== undefined) {
      payload = { ...payload, error: extractErrorData(payload.error) };
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      message,
      ...(payload && { data: payload })
    };
    sink(entry);
  };

  return {
    debug: (message, data) => log(LogLevel.DEBUG, message, data),
    info: (message, data) => log(LogLevel.INFO, message, data),
    warn: (message, data) => log(LogLevel.WARN, message, data),
    error: (message, data) => log(LogLevel.ERROR, message, data)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

export const logger: Logger = createLogger();

// lib/utils/logger.ts

/**
 * One JSON object per line, shaped for CloudWatch Logs Insights queries over a
 * deployment: `level`, `time`, `msg`, then the bound and per-call fields.
 * Error values in the fields are flattened to their name, message and cause so
 * a rejected platform call stays readable in the log.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export type LogFields = Record<string, unknown>;

export interface LogRecord {
  readonly level: LogLevel;
  readonly time: string;
  readonly msg: string;
  readonly fields: LogFields;
}

/** Where finished records go. Lambda and the CLI write to stdout. */
export type LogSink = (record: LogRecord) => void;

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 10,
  [LogLevel.Info]: 20,
  [LogLevel.Warn]: 30,
  [LogLevel.Error]: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const wanted = value?.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === wanted);
}

export function flattenError(error: Error): LogFields {
  const flat: LogFields = { name: error.name, message: error.message };
  if (error.cause instanceof Error) flat.cause = flattenError(error.cause);
  else if (error.cause !== undefined) flat.cause = String(error.cause);
  return flat;
}

function toLogValue(value: unknown): unknown {
  return value instanceof Error ? flattenError(value) : value;
}

export const stdoutSink: LogSink = (record) => {
  const fields = Object.fromEntries(Object.entries(record.fields).map(([key, value]) => [key, toLogValue(value)]));
  process.stdout.write(`${JSON.stringify({ level: record.level, time: record.time, msg: record.msg, ...fields })}\n`);
};

let sink: LogSink = stdoutSink;
let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.Info;

/** Route records to another sink; without an argument, back to stdout. */
export function useLogSink(next?: LogSink): void {
  sink = next ?? stdoutSink;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export class Logger {
  constructor(private readonly bindings: LogFields = {}) {}

  debug(msg: string, fields?: LogFields): void {
    this.emit(LogLevel.Debug, msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.emit(LogLevel.Info, msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.emit(LogLevel.Warn, msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.emit(LogLevel.Error, msg, fields);
  }

  /** A logger whose records also carry `fields`; per-call fields still win. */
  child(fields: LogFields): Logger {
    return new Logger({ ...this.bindings, ...fields });
  }

  private emit(level: LogLevel, msg: string, fields?: LogFields): void {
    if (SEVERITY[level] < SEVERITY[threshold]) return;
    sink({ level, time: new Date().toISOString(), msg, fields: { ...this.bindings, ...fields } });
  }
}

export function createLogger(bindings: LogFields = {}): Logger {
  return new Logger(bindings);
}

export const logger = createLogger({ service: 'segment-model-delivery' });

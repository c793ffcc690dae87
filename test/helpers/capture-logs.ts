import { LogRecord, useLogSink } from '../../lib/utils/logger';

export interface CapturedLogs {
  readonly records: LogRecord[];
  messages(): string[];
  restore(): void;
}

export function captureLogs(): CapturedLogs {
  const records: LogRecord[] = [];
  useLogSink((record) => records.push(record));
  return {
    records,
    messages: () => records.map((record) => record.msg),
    restore: () => useLogSink(),
  };
}

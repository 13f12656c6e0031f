import {
  type LogContext,
  type LogRecord,
  type Logger,
  LoggerBase,
} from "~shared/Logger";

/**
 * 將記錄收集在記憶體中的 Logger，extend/append 後仍共用同一份 records。
 */
export class LoggerMemory extends LoggerBase {
  constructor(
    readonly records: LogRecord[] = [],
    path: readonly string[] = [],
    context: LogContext = {}
  ) {
    super("trace", path, context, {});
  }

  protected derive(path: readonly string[], context: LogContext): Logger {
    return new LoggerMemory(this.records, path, context);
  }

  protected write(record: LogRecord) {
    this.records.push(record);
  }
}

export function buildTestLogger() {
  return new LoggerMemory();
}

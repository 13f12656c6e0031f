export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof logLevels)[number];

export const levelRank: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

/**
 * 記錄時附帶的資訊。
 * - event: 取代層級顯示在路徑後，並用於查找 emoji
 * - emoji: 指定該行的 emoji
 * - error: Error 會序列化為 err，其餘值照常輸出
 */
export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: Date;
  level: LogLevel;
  path: readonly string[];
  event?: string;
  emoji?: string;
  /** 純文字訊息 */
  msg: string;
  /** 插值以 kleur 上色的訊息 */
  display: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;
  /** 新增一層路徑，並繼承 context */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;
}

import kleur from "kleur";

import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type Logger,
  type SerializedError,
  type TemplateLog,
  levelRank,
} from "./Logger";

export type EmojiMap = Partial<Record<string, string>>;

export abstract class LoggerBase implements Logger {
  readonly trace = this.bindLevel("trace");
  readonly debug = this.bindLevel("debug");
  readonly info = this.bindLevel("info");
  readonly warn = this.bindLevel("warn");
  readonly error = this.bindLevel("error");

  constructor(
    protected readonly level: LogLevel,
    protected readonly path: readonly string[],
    protected readonly context: LogContext,
    protected readonly emojiMap: EmojiMap
  ) {}

  protected abstract write(record: LogRecord): void;
  protected abstract derive(
    path: readonly string[],
    context: LogContext
  ): Logger;

  extend(name: string, context: LogContext = {}): Logger {
    return this.derive([...this.path, name], { ...this.context, ...context });
  }

  append(context: LogContext): Logger {
    return this.derive(this.path, { ...this.context, ...context });
  }

  private bindLevel(level: LogLevel): LogMethod {
    const emit = (
      context: LogContext,
      strings: readonly string[],
      values: readonly unknown[]
    ) => this.log(level, context, strings, values);

    function log(message: string): void;
    function log(context: LogContext, message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      first?: string | LogContext,
      message?: string
    ): TemplateLog | void {
      if (typeof first === "string") {
        emit({}, [first], []);
        return;
      }
      const context = first ?? {};
      if (message !== undefined) {
        emit(context, [message], []);
        return;
      }
      return (strings: TemplateStringsArray, ...values: unknown[]) =>
        emit(context, strings, values);
    }

    return log;
  }

  private log(
    level: LogLevel,
    callContext: LogContext,
    strings: readonly string[],
    values: readonly unknown[]
  ) {
    if (levelRank[level] < levelRank[this.level]) return;

    const { emoji: inheritedEmoji, ...inherited } = this.context;
    const { emoji: callEmoji, ...call } = callContext;
    const { event, error, ...fields } = { ...inherited, ...call };

    let msg = strings[0] ?? "";
    let display = msg;
    values.forEach((value, i) => {
      const text = formatValue(value);
      const tail = strings[i + 1] ?? "";
      msg += text + tail;
      display += kleur.green(text) + tail;
      fields[`__${i}`] = value;
    });

    const err = error instanceof Error ? serializeError(error) : undefined;
    if (error !== undefined && !err) fields.error = error;

    // 呼叫指定 > 事件 > 繼承（僅 info 以下）> 層級
    const emoji =
      callEmoji ??
      (event !== undefined ? this.emojiMap[event] : undefined) ??
      (levelRank[level] <= levelRank.info ? inheritedEmoji : undefined) ??
      this.emojiMap[level];

    this.write({
      time: new Date(),
      level,
      path: this.path,
      event,
      emoji,
      msg,
      display,
      context: fields,
      err,
    });
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

function serializeError(error: Error): SerializedError {
  return { name: error.name, message: error.message, stack: error.stack };
}

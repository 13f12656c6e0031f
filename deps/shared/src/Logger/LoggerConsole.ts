import kleur from "kleur";

import type { LogContext, LogLevel, LogRecord } from "./Logger";
import { type EmojiMap, LoggerBase } from "./LoggerBase";

export type LoggerConsoleOptions = {
  /** 每行輸出一筆 JSON 記錄 */
  json?: boolean;
};

const levelColor: Record<LogLevel, (text: string) => string> = {
  trace: kleur.gray,
  debug: kleur.gray,
  info: kleur.cyan,
  warn: kleur.yellow,
  error: kleur.red,
};

export class LoggerConsole extends LoggerBase {
  constructor(
    level: LogLevel,
    path: readonly string[] = [],
    context: LogContext = {},
    emojiMap: EmojiMap = {},
    private readonly options: LoggerConsoleOptions = {}
  ) {
    super(level, path, context, emojiMap);
  }

  protected derive(path: readonly string[], context: LogContext) {
    return new LoggerConsole(
      this.level,
      path,
      context,
      this.emojiMap,
      this.options
    );
  }

  protected write(record: LogRecord) {
    const out = pickConsole(record.level);
    if (this.options.json) {
      out(
        JSON.stringify({
          time: record.time.toISOString(),
          level: record.level,
          path: record.path.join(":"),
          event: record.event,
          msg: record.msg,
          ...record.context,
          err: record.err,
        })
      );
      return;
    }

    out(formatLine(record));
    if (record.err?.stack) console.error(kleur.gray(record.err.stack));
  }
}

export function formatLine(record: LogRecord) {
  const head = [...record.path, record.event ?? record.level].join(":");
  const parts: string[] = [];
  if (record.emoji) parts.push(record.emoji);
  parts.push(`${levelColor[record.level](head)}: ${record.display}`);
  if (record.err && !record.err.stack) {
    parts.push(kleur.red(`${record.err.name}: ${record.err.message}`));
  }
  if (Object.keys(record.context).length > 0) {
    parts.push(kleur.gray(JSON.stringify(record.context)));
  }
  return parts.join(" ");
}

function pickConsole(level: LogLevel): (line: string) => void {
  switch (level) {
    case "trace":
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

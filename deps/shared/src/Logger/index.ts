import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envBoolean } from "../ConfigFactory";
import type { Logger } from "./Logger";
import type { EmojiMap } from "./LoggerBase";
import { LoggerConsole } from "./LoggerConsole";

export * from "./Logger";
export { type EmojiMap, LoggerBase } from "./LoggerBase";
export { LoggerConsole, type LoggerConsoleOptions } from "./LoggerConsole";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔬",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_JSON: t.Optional(envBoolean()),
  })
);

export function createDefaultLoggerFromEnv(
  env: Record<string, string | undefined> = process.env
): Logger {
  const { LOG_LEVEL, LOG_JSON } = getLoggerConfig(env);
  return new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap, {
    json: LOG_JSON ?? false,
  });
}

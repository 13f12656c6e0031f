import {
  type StaticDecode,
  type TObject,
  type TProperties,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * 環境變數的布林值：接受 true/false/1/0
 */
export function envBoolean() {
  return t
    .Transform(
      t.Union([t.Literal("true"), t.Literal("false"), t.Literal("1"), t.Literal("0")])
    )
    .Decode((v) => v === "true" || v === "1")
    .Encode((v): "true" | "false" => (v ? "true" : "false"));
}

/**
 * 以 schema 建立讀取環境變數的函式。
 * 未宣告的變數會被忽略，預設值由 schema 的 default 提供，不合法時拋出錯誤。
 */
export function buildConfigFactoryEnv<T extends TProperties>(
  schema: TObject<T>
) {
  return (
    env: Record<string, string | undefined> = process.env
  ): StaticDecode<TObject<T>> => {
    const defined = Object.fromEntries(
      Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
    );
    const cleaned = Value.Clean(schema, Value.Default(schema, defined));
    return Value.Decode(schema, cleaned);
  };
}

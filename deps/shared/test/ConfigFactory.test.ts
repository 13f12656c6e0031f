import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import { buildConfigFactoryEnv, envBoolean } from "~shared/ConfigFactory";

const getConfig = buildConfigFactoryEnv(
  t.Object({
    MODE: t.Union([t.Literal("fast"), t.Literal("safe")], { default: "safe" }),
    VERBOSE: t.Optional(envBoolean()),
  })
);

describe("buildConfigFactoryEnv", () => {
  test("套用預設值並忽略未宣告的變數", () => {
    expect(getConfig({ PATH: "/usr/bin" })).toEqual({ MODE: "safe" });
  });

  test("空字串視為未設定", () => {
    expect(getConfig({ MODE: "" })).toEqual({ MODE: "safe" });
  });

  test("envBoolean 接受 true/false/1/0", () => {
    expect(getConfig({ VERBOSE: "1" }).VERBOSE).toBe(true);
    expect(getConfig({ VERBOSE: "true" }).VERBOSE).toBe(true);
    expect(getConfig({ VERBOSE: "0" }).VERBOSE).toBe(false);
    expect(getConfig({ VERBOSE: "false" }).VERBOSE).toBe(false);
  });

  test("不合法的值應拋出錯誤", () => {
    expect(() => getConfig({ MODE: "turbo" })).toThrow();
    expect(() => getConfig({ VERBOSE: "yes" })).toThrow();
  });
});

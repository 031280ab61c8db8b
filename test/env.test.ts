import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { readRuntimeSettings } from "../src/config/env.js";
import { resolveLogLevel } from "../src/logger.js";

describe("runtime settings", () => {
  it("uses defaults when nothing is set", () => {
    expect(readRuntimeSettings({})).toEqual({
      configDir: path.join(os.homedir(), ".config", "apiwalk"),
      configOverride: undefined,
      profile: "default",
      apiName: undefined
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const env = {
      APIWALK_CONFIG_DIR: "/tmp/apiwalk-config",
      APIWALK_CONFIG: " ./local.yaml ",
      APIWALK_PROFILE: "  ",
      APIWALK_API: "widgets"
    } satisfies NodeJS.ProcessEnv;

    expect(readRuntimeSettings(env)).toEqual({
      configDir: "/tmp/apiwalk-config",
      configOverride: "./local.yaml",
      profile: "default",
      apiName: "widgets"
    });
  });

  it("resolves log levels", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel("verbose")).toBe("info");
    expect(resolveLogLevel(undefined)).toBe("info");
  });
});

import { describe, expect, it, vi } from "vitest";
import { join, resolve } from "node:path";

const mockHomedir = vi.hoisted(() => vi.fn(() => "/home/tester"));

vi.mock("node:os", async importOriginal => {
  const actual = await importOriginal<typeof import("node:os")>();
  return {
    ...actual,
    default: { ...actual, homedir: mockHomedir },
    homedir: mockHomedir,
  };
});

const { resolveSettings, getDefaultConfigDir, ENV_KEYS } = await import("../../src/config/settings.js");
const { ProfileError } = await import("../../src/util/errors.js");

describe("resolveSettings", () => {
  it("uses defaults when nothing is set", () => {
    expect(resolveSettings({}, {})).toEqual({
      configDir: join("/home/tester", ".config", "aider-profiles"),
      command: "aider",
      configFlag: "--config",
    });
  });

  it("getDefaultConfigDir is under the home directory", () => {
    expect(getDefaultConfigDir()).toBe(join("/home/tester", ".config", "aider-profiles"));
  });

  it("reads AIDER_PROFILES_* variables", () => {
    const settings = resolveSettings({}, {
      [ENV_KEYS.configDir]: "/srv/profiles",
      [ENV_KEYS.command]: "aider-dev",
      [ENV_KEYS.configFlag]: "-c",
    });
    expect(settings).toEqual({ configDir: "/srv/profiles", command: "aider-dev", configFlag: "-c" });
  });

  it("lets overrides win over the environment", () => {
    const settings = resolveSettings(
      { configDir: "/from/flag" },
      { AIDER_PROFILES_DIR: "/from/env" },
    );
    expect(settings.configDir).toBe("/from/flag");
  });

  it("treats empty values as unset", () => {
    const settings = resolveSettings({ configDir: "" }, { AIDER_PROFILES_DIR: "", AIDER_PROFILES_COMMAND: "" });
    expect(settings.configDir).toBe(join("/home/tester", ".config", "aider-profiles"));
    expect(settings.command).toBe("aider");
  });

  it("expands ~ and ${VAR} in the directory", () => {
    expect(resolveSettings({ configDir: "~/p" }, {}).configDir).toBe(join("/home/tester", "p"));
    expect(resolveSettings({ configDir: "${ROOT}/p" }, { ROOT: "/data" }).configDir).toBe("/data/p");
  });

  it("resolves a relative directory against the working directory", () => {
    expect(resolveSettings({ configDir: "profiles" }, {}).configDir).toBe(resolve("profiles"));
  });

  it("throws INVALID_SETTINGS for a bad command", () => {
    let caught: unknown;
    try {
      resolveSettings({ command: "aider --yes" }, {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ProfileError);
    expect(caught).toMatchObject({
      code: "INVALID_SETTINGS",
      message: "Invalid settings: command: assistant command must be a single executable, without arguments",
    });
  });
});

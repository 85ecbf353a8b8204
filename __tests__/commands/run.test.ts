import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type Launcher, resolveProfile, runProfile } from "../../src/commands/run.js";
import type { Settings } from "../../src/config/types.js";

describe("run", () => {
  let settings: Settings;
  const launch = vi.fn<Launcher>(async () => 0);

  beforeEach(async () => {
    launch.mockClear();
    const configDir = await mkdtemp(join(tmpdir(), "aider-profiles-run-"));
    settings = { configDir, command: "aider", configFlag: "--config" };
    await writeFile(join(configDir, "gemini.yml"), "model: gemini\n");
    await writeFile(join(configDir, "aliases.txt"), "g=gemini\ngone=deleted\n");
  });

  afterEach(async () => {
    await rm(settings.configDir, { recursive: true, force: true });
  });

  describe("resolveProfile", () => {
    it("resolves an alias", async () => {
      const resolved = await resolveProfile(settings, "g");
      expect(resolved).toEqual({
        resolution: { type: "alias", alias: "g", profile: "gemini" },
        path: join(settings.configDir, "gemini.yml"),
      });
    });

    it("resolves a raw configuration name", async () => {
      const resolved = await resolveProfile(settings, "gemini");
      expect(resolved.resolution).toEqual({ type: "name", profile: "gemini" });
    });

    it("fails for an unknown name", async () => {
      await expect(resolveProfile(settings, "zzz")).rejects.toMatchObject({
        code: "PROFILE_NOT_FOUND",
        message: `No configuration found for 'zzz'. Expected to find config file at: ${join(settings.configDir, "zzz.yml")}`,
      });
    });

    it("names the target of an alias whose configuration is gone", async () => {
      await expect(resolveProfile(settings, "gone")).rejects.toMatchObject({
        code: "PROFILE_NOT_FOUND",
        message: `No configuration found for 'gone' (alias for 'deleted'). Expected to find config file at: ${
          join(settings.configDir, "deleted.yml")
        }`,
      });
    });

    it("fails for a name that points outside the directory", async () => {
      await expect(resolveProfile(settings, "../gemini")).rejects.toMatchObject({ code: "PROFILE_NOT_FOUND" });
    });
  });

  describe("runProfile", () => {
    it("launches with the resolved path and extra args in order", async () => {
      await runProfile(settings, "g", ["file1.py", "file2.py", "--yes"], launch);

      expect(launch).toHaveBeenCalledOnce();
      expect(launch).toHaveBeenCalledWith({
        command: "aider",
        configFlag: "--config",
        configPath: join(settings.configDir, "gemini.yml"),
        extraArgs: ["file1.py", "file2.py", "--yes"],
      });
    });

    it("returns the launcher's exit code unchanged", async () => {
      launch.mockResolvedValueOnce(42);
      await expect(runProfile(settings, "g", [], launch)).resolves.toBe(42);
    });

    it("does not launch for an unknown alias", async () => {
      await expect(runProfile(settings, "nope", ["x"], launch)).rejects.toMatchObject({
        code: "PROFILE_NOT_FOUND",
      });
      expect(launch).not.toHaveBeenCalled();
    });

    it("uses the configured command and flag", async () => {
      await runProfile({ ...settings, command: "aider-nightly", configFlag: "-c" }, "gemini", [], launch);
      expect(launch).toHaveBeenCalledWith(
        expect.objectContaining({ command: "aider-nightly", configFlag: "-c", extraArgs: [] }),
      );
    });
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { error, isVerbose, log, setVerbose, warn } from "../../src/util/logger.js";

describe("logger", () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    setVerbose(false);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("log()", () => {
    it("is silent by default", () => {
      log("test message");
      expect(errorSpy).not.toHaveBeenCalled();
      expect(isVerbose()).toBe(false);
    });

    it("writes with the [aider-profiles] prefix when verbose", () => {
      setVerbose(true);
      log("hello");
      expect(errorSpy).toHaveBeenCalledWith("[aider-profiles] hello");
    });

    it("passes extra arguments through", () => {
      setVerbose(true);
      log("count", 3);
      expect(errorSpy).toHaveBeenCalledWith("[aider-profiles] count", 3);
    });

    it("is silent again after setVerbose(false)", () => {
      setVerbose(true);
      setVerbose(false);
      log("should not appear");
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe("warn()", () => {
    it("always writes, with the WARN prefix", () => {
      warn("something odd");
      expect(errorSpy).toHaveBeenCalledWith("[aider-profiles WARN] something odd");
    });
  });

  describe("error()", () => {
    it("always writes, with the ERROR prefix", () => {
      error("something broke");
      expect(errorSpy).toHaveBeenCalledWith("[aider-profiles ERROR] something broke");
    });
  });
});

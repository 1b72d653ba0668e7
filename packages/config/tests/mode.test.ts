import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { detectMode, detectModeAndCommand } from "../src/mode";

describe("detectModeAndCommand", () => {
  let savedRuntimeApi: string | undefined;

  beforeEach(() => {
    savedRuntimeApi = process.env.AWS_LAMBDA_RUNTIME_API;
    delete process.env.AWS_LAMBDA_RUNTIME_API;
  });

  afterEach(() => {
    if (savedRuntimeApi === undefined) {
      delete process.env.AWS_LAMBDA_RUNTIME_API;
    } else {
      process.env.AWS_LAMBDA_RUNTIME_API = savedRuntimeApi;
    }
  });

  it("defaults to local mode with no command", () => {
    expect(detectModeAndCommand([])).toEqual({ mode: "local", command: "none" });
  });

  it("selects lambda mode when running on a Lambda host, whatever the arguments", () => {
    // Arrange
    process.env.AWS_LAMBDA_RUNTIME_API = "127.0.0.1:9001";

    // Act
    const result = detectModeAndCommand(["deploy"]);

    // Assert
    expect(result).toEqual({ mode: "lambda", command: "none" });
  });

  it.each(["deploy", "synth", "destroy", "diff"] as const)(
    "selects deploy mode for '%s'",
    (command) => {
      expect(detectModeAndCommand(["--verbose", command])).toEqual({ mode: "deploy", command });
    },
  );

  it("selects listing in local mode", () => {
    expect(detectModeAndCommand(["list"])).toEqual({ mode: "local", command: "list" });
  });

  it("prefers a deploy verb over list", () => {
    expect(detectModeAndCommand(["list", "synth"])).toEqual({ mode: "deploy", command: "synth" });
  });

  it("detectMode returns only the mode", () => {
    expect(detectMode(["destroy"])).toBe("deploy");
  });
});

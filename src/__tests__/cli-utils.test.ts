import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  executeCommand,
  handleError,
  parseIndex,
  parseList,
} from "../cli-utils";
import { ConfigError, ParseError } from "../errors";
import { createSpyLogger } from "./helpers";

describe("handleError", () => {
  let mockLogger: ReturnType<typeof createSpyLogger>;

  beforeEach(() => {
    mockLogger = createSpyLogger();
  });

  it("formats PerfstatError with code", () => {
    handleError(new ConfigError("bad config"), mockLogger, {});

    expect(mockLogger.error).toHaveBeenCalledWith("[CONFIG_ERROR] bad config");
  });

  it("formats regular Error message", () => {
    handleError(new Error("something failed"), mockLogger, {});

    expect(mockLogger.error).toHaveBeenCalledWith("something failed");
  });

  it("shows stack in verbose mode for regular Error", () => {
    const error = new Error("something failed");
    error.stack = "Error: something failed\n    at test.ts:1:1";
    handleError(error, mockLogger, { verbose: true });

    expect(mockLogger.debug).toHaveBeenCalledWith(
      "Error: something failed\n    at test.ts:1:1",
    );
  });

  it("does not show stack when not verbose", () => {
    handleError(new Error("something failed"), mockLogger, { verbose: false });

    expect(mockLogger.debug).not.toHaveBeenCalled();
  });

  it("handles non-Error types", () => {
    handleError("string error", mockLogger, {});
    expect(mockLogger.error).toHaveBeenCalledWith("string error");
  });
});

describe("executeCommand", () => {
  let mockLogger: ReturnType<typeof createSpyLogger>;

  beforeEach(() => {
    mockLogger = createSpyLogger();
    vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("does not exit on success", async () => {
    await executeCommand(async () => {}, mockLogger, {});

    expect(process.exit).not.toHaveBeenCalled();
    expect(mockLogger.error).not.toHaveBeenCalled();
  });

  it("logs PerfstatError with code and exits 1", async () => {
    await executeCommand(
      async () => {
        throw new ParseError("boottime_0.txt", "empty boot-time report", 1);
      },
      mockLogger,
      {},
    );

    expect(mockLogger.error).toHaveBeenCalledWith(
      "[PARSE_ERROR] boottime_0.txt:1: empty boot-time report",
    );
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it("exits 1 for unknown error type", async () => {
    await executeCommand(
      async () => {
        throw "string error";
      },
      mockLogger,
      {},
    );

    expect(mockLogger.error).toHaveBeenCalledWith("string error");
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});

describe("parseIndex", () => {
  it("parses non-negative integers", () => {
    expect(parseIndex("0")).toBe(0);
    expect(parseIndex("42")).toBe(42);
  });

  it("rejects anything else", () => {
    expect(() => parseIndex("-1")).toThrow(InvalidArgumentError);
    expect(() => parseIndex("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseIndex("ten")).toThrow("Expected a non-negative integer.");
  });
});

describe("parseList", () => {
  it("splits on commas and drops empty entries", () => {
    expect(parseList("drive, pmem,,")).toEqual(["drive", "pmem"]);
  });
});

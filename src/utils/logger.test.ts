import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes to stderr with a level prefix", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});

    new Logger("info").info("Converting PDF: a.pdf");

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toContain("[INFO]");
    expect(stderr.mock.calls[0][0]).toContain("Converting PDF: a.pdf");
    expect(stdout).not.toHaveBeenCalled();
  });

  it("drops messages below the level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("warn");

    logger.debug("d");
    logger.info("i");
    logger.warn("w");

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toContain("[WARN]");
  });

  it("prints nothing when silent", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    new Logger("silent").error("failed", new Error("boom"));

    expect(stderr).not.toHaveBeenCalled();
  });

  it("dumps the error object only at debug level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const cause = new Error("boom");

    new Logger("info").error("failed", cause);
    expect(stderr).toHaveBeenCalledTimes(1);

    stderr.mockClear();
    new Logger("debug").error("failed", cause);
    expect(stderr).toHaveBeenCalledTimes(2);
    expect(stderr.mock.calls[1][0]).toBe(cause);
  });

  it("can change level after construction", () => {
    const logger = new Logger("error");
    expect(logger.isEnabled("info")).toBe(false);

    logger.setLevel("debug");
    expect(logger.isEnabled("debug")).toBe(true);
  });
});

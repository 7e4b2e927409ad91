import { describe, it, expect, vi, afterEach } from "vitest";
import { Writable } from "node:stream";
import ora, { type Ora } from "ora";
import { SpinnerLogger } from "./spinner-logger";

function spinnerOnSink(): Ora {
  const sink = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  return ora({ stream: sink, isEnabled: true, discardStdin: false });
}

describe("SpinnerLogger", () => {
  let spinner: Ora | undefined;

  afterEach(() => {
    spinner?.stop();
    vi.restoreAllMocks();
  });

  it("shows info messages as the spinner text", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    spinner = spinnerOnSink().start("Initializing...");

    new SpinnerLogger(spinner).info("Rendering 3 pages");

    expect(spinner.text).toBe("Rendering 3 pages");
    expect(stderr).not.toHaveBeenCalled();
    expect(stdout).not.toHaveBeenCalled();
  });

  it("prints warnings to stderr while spinning", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    spinner = spinnerOnSink().start("Initializing...");

    new SpinnerLogger(spinner).warn("Ignoring config");

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toContain("[WARN]");
    expect(stderr.mock.calls[0][0]).toContain("Ignoring config");
    expect(spinner.text).toBe("Initializing...");
    expect(stdout).not.toHaveBeenCalled();
  });

  it("prints info to stderr once the spinner has stopped", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    spinner = spinnerOnSink();

    new SpinnerLogger(spinner).info("Saved image");

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toContain("Saved image");
  });

  it("respects the level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    spinner = spinnerOnSink().start("Initializing...");

    new SpinnerLogger(spinner, "error").warn("hidden");

    expect(stderr).not.toHaveBeenCalled();
  });
});

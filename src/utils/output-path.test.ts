import { describe, it, expect } from "vitest";
import { defaultOutputPath, outputFilename, stemFromUrl } from "./output-path";
import type { OutputConfig } from "../types";

const output: OutputConfig = {
  suffix: "_stitched",
  extension: ".png",
  quality: 95,
  batchDirectory: "converted",
};

describe("outputFilename", () => {
  it("appends suffix and extension", () => {
    expect(outputFilename("report", output)).toBe("report_stitched.png");
    expect(
      outputFilename("report", { ...output, suffix: "-long", extension: ".webp" }),
    ).toBe("report-long.webp");
  });
});

describe("defaultOutputPath", () => {
  it("places the image beside the input", () => {
    expect(defaultOutputPath("/docs/report.pdf", output)).toBe(
      "/docs/report_stitched.png",
    );
  });

  it("keeps inner dots of the stem", () => {
    expect(defaultOutputPath("/docs/archive.v2.pdf", output)).toBe(
      "/docs/archive.v2_stitched.png",
    );
  });
});

describe("stemFromUrl", () => {
  it("uses the decoded file name without extension", () => {
    expect(
      stemFromUrl("https://example.com/files/Annual%20Report.pdf?v=2"),
    ).toBe("Annual Report");
  });

  it("falls back to download without a file name", () => {
    expect(stemFromUrl("https://example.com/")).toBe("download");
    expect(stemFromUrl("not a url")).toBe("download");
  });
});

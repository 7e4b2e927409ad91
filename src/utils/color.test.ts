import { describe, it, expect } from "vitest";
import { parseHexColor } from "./color";

describe("parseHexColor", () => {
  it("parses with and without the leading #", () => {
    expect(parseHexColor("#ff8000")).toEqual({ r: 255, g: 128, b: 0 });
    expect(parseHexColor("00FF7f")).toEqual({ r: 0, g: 255, b: 127 });
  });

  it("rejects short or invalid values", () => {
    expect(() => parseHexColor("#fff")).toThrow("Invalid hex color: #fff");
    expect(() => parseHexColor("#gggggg")).toThrow();
  });
});

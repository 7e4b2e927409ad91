import { describe, it, expect } from "vitest";
import { getSkillInfo, VERSION } from "./skill-info";

describe("getSkillInfo", () => {
  it("describes the tool", () => {
    const info = getSkillInfo();

    expect(info.name).toBe("PDF 转换为长图片");
    expect(info.version).toBe(VERSION);
    expect(info.author).toBe("pdf-longshot contributors");
    expect(info.features).toContain("批量转换");
    expect(info.features).toContain("URL 下载转换");
  });

  it("serializes without escaping non-ASCII text", () => {
    const json = JSON.stringify(getSkillInfo(), null, 2);

    expect(json).toContain('"category": "工具"');
    expect(json).not.toContain("\\u");
  });
});

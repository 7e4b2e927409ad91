/**
 * Static capability document printed by `--skill-info`
 */

import type { SkillInfo } from "../types";

export const VERSION = "1.0.0";
export const NAME = "PDF 转换为长图片";
export const DESCRIPTION = "将 PDF 文件转换并拼接为一张长图片，类似幻灯片效果";

export function getSkillInfo(): SkillInfo {
  return {
    name: NAME,
    version: VERSION,
    description: DESCRIPTION,
    author: "pdf-longshot contributors",
    icon: "📄",
    category: "工具",
    tags: ["PDF", "图片", "转换", "文档", "幻灯片"],
    language: "TypeScript",
    framework: "pdf-to-img, sharp",
    features: [
      "PDF 转换为图片",
      "图片纵向拼接",
      "自定义 DPI",
      "自定义图片间距",
      "自定义背景颜色",
      "批量转换",
      "URL 下载转换",
    ],
  };
}

#!/usr/bin/env tsx

/**
 * CLI entry point for the PDF to long image converter
 * Handles command-line argument parsing and user interaction
 */

import { Command, InvalidArgumentError } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { DESCRIPTION, VERSION } from "../modules/skill-info";

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

const program = new Command();

program
  .name("pdf-longshot")
  .description(DESCRIPTION)
  .version(VERSION);

// Main conversion command (default action)
program
  .argument("[pdf_file]", "PDF 文件路径")
  .option("-o, --output <path>", "输出图片路径 (默认: <input>_stitched.png)")
  .option("-d, --dpi <number>", "转换 DPI (默认: 150)", parseInteger)
  .option("-s, --spacing <number>", "图片间距, 像素 (默认: 10)", parseInteger)
  .option("-u, --url <url>", "PDF 文件 URL")
  .option("-b, --batch", "批量转换模式")
  .option("--pdf-dir <dir>", "PDF 文件目录 (批量转换模式)")
  .option("--output-dir <dir>", "输出图片目录 (批量转换模式, 默认: <pdf-dir>/converted)")
  .option("--background <color>", "背景颜色, 十六进制 (默认: #ffffff)")
  .option("-c, --config <path>", "自定义配置文件路径")
  .option("-v, --verbose", "输出调试日志")
  .option("--skill-info", "显示 Skill 信息")
  .addHelpText(
    "after",
    `
示例:
  $ pdf-longshot document.pdf
  $ pdf-longshot document.pdf -o output.png -d 200 -s 15
  $ pdf-longshot -u https://example.com/document.pdf
  $ pdf-longshot -b --pdf-dir ./pdfs --output-dir ./output`,
  )
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("显示用户配置文件位置")
  .action(configCommand);

await program.parseAsync();

/**
 * Result documents printed by the CLI
 * Field names follow the JSON output format (snake_case)
 */

import type { ErrorReason } from "../errors";

export interface ConversionSuccess {
  success: true;
  output_path: string;
  file_size_mb: number;
  file_size_str: string;
  pages: number;
  width: number;
  height: number;
}

export interface ConversionFailure {
  success: false;
  error: string;
  reason: ErrorReason;
}

export type ConversionResult = ConversionSuccess | ConversionFailure;

export interface BatchEntry {
  file: string;
  result: ConversionResult;
}

export interface BatchReport {
  success: true;
  total: number;
  success_count: number;
  fail_count: number;
  results: BatchEntry[];
}

export type BatchResult = BatchReport | ConversionFailure;

/**
 * Per-call overrides for a single conversion
 */
export interface ConvertOptions {
  output?: string;
  dpi?: number;
  spacing?: number;
}

export interface SkillInfo {
  name: string;
  version: string;
  description: string;
  author: string;
  icon: string;
  category: string;
  tags: string[];
  language: string;
  framework: string;
  features: string[];
}

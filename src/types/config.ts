/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

const HEX_COLOR = /^#?[0-9a-fA-F]{6}$/;

// Zod schemas
export const RenderConfigSchema = z.object({
  dpi: z.number().int().positive(),
});

export const StitchConfigSchema = z.object({
  spacing: z.number().int().nonnegative(), // Pixels between pages
  background: z.string().regex(HEX_COLOR, "Expected a hex color like #ffffff"),
  align: z.enum(["left", "center"]),
});

export const OutputConfigSchema = z.object({
  suffix: z.string(),
  extension: z.enum([".png", ".jpg", ".jpeg", ".webp"]),
  quality: z.number().int().min(1).max(100), // Ignored for PNG
  batchDirectory: z.string().min(1),
});

export const DownloadConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const ConversionConfigSchema = z.object({
  render: RenderConfigSchema,
  stitch: StitchConfigSchema,
  output: OutputConfigSchema,
  download: DownloadConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  render: RenderConfigSchema.partial().optional(),
  stitch: StitchConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  download: DownloadConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  OutputConfig,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Images
export type {
  Channels,
  PageImage,
  CompositeImage,
  RgbColor,
  StitchOptions,
  ImageFormat,
  WriteOptions,
} from "./image";

// Results
export type {
  ConversionFailure,
  ConversionResult,
  BatchEntry,
  BatchResult,
  ConvertOptions,
  SkillInfo,
} from "./result";

// Context
export type { ConversionContext, Rasterizer, ImageWriter } from "./context";

/**
 * Convert command - Loads config and dispatches to single, URL or batch conversion
 */

import ora from "ora";
import { z, ZodError } from "zod";
import type { Command } from "commander";
import { Converter } from "../../converter";
import { InvalidInputError, toFailure } from "../../errors";
import { getSkillInfo } from "../../modules";
import { loadConfig } from "../../utils";
import { SpinnerLogger } from "../spinner-logger";
import { StitchConfigSchema } from "../../types/config";
import type { BatchResult, ConversionResult } from "../../types";

const ConvertOptionsSchema = z.object({
  output: z.string().optional(),
  dpi: z.number().int().positive().optional(),
  spacing: z.number().int().nonnegative().optional(),
  url: z.string().optional(),
  batch: z.boolean().optional(),
  pdfDir: z.string().optional(),
  outputDir: z.string().optional(),
  background: StitchConfigSchema.shape.background.optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  skillInfo: z.boolean().optional(),
});

export type ConvertCommandOptions = z.infer<typeof ConvertOptionsSchema>;

/**
 * Print a result document: UTF-8, two-space indent, non-ASCII kept as-is
 */
function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
  }
  if (error instanceof SyntaxError) {
    return `invalid JSON (${error.message})`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * The conversions a run can dispatch to
 */
export type ConversionRunner = Pick<
  Converter,
  "convert" | "convertFromUrl" | "convertDirectory"
>;

/**
 * Run the conversion the flags ask for
 * Batch wins over a positional file, which wins over --url
 */
export async function dispatch(
  runner: ConversionRunner,
  pdfFile: string | undefined,
  options: ConvertCommandOptions,
): Promise<ConversionResult | BatchResult> {
  const overrides = { dpi: options.dpi, spacing: options.spacing };

  if (options.batch) {
    if (!options.pdfDir) {
      return toFailure(new InvalidInputError("批量转换模式需要 --pdf-dir 参数"));
    }
    return runner.convertDirectory(
      options.pdfDir,
      options.outputDir,
      overrides,
    );
  }

  if (pdfFile) {
    return runner.convert(pdfFile, { ...overrides, output: options.output });
  }

  if (options.url) {
    return runner.convertFromUrl(options.url, {
      ...overrides,
      output: options.output,
    });
  }

  return toFailure(new InvalidInputError("请指定 PDF 文件、--url 或 --batch"));
}

export async function convertCommand(
  pdfFile: string | undefined,
  opts: unknown,
  command: Command,
): Promise<void> {
  // Validate CLI options
  const parsed = ConvertOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    const message = `参数无效: ${describeError(parsed.error)}`;
    printJson(toFailure(new InvalidInputError(message)));
    process.exitCode = 1;
    return;
  }
  const options = parsed.data;

  if (options.skillInfo) {
    printJson(getSkillInfo());
    return;
  }

  if (!pdfFile && !options.url && !options.batch) {
    command.outputHelp();
    return;
  }

  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: !options.verbose,
  }).start();
  const logger = new SpinnerLogger(spinner, options.verbose ? "debug" : "info");

  try {
    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);
    for (const err of errors) {
      logger.warn(
        `Ignoring config ${err.path}: ${describeError(err.error)}`,
      );
    }

    // Override with CLI options
    if (options.background) {
      config.stitch.background = options.background;
    }
    if (!options.verbose) {
      logger.setLevel(config.logging.level);
    }

    const converter = new Converter(config, { logger });
    const result = await dispatch(converter, pdfFile, options);

    if (result.success) {
      spinner.succeed("Done");
    } else {
      spinner.fail("Conversion failed");
    }

    printJson(result);
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exit(1);
  }
}


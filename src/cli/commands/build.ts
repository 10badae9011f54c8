/**
 * Build command - Loads config and runs the calibration pipeline
 */

import ora, { type Ora } from "ora";
import { z } from "zod";
import { CalibrationBuilder, formatZodError, type BuildStage } from "../../builder";
import { stats } from "../../modules";
import {
  OutputFormatSchema,
  type CalibrationConfig,
  type PartialCalibrationConfig,
} from "../../types";
import { loadConfig, mergeConfig, Logger, MAX_SEED, type LogSink } from "../../utils";

const BuildOptionsSchema = z.object({
  sourceDir: z.string({ error: "--source-dir is required" }).min(1),
  outputDir: z.string().min(1).optional(),
  numImages: z.coerce.number().int().positive().optional(),
  width: z.coerce.number().int().positive().optional(),
  height: z.coerce.number().int().positive().optional(),
  seed: z.coerce.number().int().min(0).max(MAX_SEED).optional(),
  quality: z.coerce.number().int().min(1).max(100).optional(),
  format: OutputFormatSchema.optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof BuildOptionsSchema>;
type BuildOptions = z.infer<typeof BuildOptionsSchema>;

const STAGE_TEXT: Record<BuildStage, string> = {
  validate: "Validating options...",
  collect: "Collecting images...",
  sample: "Sampling images...",
  write: "Processing images...",
  manifest: "Generating image list...",
};

/**
 * Map CLI flags onto the config shape; only flags that were given override
 */
export function optionsToConfig(options: BuildOptions): PartialCalibrationConfig {
  const output: NonNullable<PartialCalibrationConfig["output"]> = {};
  const sampling: NonNullable<PartialCalibrationConfig["sampling"]> = {};
  const image: NonNullable<PartialCalibrationConfig["image"]> = {};

  if (options.outputDir !== undefined) output.directory = options.outputDir;
  if (options.format !== undefined) output.format = options.format;
  if (options.numImages !== undefined) sampling.count = options.numImages;
  if (options.seed !== undefined) sampling.seed = options.seed;
  if (options.width !== undefined) image.width = options.width;
  if (options.height !== undefined) image.height = options.height;
  if (options.quality !== undefined) image.quality = options.quality;

  const override: PartialCalibrationConfig = { output, sampling, image };
  if (options.concurrency !== undefined) {
    override.concurrency = options.concurrency;
  }
  return override;
}

/**
 * Log lines are printed above the spinner instead of through it
 */
function spinnerSink(spinner: Ora): LogSink {
  const around = (print: (line: string) => void) => (line: string) => {
    spinner.clear();
    print(line);
    spinner.render();
  };
  return {
    log: around((line) => console.log(line)),
    warn: around((line) => console.warn(line)),
    error: around((line) => console.error(line)),
  };
}

export async function buildCommand(opts: Options): Promise<void> {
  // Validate CLI options
  const parsed = BuildOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    console.error(`[ERROR] Validation error: ${formatZodError(parsed.error)}`);
    process.exitCode = 1;
    return;
  }
  const options = parsed.data;

  // Load configuration (default → user → custom), then apply CLI flags
  let config: CalibrationConfig;
  try {
    const loaded = await loadConfig(options.config);
    if (loaded.errors.length > 0) {
      for (const { path, error } of loaded.errors) {
        const details =
          error instanceof z.ZodError
            ? formatZodError(error)
            : error instanceof Error
              ? error.message
              : String(error);
        console.error(`[ERROR] Validation error: invalid config ${path}: ${details}`);
      }
      process.exitCode = 1;
      return;
    }
    config = mergeConfig(loaded.config, optionsToConfig(options));
  } catch (error) {
    console.error("[ERROR] Failed to load default configuration");
    console.error(error);
    process.exitCode = 1;
    return;
  }

  const spinner = ora({ text: STAGE_TEXT.validate, indent: 2 }).start();
  const logger = new Logger(
    options.verbose ? "debug" : config.logging.level,
    spinnerSink(spinner),
  );

  // Ctrl+C stops new submissions; in-flight images finish
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("Interrupt received, finishing in-flight images...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const builder = new CalibrationBuilder({
      config,
      sourceDir: options.sourceDir,
      logger,
      signal: controller.signal,
      onStage: (stage) => {
        spinner.text = STAGE_TEXT[stage];
      },
    });

    const result = await builder.run();

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    stats(result.tracker, {
      verbose: options.verbose,
      manifestPath: result.manifest?.path,
      failure: result.failure?.message,
    });

    process.exitCode = result.exitCode;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

/**
 * Builder - Pipeline orchestrator
 * Runs the stages in order and maps the outcome to an exit status
 */

import { ZodError } from "zod";
import * as modules from "./modules";
import {
  CalibrationConfigSchema,
  CalibrationError,
  EmptyOutputError,
  InterruptedError,
  ValidationError,
  type BuildContext,
  type CalibrationConfig,
  type ManifestResult,
} from "./types";
import { Tracker, type Logger } from "./utils";

export type BuildStage = "validate" | "collect" | "sample" | "write" | "manifest";

export interface BuilderOptions {
  config: CalibrationConfig;
  sourceDir: string;
  logger: Logger;
  signal?: AbortSignal;
  // Called as each stage starts (spinner text, progress reporting)
  onStage?: (stage: BuildStage) => void;
}

export interface BuildResult {
  exitCode: 0 | 1;
  tracker: Tracker;
  manifest?: ManifestResult;
  // Present when the run failed: the stage it stopped in and why
  failure?: { stage: BuildStage; error: unknown; message: string };
}

/**
 * Format a Zod validation error as one line
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

export class CalibrationBuilder {
  private stage: BuildStage = "validate";

  constructor(private options: BuilderOptions) {}

  /**
   * Run the pipeline
   * Never throws: fatal errors are logged and returned with exit code 1
   */
  async run(): Promise<BuildResult> {
    const { logger, signal, sourceDir } = this.options;
    const tracker = new Tracker();
    this.enter("validate");

    try {
      // Nothing touches the filesystem until the configuration is valid
      const config = this.validate();

      const ctx: BuildContext = {
        config,
        sourceDir,
        logger,
        tracker,
        signal,
      };

      this.enter("collect");
      await modules.collect(ctx);

      this.enter("sample");
      await modules.sample(ctx);

      this.enter("write");
      await modules.write(ctx);

      const summary = ctx.writeSummary;
      if (!summary) {
        throw new Error("Writer failed to populate its summary");
      }
      if (signal?.aborted) {
        throw new InterruptedError(
          summary.outcomes.length - summary.skipped,
          summary.outcomes.length,
        );
      }
      if (summary.written === 0) {
        throw new EmptyOutputError(summary.outcomes.length);
      }

      this.enter("manifest");
      await modules.manifest(ctx);

      logger.info("Calibration dataset generation completed successfully!");
      return { exitCode: 0, tracker, manifest: ctx.manifest };
    } catch (error) {
      const message = this.describeFailure(error);
      if (error instanceof CalibrationError) {
        logger.error(message);
      } else {
        logger.error(message, error);
      }
      return {
        exitCode: 1,
        tracker,
        failure: { stage: this.stage, error, message },
      };
    }
  }

  private enter(stage: BuildStage): void {
    this.stage = stage;
    this.options.onStage?.(stage);
  }

  private validate(): CalibrationConfig {
    if (this.options.sourceDir.trim() === "") {
      throw new ValidationError("Source directory is required");
    }

    const parsed = CalibrationConfigSchema.safeParse(this.options.config);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid configuration: ${formatZodError(parsed.error)}`,
      );
    }
    return parsed.data;
  }

  private describeFailure(error: unknown): string {
    if (error instanceof ValidationError) {
      return `Validation error: ${error.message}`;
    }
    if (error instanceof CalibrationError) {
      return `${this.stage} failed: ${error.message}`;
    }
    const details = error instanceof Error ? error.message : String(error);
    return `Unexpected error during ${this.stage}: ${details}`;
  }
}

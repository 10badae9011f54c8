/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  // Matched case-insensitively against the end of each filename
  extensions: z.array(z.string().min(1)).min(1),
});

export const OutputFormatSchema = z.enum(["jpeg", "png", "webp"]);

export const OutputConfigSchema = z.object({
  directory: z.string().min(1),
  format: OutputFormatSchema,
  manifest: z.string().min(1),
});

export const SamplingConfigSchema = z.object({
  count: z.number().int().positive(),
  seed: z.number().int().min(0).max(0xffffffff),
});

export const ImageConfigSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  quality: z.number().int().min(1).max(100),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const CalibrationConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  sampling: SamplingConfigSchema,
  image: ImageConfigSchema,
  concurrency: z.number().int().positive(),
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialCalibrationConfigSchema = CalibrationConfigSchema.partial()
  .extend({
    input: InputConfigSchema.partial().optional(),
    output: OutputConfigSchema.partial().optional(),
    sampling: SamplingConfigSchema.partial().optional(),
    image: ImageConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type SamplingConfig = z.infer<typeof SamplingConfigSchema>;
export type ImageConfig = z.infer<typeof ImageConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type CalibrationConfig = z.infer<typeof CalibrationConfigSchema>;
export type PartialCalibrationConfig = z.infer<
  typeof PartialCalibrationConfigSchema
>;

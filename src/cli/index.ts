#!/usr/bin/env tsx

/**
 * CLI entry point for the calibration set builder
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("calib-build")
  .description(
    "Build a fixed-size, fixed-resolution calibration image set for INT8 quantization",
  )
  .version("0.1.0");

// Main build command (default action)
program
  .option("-s, --source-dir <path>", "Source directory containing input images")
  .option("-o, --output-dir <path>", "Output directory for calibration images")
  .option("-n, --num-images <count>", "Number of images to sample")
  .option("--width <px>", "Target image width")
  .option("--height <px>", "Target image height")
  .option("--seed <int>", "Random seed for reproducible sampling")
  .option("-q, --quality <1-100>", "Encoding quality")
  .option("-f, --format <format>", "Output format (jpeg, png, webp)")
  .option("-j, --concurrency <n>", "Images processed in parallel")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(buildCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();

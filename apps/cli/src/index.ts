import { Command } from "commander";
import {
  createScanCommand,
  createListCommand,
  createValidateCommand,
} from "./commands/index.js";

export function createCli(): Command {
  const program = new Command();

  program
    .name("assetlens")
    .description("Index and validate 3D production assets")
    .version("0.1.0");

  // Add commands
  program.addCommand(createScanCommand());
  program.addCommand(createListCommand());
  program.addCommand(createValidateCommand());

  return program;
}

// Re-export config utilities for user config files
export { defineConfig } from "./config/schema.js";
export type { AssetLensConfig, AssetLensConfigInput } from "./config/schema.js";

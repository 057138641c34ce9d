import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { pathToFileURL } from "url";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { AssetLensConfigSchema, type AssetLensConfig } from "./schema.js";

const CONFIG_FILES = [
  "assetlens.config.mjs",
  "assetlens.config.js",
  ".assetlensrc.json",
  ".assetlensrc",
];

export interface LoadConfigResult {
  config: AssetLensConfig;
  configPath: string | null;
}

export function getConfigPath(cwd: string = process.cwd()): string | null {
  for (const filename of CONFIG_FILES) {
    const fullPath = resolve(cwd, filename);
    if (existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

async function readRawConfig(configPath: string): Promise<unknown> {
  if (configPath.endsWith(".json") || configPath.endsWith(".assetlensrc")) {
    return JSON.parse(readFileSync(configPath, "utf-8"));
  }

  const mod: unknown = await import(pathToFileURL(configPath).href);
  if (mod && typeof mod === "object" && "default" in mod) {
    return mod.default;
  }
  return mod;
}

export async function loadConfig(cwd: string = process.cwd()): Promise<LoadConfigResult> {
  const configPath = getConfigPath(cwd);

  if (!configPath) {
    // Return default config if no file found
    return {
      config: AssetLensConfigSchema.parse({}),
      configPath: null,
    };
  }

  try {
    const raw = await readRawConfig(configPath);
    return {
      config: AssetLensConfigSchema.parse(raw),
      configPath,
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const validationError = fromZodError(error, {
        prefix: "Configuration error",
        prefixSeparator: ": ",
      });
      throw new Error(`Invalid config in ${configPath}:\n\n${validationError.message}`);
    }

    if (error instanceof SyntaxError) {
      throw new Error(
        `Invalid JSON in ${configPath}: ${error.message}\n\nCheck for missing commas, trailing commas, or unquoted keys.`,
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config from ${configPath}: ${message}`);
  }
}

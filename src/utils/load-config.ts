import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConversionConfig,
  ConfigError,
  PartialConversionConfig,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("faims-split", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConversionConfigSchema.parse(parsed);
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConversionConfigSchema.parse(parsed);
}

export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    converter: { ...base.converter, ...override.converter },
    scans: { ...base.scans, ...override.scans },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
  // Config files that were found and applied, in order
  sources: string[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A file that fails to load is reported in errors and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];
  const sources: string[] = [];

  const layers = [
    { path: getUserConfigPath(), optional: true },
    ...(custom ? [{ path: custom, optional: false }] : []),
  ];

  for (const layer of layers) {
    // The user config is optional; a missing custom config is an error
    if (layer.optional && !existsSync(layer.path)) continue;

    try {
      config = mergeConfig(config, await loadPartialConfig(layer.path));
      sources.push(layer.path);
    } catch (error) {
      errors.push({ path: layer.path, error });
    }
  }

  return { config, errors, sources };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

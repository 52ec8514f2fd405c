/**
 * Exporter configuration.
 *
 * Settings come from three layers, later ones winning: DEFAULT_CONFIG, an
 * optional zettel-export.toml file, and command-line flags.
 */

import * as fs from "node:fs";
import * as toml from "toml";
import { DEFAULT_CONFIG, type ExportConfig } from "./models.js";

/** Config file looked up in the working directory */
export const CONFIG_FILE = "zettel-export.toml";

/**
 * Raised for a config file that is missing (when named explicitly), does
 * not parse, or holds a value of the wrong type.
 */
export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    reason: string,
  ) {
    super(`Invalid config ${configPath}: ${reason}`);
    this.name = "ConfigError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check parsed TOML against ExportConfig. Unknown keys are ignored.
 */
export function validateConfig(
  data: unknown,
  configPath: string,
): ExportConfig {
  if (!isRecord(data)) {
    throw new ConfigError(configPath, "expected a table");
  }

  const config: ExportConfig = {};
  for (const key of ["input_dir", "output_dir"] as const) {
    const value = data[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || value === "") {
      throw new ConfigError(configPath, `${key} must be a non-empty string`);
    }
    config[key] = value;
  }

  if (data.sort !== undefined) {
    if (typeof data.sort !== "boolean") {
      throw new ConfigError(configPath, "sort must be a boolean");
    }
    config.sort = data.sort;
  }

  return config;
}

/**
 * Read a config file. Without an explicit path, a missing
 * zettel-export.toml yields an empty config.
 */
export function loadConfig(configPath?: string): ExportConfig {
  const filePath = configPath ?? CONFIG_FILE;
  if (!fs.existsSync(filePath)) {
    if (configPath) {
      throw new ConfigError(filePath, "file not found");
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = toml.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(filePath, message);
  }
  return validateConfig(parsed, filePath);
}

/**
 * Merge config layers over the defaults. Undefined values do not override.
 */
export function resolveConfig(
  ...layers: ExportConfig[]
): Required<ExportConfig> {
  const resolved: Required<ExportConfig> = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    if (layer.input_dir !== undefined) resolved.input_dir = layer.input_dir;
    if (layer.output_dir !== undefined) resolved.output_dir = layer.output_dir;
    if (layer.sort !== undefined) resolved.sort = layer.sort;
  }
  return resolved;
}

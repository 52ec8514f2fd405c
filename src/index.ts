/**
 * zettel-export - library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

export * from "./lib/models.js";

export { EPOCH, formatZid, nextZidDate } from "./lib/zid.js";

export {
  resetOutputDir,
  listInputFiles,
  zettelNames,
  titleFromStem,
  buildMeta,
  serializeMeta,
  writeZettel,
} from "./lib/storage.js";
export type { LogFn } from "./lib/storage.js";

export {
  CONFIG_FILE,
  ConfigError,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./lib/config.js";

export { exportZettel } from "./commands/export.js";
export type { ExportOptions } from "./commands/export.js";

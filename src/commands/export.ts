/**
 * zettel-export export - Convert a directory of files into zettel.
 *
 * The output directory is wiped and rebuilt on every run. Each regular file
 * of the input directory becomes a content file plus a metadata sidecar,
 * named after a zid that starts at 1980-01-01 00:00:00 and advances one
 * minute per file.
 */

import { Command } from "commander";
import {
  ExitCodes,
  type ExportConfig,
  type ExportResult,
  type ZettelEntry,
} from "../lib/models.js";
import { ConfigError, loadConfig, resolveConfig } from "../lib/config.js";
import {
  listInputFiles,
  resetOutputDir,
  writeZettel,
  type LogFn,
} from "../lib/storage.js";
import { EPOCH, formatZid, nextZidDate } from "../lib/zid.js";

export interface ExportOptions {
  inputDir: string;
  outputDir: string;
  sort?: boolean;
  /** Diagnostics, e.g. a failed removal of the previous output */
  log?: LogFn;
  /** Called after each zettel pair is written */
  onEntry?: (entry: ZettelEntry) => void;
}

/**
 * Run one export. Any I/O error other than a failed cleanup propagates;
 * files written before it stay on disk.
 */
export function exportZettel(options: ExportOptions): ExportResult {
  const reset = resetOutputDir(options.outputDir, options.log);
  const sources = listInputFiles(options.inputDir, { sort: options.sort });

  const entries: ZettelEntry[] = [];
  let zidDate = EPOCH;
  for (const source of sources) {
    const entry = writeZettel(source, options.outputDir, formatZid(zidDate));
    entries.push(entry);
    options.onEntry?.(entry);
    zidDate = nextZidDate(zidDate);
  }

  return {
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    reset,
    entries,
  };
}

export const exportCommand = new Command("export")
  .description("Export files as zettel with metadata sidecars")
  .option("-i, --input <dir>", "input directory (default: files.md)")
  .option("-o, --output <dir>", "output directory (default: zettel)")
  .option("--sort", "process input files in lexicographic order")
  .option("-c, --config <path>", "config file (default: zettel-export.toml)")
  .action((options, command) => {
    const globalOpts = command.parent?.opts() || {};

    let config: Required<ExportConfig>;
    try {
      const fileConfig = loadConfig(options.config as string | undefined);
      config = resolveConfig(fileConfig, {
        input_dir: options.input as string | undefined,
        output_dir: options.output as string | undefined,
        sort: options.sort ? true : undefined,
      });
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(`Error: ${err.message}`);
        process.exit(ExitCodes.DATA_ERROR);
      }
      throw err;
    }

    const log: LogFn | undefined = globalOpts.quiet
      ? undefined
      : (message) => console.log(message);

    const result = exportZettel({
      inputDir: config.input_dir,
      outputDir: config.output_dir,
      sort: config.sort,
      log,
      onEntry: globalOpts.verbose
        ? (entry) => console.log(`${entry.zid} ${entry.source}`)
        : undefined,
    });

    if (globalOpts.json) {
      console.log(
        JSON.stringify({
          status: "exported",
          input: result.inputDir,
          output: result.outputDir,
          reset: result.reset.status,
          zettel: result.entries.map((entry) => ({
            zid: entry.zid,
            source: entry.source,
            content: entry.contentPath,
            meta: entry.metaPath,
            title: entry.meta.title,
          })),
        }),
      );
    }
  });

/**
 * Core data models for the zettel exporter.
 *
 * A zettel is an atomic note made of two files: the content file (a verbatim
 * copy of the input) and a metadata sidecar with the same zid and stem but no
 * extension.
 */

/**
 * 14-digit timestamp-shaped identifier, `YYYYMMDDHHMMSS`.
 */
export type Zid = string;

/**
 * Fields of a metadata sidecar, in the order they are written.
 */
export interface ZettelMeta {
  /** Stem with its first character upper-cased */
  title: string;
  /** Always "zettel" */
  role: string;
  /** Always "markdown" */
  syntax: string;
  /** Same value as the zid */
  created: Zid;
}

/**
 * Names derived from an input file name.
 */
export interface ZettelNames {
  /** Input stem with every "." replaced by "_" */
  stem: string;
  /** Original extension including the dot, or "" */
  extension: string;
}

/**
 * One exported zettel pair.
 */
export interface ZettelEntry {
  /** Path of the input file */
  source: string;
  zid: Zid;
  /** Path of the copied content file */
  contentPath: string;
  /** Path of the metadata sidecar */
  metaPath: string;
  meta: ZettelMeta;
}

/**
 * Outcome of the best-effort removal of a previous output directory:
 * - removed: the directory existed and is gone
 * - missing: there was nothing to remove
 * - failed: removal failed; the run continues
 */
export type ResetResult =
  | { status: "removed"; path: string }
  | { status: "missing"; path: string }
  | { status: "failed"; path: string; error: Error };

/**
 * Result of a full export run.
 */
export interface ExportResult {
  inputDir: string;
  outputDir: string;
  reset: ResetResult;
  entries: ZettelEntry[];
}

/**
 * Exporter settings, from zettel-export.toml and command-line flags.
 */
export interface ExportConfig {
  /** Directory whose immediate files are exported */
  input_dir?: string;
  /** Directory that is wiped and rebuilt on every run */
  output_dir?: string;
  /** Process inputs in lexicographic order instead of directory order */
  sort?: boolean;
}

/**
 * Default exporter settings.
 */
export const DEFAULT_CONFIG: Required<ExportConfig> = {
  input_dir: "files.md",
  output_dir: "zettel",
  sort: false,
};

/** Fixed sidecar values */
export const ZETTEL_ROLE = "zettel";
export const ZETTEL_SYNTAX = "markdown";

/**
 * Exit codes of the CLI.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

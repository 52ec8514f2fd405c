/**
 * File operations of the exporter.
 *
 * Everything here is synchronous: each call completes before the next file
 * is touched, and file handles never outlive the call that opened them.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  ZETTEL_ROLE,
  ZETTEL_SYNTAX,
  type ResetResult,
  type Zid,
  type ZettelEntry,
  type ZettelMeta,
  type ZettelNames,
} from "./models.js";

/** Receives diagnostic and progress lines */
export type LogFn = (message: string) => void;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Remove a previous output directory and create it again, empty.
 *
 * A directory that does not exist is not an error. Any other removal
 * failure is logged and reported in the result; creating the directory
 * afterwards may still throw.
 */
export function resetOutputDir(dir: string, log?: LogFn): ResetResult {
  let reset: ResetResult;
  try {
    fs.rmSync(dir, { recursive: true });
    reset = { status: "removed", path: dir };
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      reset = { status: "missing", path: dir };
    } else {
      const error = toError(err);
      log?.(error.message);
      reset = { status: "failed", path: dir, error };
    }
  }

  fs.mkdirSync(dir);
  return reset;
}

/**
 * True when `filePath` resolves to a regular file. Any stat error (broken or
 * looping symlink, permission) counts as "not a file".
 */
function isRegularFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * List the regular files directly inside `dir`.
 *
 * Symlinks count when they resolve to a regular file. Entries come back in
 * directory order unless `sort` is set.
 */
export function listInputFiles(
  dir: string,
  options: { sort?: boolean } = {},
): string[] {
  const names = fs.readdirSync(dir);
  if (options.sort) {
    names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  return names
    .map((name) => path.join(dir, name))
    .filter(isRegularFile);
}

/**
 * Derive the zettel stem and extension from an input file name.
 *
 * `a.b.md` becomes stem `a_b` with extension `.md`. A trailing dot belongs
 * to the stem: `file.` becomes `file_` with no extension.
 */
export function zettelNames(fileName: string): ZettelNames {
  const ext = path.extname(fileName);
  const extension = ext === "." ? "" : ext;
  const stem = fileName.slice(0, fileName.length - extension.length);
  return { stem: stem.replaceAll(".", "_"), extension };
}

export function titleFromStem(stem: string): string {
  return stem.charAt(0).toUpperCase() + stem.slice(1);
}

export function buildMeta(stem: string, zid: Zid): ZettelMeta {
  return {
    title: titleFromStem(stem),
    role: ZETTEL_ROLE,
    syntax: ZETTEL_SYNTAX,
    created: zid,
  };
}

/**
 * Serialize a sidecar: one `key: value` line per field, fixed order, no
 * escaping.
 */
export function serializeMeta(meta: ZettelMeta): string {
  return (
    [
      `title: ${meta.title}`,
      `role: ${meta.role}`,
      `syntax: ${meta.syntax}`,
      `created: ${meta.created}`,
    ].join("\n") + "\n"
  );
}

/**
 * Copy `source` into `outputDir` as `<zid> <stem><ext>` and write its
 * metadata sidecar as `<zid> <stem>`. Existing files are overwritten.
 */
export function writeZettel(
  source: string,
  outputDir: string,
  zid: Zid,
): ZettelEntry {
  const { stem, extension } = zettelNames(path.basename(source));
  const contentPath = path.join(outputDir, `${zid} ${stem}${extension}`);
  const metaPath = path.join(outputDir, `${zid} ${stem}`);
  const meta = buildMeta(stem, zid);

  fs.copyFileSync(source, contentPath);
  fs.writeFileSync(metaPath, serializeMeta(meta));

  return { source, zid, contentPath, metaPath, meta };
}

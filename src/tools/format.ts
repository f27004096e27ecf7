/**
 * File-level formatting: read, format, compare and write .tex files.
 *
 * Used by the CLI for file arguments and by the MCP server's file tools.
 */
import fs from "node:fs";
import path from "node:path";
import { formatLatex, type FormatOptions } from "../format/formatLatex.js";
import { FormatIoError, systemErrorCode, errorMessage } from "../utils/errors.js";
import { asyncPool, unwrapSettled } from "../utils/asyncPool.js";

// Files formatted concurrently by checkFiles / formatFilesInPlace
const POOL_SIZE = 4;

export interface FormatFileOptions {
  file: string;
  // Write the result here instead of returning it only
  output?: string;
  // Rewrite `file` itself when the result differs
  inPlace?: boolean;
}

export interface FormatFileResult {
  file: string;
  changed: boolean;
  // Path written to, when anything was written
  written?: string;
  formatted: string;
}

export interface CheckResult {
  file: string;
  changed: boolean;
  // Set when the file could not be checked; `changed` is then false
  error?: string;
}

function describeFsError(action: string, file: string, err: unknown): string {
  const code = systemErrorCode(err);
  return code ? `Cannot ${action} ${file} (${code})` : `Cannot ${action} ${file}: ${errorMessage(err)}`;
}

export async function readSource(file: string): Promise<string> {
  try {
    return await fs.promises.readFile(file, "utf8");
  } catch (err) {
    throw new FormatIoError("read-failed", file, describeFsError("read", file, err), { cause: err });
  }
}

// Reads a whole byte or text stream, such as stdin, as UTF-8
export async function readStream(stream: AsyncIterable<string | Buffer>, name = "<stdin>"): Promise<string> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    }
  } catch (err) {
    throw new FormatIoError("read-failed", name, describeFsError("read", name, err), { cause: err });
  }
  return Buffer.concat(chunks).toString("utf8");
}

export async function writeTarget(file: string, text: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(path.resolve(file)), { recursive: true });
    await fs.promises.writeFile(file, text, "utf8");
  } catch (err) {
    throw new FormatIoError("write-failed", file, describeFsError("write", file, err), { cause: err });
  }
}

export async function formatFile(opts: FormatFileOptions, options: FormatOptions = {}): Promise<FormatFileResult> {
  const source = await readSource(opts.file);
  const formatted = formatLatex(source, options);
  const changed = formatted !== source;
  const target = opts.output ?? (opts.inPlace ? opts.file : undefined);
  // An unchanged file is not rewritten in place
  if (target && (changed || target !== opts.file)) {
    await writeTarget(target, formatted);
    options.logger?.debug(`wrote ${target}`);
    return { file: opts.file, changed, written: target, formatted };
  }
  return { file: opts.file, changed, formatted };
}

export async function checkFiles(files: readonly string[], options: FormatOptions = {}): Promise<CheckResult[]> {
  const settled = await asyncPool(POOL_SIZE, files, (file) => formatFile({ file }, options));
  return settled.map((r, i): CheckResult =>
    r.ok ? { file: files[i], changed: r.value.changed } : { file: files[i], changed: false, error: errorMessage(r.error) },
  );
}

// Every file is attempted; the first failure in input order is rethrown afterwards
export async function formatFilesInPlace(files: readonly string[], options: FormatOptions = {}): Promise<FormatFileResult[]> {
  return unwrapSettled(await asyncPool(POOL_SIZE, files, (file) => formatFile({ file, inPlace: true }, options)));
}

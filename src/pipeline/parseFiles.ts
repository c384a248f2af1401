import path from "node:path";
import { parsePythonImports } from "../parsers/pythonImports.js";
import type { FileIndexEntry, FileParseReport, Logger } from "../types.js";
import { readTextFile, readTextFileLimited } from "../utils/fs.js";
import { relPosix } from "../utils/path.js";
import { nowIso } from "../utils/time.js";

export interface ParseFileOptions {
  strict: boolean;
  /** Read at most this many bytes; the whole file when omitted. */
  maxReadBytes?: number;
  displayPath?: string;
}

export async function parseSourceFile(filePath: string, options: ParseFileOptions): Promise<FileParseReport> {
  let source: string;
  let truncatedAt: number | undefined;
  if (options.maxReadBytes === undefined) {
    source = await readTextFile(filePath);
  } else {
    const read = await readTextFileLimited(filePath, options.maxReadBytes);
    source = read.truncated ? dropPartialLine(read.text) : read.text;
    truncatedAt = read.truncated ? options.maxReadBytes : undefined;
  }

  const { statements, errors } = parsePythonImports(source, { strict: options.strict });
  return {
    filePath: options.displayPath || filePath,
    statements,
    errors,
    ...(truncatedAt === undefined ? {} : { truncatedAt }),
  };
}

// Keeps the text up to and including its last line break.
export function dropPartialLine(text: string): string {
  const lastBreak = Math.max(text.lastIndexOf("\n"), text.lastIndexOf("\r"));
  return text.slice(0, lastBreak + 1);
}

/**
 * Parses every indexed file in order. In lenient mode a file that cannot be
 * read is reported as a warning and skipped; parse problems inside a file end
 * up in that file's `errors`.
 */
export async function parseIndexedFiles(
  index: FileIndexEntry[],
  options: ParseFileOptions & { logger: Logger },
): Promise<{ reports: FileParseReport[]; warnings: string[] }> {
  const reports: FileParseReport[] = [];
  const warnings: string[] = [];

  for (const entry of index) {
    try {
      const report = await parseSourceFile(entry.absPath, {
        strict: options.strict,
        maxReadBytes: options.maxReadBytes,
        displayPath: entry.relPath,
      });
      reports.push(report);
      if (report.truncatedAt !== undefined) {
        const warning = `${entry.relPath}: truncated at ${report.truncatedAt} bytes`;
        warnings.push(warning);
        await options.logger.log({ ts: nowIso(), stage: "parse", event: "warn", warnings: [warning] });
      }
    } catch (error) {
      if (options.strict) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`${entry.relPath}: ${message}`);
      await options.logger.log({ ts: nowIso(), stage: "parse", event: "warn", warnings: [`${entry.relPath}: ${message}`] });
    }
  }

  return { reports, warnings };
}

export function displayPathFor(filePath: string, cwd: string): string {
  const relative = relPosix(cwd, path.resolve(cwd, filePath));
  return relative && !relative.startsWith("..") ? relative : filePath;
}

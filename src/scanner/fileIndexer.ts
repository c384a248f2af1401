import fs from "node:fs/promises";
import path from "node:path";
import type { FileIndexEntry } from "../types.js";
import { DEFAULT_EXCLUDED_DIRS } from "../utils/config.js";
import { relPosix } from "../utils/path.js";

export interface BuildFileIndexOptions {
  rootDir: string;
  maxDepth: number;
  maxFiles: number;
  excludeDirs?: string[];
  extensions?: string[];
}

const DEFAULT_EXTENSIONS = [".py", ".pyi"];

export async function buildFileIndex(options: BuildFileIndexOptions): Promise<FileIndexEntry[]> {
  const entries: FileIndexEntry[] = [];
  const excluded = new Set(options.excludeDirs || DEFAULT_EXCLUDED_DIRS);
  const extensions = new Set((options.extensions || DEFAULT_EXTENSIONS).map((ext) => ext.toLowerCase()));

  async function walk(dir: string, depth: number): Promise<void> {
    if (entries.length >= options.maxFiles) {
      return;
    }
    if (depth > options.maxDepth) {
      return;
    }

    const children = await fs.readdir(dir, { withFileTypes: true });
    children.sort((a, b) => a.name.localeCompare(b.name));

    for (const child of children) {
      if (entries.length >= options.maxFiles) {
        break;
      }

      if (child.isDirectory()) {
        if (child.name.startsWith(".") || excluded.has(child.name)) {
          continue;
        }
        await walk(path.join(dir, child.name), depth + 1);
        continue;
      }

      if (!extensions.has(path.extname(child.name).toLowerCase())) {
        continue;
      }

      const absPath = path.join(dir, child.name);
      const stat = await fs.stat(absPath);
      if (!stat.isFile()) {
        continue;
      }

      entries.push({
        absPath,
        relPath: relPosix(options.rootDir, absPath),
        sizeBytes: stat.size,
        depth,
      });
    }
  }

  await walk(options.rootDir, 0);
  entries.sort((a, b) => a.relPath.localeCompare(b.relPath));
  return entries;
}

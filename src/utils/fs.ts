import fs from "node:fs/promises";

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/** Reads a UTF-8 file, dropping a leading byte-order mark. */
export async function readTextFile(filePath: string): Promise<string> {
  const text = await fs.readFile(filePath, "utf8");
  return text.startsWith("\uFEFF") ? text.slice(1) : text;
}

export async function readTextFileLimited(
  filePath: string,
  maxBytes: number,
): Promise<{ text: string; truncated: boolean }> {
  const handle = await fs.open(filePath, "r");
  try {
    const stat = await handle.stat();
    const toRead = Math.min(stat.size, maxBytes);
    const buffer = Buffer.alloc(toRead);
    const { bytesRead } = await handle.read(buffer, 0, toRead, 0);
    const text = buffer.subarray(0, bytesRead).toString("utf8");
    return {
      text: text.startsWith("\uFEFF") ? text.slice(1) : text,
      truncated: stat.size > maxBytes,
    };
  } finally {
    await handle.close();
  }
}

import type { FileArtifacts, LineSeparator } from "../types.js";
import { readTextFile } from "../utils/fs.js";
import type { NumberedLine } from "./lineGrouper.js";

const LINE_BREAK = /\r\n|\r|\n/;

/** Yields `[lineNumber, text]` pairs, numbered from 1, with terminators removed. */
export function* enumerateLines(source: string): Generator<NumberedLine, void, undefined> {
  if (!source) {
    return;
  }

  const lines = source.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  for (let i = 0; i < lines.length; i += 1) {
    yield [i + 1, lines[i]];
  }
}

export function detectLineSeparator(source: string): LineSeparator {
  const firstBreak = source.search(LINE_BREAK);
  if (firstBreak < 0) {
    return "\n";
  }

  const afterFirst = source.startsWith("\r\n", firstBreak) ? firstBreak + 2 : firstBreak + 1;
  const hasSecondLine = afterFirst < source.length;
  return hasSecondLine && source.startsWith("\r\n", firstBreak) ? "\r\n" : "\n";
}

export async function getFileArtifacts(filePath: string): Promise<FileArtifacts> {
  const source = await readTextFile(filePath);
  return { sep: detectLineSeparator(source) };
}

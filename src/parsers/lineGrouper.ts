import type { LineGroup } from "../types.js";

export type NumberedLine = readonly [lineNumber: number, text: string];

/**
 * Recognises block comments that span several lines. Only consulted at the
 * start of a candidate statement, never inside a continuation.
 */
export interface BlockCommentFilter {
  opens(line: string): boolean;
  closes(line: string): boolean;
}

export const tripleQuoteFilter: BlockCommentFilter = {
  opens(line) {
    const first = line.indexOf('"""');
    return first >= 0 && line.indexOf('"""', first + 3) < 0;
  },
  closes(line) {
    return line.endsWith('"""');
  },
};

type Cursor = () => NumberedLine | undefined;

export function* groupImportLines(
  lines: Iterable<NumberedLine>,
  filter: BlockCommentFilter = tripleQuoteFilter,
): Generator<LineGroup, void, undefined> {
  const iterator = lines[Symbol.iterator]();
  const next: Cursor = () => {
    const result = iterator.next();
    return result.done ? undefined : result.value;
  };

  for (let current = next(); current; current = next()) {
    if (filter.opens(current[1])) {
      current = skipBlockComment(next, filter);
      if (!current) {
        return;
      }
    }

    const [lineNumber, line] = current;
    if (!isImportStart(line)) {
      continue;
    }

    const group: LineGroup = { lines: [line], lineNumbers: [lineNumber] };
    let last = line;

    if (last.includes("(") && !last.includes(")")) {
      while (!last.includes(")")) {
        const following = next();
        if (!following) {
          return;
        }
        group.lines.push(following[1]);
        group.lineNumbers.push(following[0]);
        last = following[1];
      }
    }

    while (last.endsWith("\\")) {
      const following = next();
      if (!following) {
        return;
      }
      group.lines.push(following[1]);
      group.lineNumbers.push(following[0]);
      last = following[1];
    }

    yield group;
  }
}

export function isImportStart(line: string): boolean {
  return line.startsWith("import ") || line.startsWith("from ");
}

// Returns the first line after the one that closes the block.
function skipBlockComment(next: Cursor, filter: BlockCommentFilter): NumberedLine | undefined {
  for (let line = next(); line; line = next()) {
    if (filter.closes(line[1])) {
      return next();
    }
  }
  return undefined;
}

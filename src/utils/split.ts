const DOTS = /^(\.+)(.*)$/s;

/**
 * Splits a sequence into the runs between delimiter elements. Delimiters are
 * dropped. Always returns at least one segment, and adjacent or trailing
 * delimiters produce empty segments.
 */
export function listSplit<T>(items: Iterable<T>, isDelimiter: (item: T) => boolean): T[][] {
  const segments: T[][] = [];
  let segment: T[] = [];

  for (const item of items) {
    if (isDelimiter(item)) {
      segments.push(segment);
      segment = [];
    } else {
      segment.push(item);
    }
  }

  segments.push(segment);
  return segments;
}

/** `"..pkg.mod"` -> `["..", "pkg.mod"]`; a stem without leading dots comes back as `["", stem]`. */
export function splitDots(stem: string): [dots: string, remainder: string] {
  const match = DOTS.exec(stem);
  if (!match) {
    return ["", stem];
  }
  return [match[1], match[2]];
}

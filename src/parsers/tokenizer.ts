import { listSplit } from "../utils/split.js";
import { isContinuation, Token } from "./token.js";

type ScanState = "IN_SPACE" | "IN_WORD" | "IN_PUNCT" | "IN_COMMENT";

const SEPARATORS = new Set([" ", "\t", "(", ")"]);

/**
 * Tokenizes the physical lines of one import statement.
 *
 * Each line is scanned and has its trailing comment moved ahead of a trailing
 * comma on its own, then the lines are concatenated and backslash
 * continuations are folded away.
 */
export function tokenizeImportLines(lines: readonly string[]): Token[] {
  return joinContinuations(lines.flatMap((line) => attachCommentsBeforeCommas(scanLine(line))));
}

export function scanLine(line: string): Token[] {
  const tokens: Token[] = [];
  let state: ScanState = "IN_SPACE";
  let word = "";

  const flushWord = () => {
    if (word) {
      tokens.push(new Token(word, "word"));
      word = "";
    }
  };

  for (let i = 0; i < line.length && state !== "IN_COMMENT"; i += 1) {
    const ch = line[i];

    if (ch === "#") {
      flushWord();
      tokens.push(new Token(line.slice(i), "comment"));
      state = "IN_COMMENT";
    } else if (SEPARATORS.has(ch)) {
      flushWord();
      state = "IN_SPACE";
    } else if (ch === ",") {
      flushWord();
      tokens.push(new Token(",", "comma"));
      state = "IN_PUNCT";
    } else if (ch === "\\") {
      const attached = state === "IN_WORD";
      flushWord();
      tokens.push(new Token("\\", "continuation", attached));
      state = "IN_PUNCT";
    } else {
      word += ch;
      state = "IN_WORD";
    }
  }

  flushWord();
  return tokens;
}

/**
 * `b,  # note` reads as a note about `b`, but the raw order puts the comment
 * after the comma and so in front of the next name. Moves such a comment in
 * front of the comma.
 */
export function attachCommentsBeforeCommas(tokens: readonly Token[]): Token[] {
  const result: Token[] = [];

  for (const token of tokens) {
    const previous = result.length > 0 ? result[result.length - 1] : undefined;
    if (token.isComment && previous?.kind === "comma") {
      result.splice(result.length - 1, 0, token);
    } else {
      result.push(token);
    }
  }

  return result;
}

/**
 * Drops continuation markers. A marker written directly against a word
 * (`import a.\` then `b`) also glues that word to the first word after it.
 */
export function joinContinuations(tokens: readonly Token[]): Token[] {
  const markers = tokens.filter(isContinuation);
  const [head, ...segments] = listSplit(tokens, isContinuation);
  const joined = [...head];

  segments.forEach((segment, index) => {
    const previous = joined.length > 0 ? joined[joined.length - 1] : undefined;
    const first = segment.length > 0 ? segment[0] : undefined;

    if (markers[index].attached && previous?.kind === "word" && first?.kind === "word") {
      joined[joined.length - 1] = new Token(`${previous.text}${first.text}`, "word");
      joined.push(...segment.slice(1));
    } else {
      joined.push(...segment);
    }
  });

  return joined;
}

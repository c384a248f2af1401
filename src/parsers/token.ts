export type TokenKind = "word" | "comma" | "comment" | "continuation";

export class Token {
  /**
   * @param attached for continuation markers: the backslash was written directly
   *   against the preceding word, with no whitespace in between.
   */
  constructor(
    readonly text: string,
    readonly kind: TokenKind,
    readonly attached = false,
  ) {}

  get isComment(): boolean {
    return this.text.startsWith("#");
  }

  toString(): string {
    return this.text;
  }
}

export function isComma(token: Token): boolean {
  return token.kind === "comma";
}

export function isContinuation(token: Token): boolean {
  return token.kind === "continuation";
}

export function isKeyword(token: Token, keyword: string): boolean {
  return token.kind === "word" && token.text === keyword;
}

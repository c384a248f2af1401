export class ImportParseError extends Error {
  readonly lineNumbers: readonly number[];

  constructor(reason: string, lineNumbers: readonly number[]) {
    const where = lineNumbers.length === 1 ? "line" : "lines";
    super(`${reason} (${where} ${lineNumbers.join(", ")})`);
    this.name = "ImportParseError";
    this.lineNumbers = [...lineNumbers];
  }
}

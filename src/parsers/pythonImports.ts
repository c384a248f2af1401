import { ImportParseError } from "../errors.js";
import type { ImportStatement, LineGroup, ParseIssue, ParseResult } from "../types.js";
import { groupImportLines, type BlockCommentFilter } from "./lineGrouper.js";
import { enumerateLines } from "./sourceLines.js";
import { parseImportTokens } from "./statementParser.js";
import { tokenizeImportLines } from "./tokenizer.js";

export interface ParsePythonImportsOptions {
  /** Rethrow the first unparseable statement instead of recording it in `errors`. */
  strict?: boolean;
  blockCommentFilter?: BlockCommentFilter;
}

export function* parseStatements(groups: Iterable<LineGroup>): Generator<ImportStatement, void, undefined> {
  for (const group of groups) {
    yield* parseImportTokens(tokenizeImportLines(group.lines), group.lineNumbers);
  }
}

export function parsePythonImports(source: string, options: ParsePythonImportsOptions = {}): ParseResult {
  const statements: ImportStatement[] = [];
  const errors: ParseIssue[] = [];

  for (const group of groupImportLines(enumerateLines(source), options.blockCommentFilter)) {
    try {
      statements.push(...parseStatements([group]));
    } catch (error) {
      if (options.strict || !(error instanceof ImportParseError)) {
        throw error;
      }
      errors.push({ lineNumbers: [...error.lineNumbers], message: error.message });
    }
  }

  return { statements, errors };
}

/** Module paths in first-seen order: `import a.b as c` gives `a.b`, `from .core import x` gives `.core`. */
export function listImportedModules(statements: Iterable<ImportStatement>): string[] {
  const found = new Set<string>();
  for (const statement of statements) {
    found.add(statement.stem);
  }
  return Array.from(found);
}

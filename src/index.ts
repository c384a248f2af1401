export { ImportParseError } from "./errors.js";
export { Token, type TokenKind } from "./parsers/token.js";
export {
  groupImportLines,
  isImportStart,
  tripleQuoteFilter,
  type BlockCommentFilter,
  type NumberedLine,
} from "./parsers/lineGrouper.js";
export { tokenizeImportLines, scanLine, attachCommentsBeforeCommas, joinContinuations } from "./parsers/tokenizer.js";
export { parseImportTokens, parseImportStem } from "./parsers/statementParser.js";
export {
  createFromImport,
  createLeaf,
  createPlainImport,
  formatStatement,
  importedNames,
  type FormatOptions,
} from "./parsers/statements.js";
export { enumerateLines, detectLineSeparator, getFileArtifacts } from "./parsers/sourceLines.js";
export {
  parsePythonImports,
  parseStatements,
  listImportedModules,
  type ParsePythonImportsOptions,
} from "./parsers/pythonImports.js";
export { listSplit, splitDots } from "./utils/split.js";
export type {
  FileArtifacts,
  FromImport,
  ImportLeaf,
  ImportStatement,
  LineGroup,
  LineSeparator,
  ParseIssue,
  ParseResult,
  PlainImport,
} from "./types.js";

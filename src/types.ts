import type { Token } from "./parsers/token.js";

export type LineSeparator = "\n" | "\r\n";

export interface LineGroup {
  lines: string[];
  lineNumbers: number[];
}

export interface ImportLeaf {
  readonly name: string;
  readonly alias?: string;
  readonly comments: readonly Token[];
}

export interface PlainImport {
  readonly kind: "import";
  readonly stem: string;
  readonly alias?: string;
  readonly lineNumbers: readonly number[];
  readonly comments: readonly Token[];
}

export interface FromImport {
  readonly kind: "from";
  readonly stem: string;
  readonly leafs: readonly ImportLeaf[];
  readonly lineNumbers: readonly number[];
  readonly comments: readonly Token[];
}

export type ImportStatement = PlainImport | FromImport;

export interface ParseIssue {
  lineNumbers: number[];
  message: string;
}

export interface ParseResult {
  statements: ImportStatement[];
  errors: ParseIssue[];
}

export interface FileArtifacts {
  sep: LineSeparator;
}

export interface FileParseReport {
  filePath: string;
  statements: ImportStatement[];
  errors: ParseIssue[];
  /** Byte limit the read stopped at; only the complete lines before it were parsed. */
  truncatedAt?: number;
}

export interface ModuleUsage {
  module: string;
  files: number;
  statements: number;
}

export interface FileIndexEntry {
  absPath: string;
  relPath: string;
  sizeBytes: number;
  depth: number;
}

export interface ImportlensConfig {
  strict: boolean;
  maxDepth: number;
  maxFiles: number;
  maxReadBytes: number;
  excludeDirs: string[];
}

export interface StageLogEntry {
  ts: string;
  stage: string;
  event: "start" | "end" | "warn" | "error";
  durationMs?: number;
  inputSummary?: Record<string, unknown>;
  counts?: Record<string, number>;
  warnings?: string[];
  error?: string;
}

export interface Logger {
  log(entry: StageLogEntry): Promise<void>;
  stageStart(stage: string, inputSummary?: Record<string, unknown>): Promise<number>;
  stageEnd(
    stage: string,
    startedAt: number,
    counts?: Record<string, number>,
    warnings?: string[],
  ): Promise<void>;
  stageError(stage: string, startedAt: number, error: unknown): Promise<void>;
}

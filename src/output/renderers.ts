import type { FileParseReport, ImportStatement, ModuleUsage } from "../types.js";
import { importedNames, statementComments } from "../parsers/statements.js";

export const STATEMENT_TABLE_HEADERS = ["Lines", "Kind", "Module", "Names", "Comments"];
export const MODULE_TABLE_HEADERS = ["Module", "Files", "Statements"];

export interface StatementJson {
  kind: ImportStatement["kind"];
  stem: string;
  alias?: string;
  leafs?: Array<{ name: string; alias?: string; comments: string[] }>;
  lineNumbers: number[];
  comments: string[];
}

export function statementToJson(statement: ImportStatement): StatementJson {
  const base = {
    stem: statement.stem,
    lineNumbers: [...statement.lineNumbers],
    comments: statement.comments.map((comment) => comment.text),
  };

  if (statement.kind === "import") {
    return {
      kind: "import",
      ...base,
      ...(statement.alias ? { alias: statement.alias } : {}),
    };
  }

  return {
    kind: "from",
    ...base,
    leafs: statement.leafs.map((leaf) => ({
      name: leaf.name,
      ...(leaf.alias ? { alias: leaf.alias } : {}),
      comments: leaf.comments.map((comment) => comment.text),
    })),
  };
}

export function renderReportsJson(reports: FileParseReport[]): string {
  const payload = reports.map((report) => ({
    file: report.filePath,
    statements: report.statements.map(statementToJson),
    errors: report.errors,
  }));
  return `${JSON.stringify(payload, null, 2)}\n`;
}

export function formatLineRange(lineNumbers: readonly number[]): string {
  if (lineNumbers.length === 0) return "";
  const first = lineNumbers[0];
  const last = lineNumbers[lineNumbers.length - 1];
  return first === last ? String(first) : `${first}-${last}`;
}

export function statementRow(statement: ImportStatement): string[] {
  return [
    formatLineRange(statement.lineNumbers),
    statement.kind,
    statement.stem,
    importedNames(statement).join(", "),
    statementComments(statement).join(" "),
  ];
}

export function summarizeModules(reports: FileParseReport[]): ModuleUsage[] {
  const usage = new Map<string, { files: Set<string>; statements: number }>();

  for (const report of reports) {
    for (const statement of report.statements) {
      const entry = usage.get(statement.stem) || { files: new Set<string>(), statements: 0 };
      entry.files.add(report.filePath);
      entry.statements += 1;
      usage.set(statement.stem, entry);
    }
  }

  return Array.from(usage.entries())
    .map(([module, entry]) => ({ module, files: entry.files.size, statements: entry.statements }))
    .sort((a, b) => b.files - a.files || a.module.localeCompare(b.module));
}

export function moduleRow(usage: ModuleUsage): string[] {
  return [usage.module, String(usage.files), String(usage.statements)];
}

export function renderModulesJson(usage: ModuleUsage[], reports: FileParseReport[]): string {
  const errors = reports.flatMap((report) =>
    report.errors.map((issue) => ({ file: report.filePath, ...issue })),
  );
  return `${JSON.stringify({ filesScanned: reports.length, modules: usage, errors }, null, 2)}\n`;
}

import path from "node:path";
import type { FileParseReport } from "../types.js";
import { displayPathFor, parseSourceFile } from "../pipeline/parseFiles.js";
import { renderReportsJson, STATEMENT_TABLE_HEADERS, statementRow } from "../output/renderers.js";
import { applyOverrides, loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { createUiRuntime, type UiRuntimeOptions } from "../ui/runtime.js";

export interface ParseCliOptions {
  json?: boolean;
  strict?: boolean;
  log?: string;
  config?: string;
  color?: boolean;
}

export async function parseCommand(
  files: string[],
  cli: ParseCliOptions,
  runtimeOptions: UiRuntimeOptions = {},
): Promise<FileParseReport[]> {
  const cwd = process.cwd();
  const config = applyOverrides(await loadConfig(cwd, cli.config), { strict: cli.strict });
  const logger = await createLogger(cli.log);
  const ui = createUiRuntime({ color: cli.color, ...runtimeOptions, logger });
  const reports: FileParseReport[] = [];

  for (const file of files) {
    const displayPath = displayPathFor(file, cwd);
    const startedAt = await logger.stageStart("parse", { file: displayPath, strict: config.strict });
    try {
      const report = await parseSourceFile(path.resolve(cwd, file), { strict: config.strict, displayPath });
      reports.push(report);
      await logger.stageEnd(
        "parse",
        startedAt,
        { statements: report.statements.length, errors: report.errors.length },
        report.errors.map((issue) => `${displayPath}: ${issue.message}`),
      );
    } catch (error) {
      await logger.stageError("parse", startedAt, error);
      throw error;
    }
  }

  if (cli.json) {
    ui.renderer.lines(renderReportsJson(reports));
    return reports;
  }

  for (const report of reports) {
    ui.renderer.section(report.filePath);
    if (report.statements.length === 0) {
      ui.renderer.line(ui.theme.colors.dim("no import statements"));
    } else {
      ui.renderer.asciiTable(STATEMENT_TABLE_HEADERS, report.statements.map(statementRow));
    }
    for (const issue of report.errors) {
      ui.renderer.warn(`skipped: ${issue.message}`);
    }
    ui.renderer.line();
  }

  return reports;
}

import path from "node:path";
import type { FileParseReport, ModuleUsage } from "../types.js";
import { parseIndexedFiles } from "../pipeline/parseFiles.js";
import { buildFileIndex } from "../scanner/fileIndexer.js";
import { MODULE_TABLE_HEADERS, moduleRow, renderModulesJson, summarizeModules } from "../output/renderers.js";
import { applyOverrides, loadConfig, parseIntOption } from "../utils/config.js";
import { isDirectory } from "../utils/fs.js";
import { createLogger } from "../utils/logger.js";
import { createUiRuntime, type UiRuntimeOptions } from "../ui/runtime.js";

export interface ScanCliOptions {
  depth?: string;
  maxFiles?: string;
  json?: boolean;
  strict?: boolean;
  log?: string;
  config?: string;
  color?: boolean;
}

export interface ScanResult {
  reports: FileParseReport[];
  modules: ModuleUsage[];
  warnings: string[];
}

export async function scanCommand(
  dir: string,
  cli: ScanCliOptions,
  runtimeOptions: UiRuntimeOptions = {},
): Promise<ScanResult> {
  const cwd = process.cwd();
  const rootDir = path.resolve(cwd, dir);
  if (!(await isDirectory(rootDir))) {
    throw new Error(`Not a directory: ${dir}`);
  }

  const config = applyOverrides(await loadConfig(cwd, cli.config), {
    strict: cli.strict,
    maxDepth: parseIntOption(cli.depth, "--depth"),
    maxFiles: parseIntOption(cli.maxFiles, "--max-files"),
  });
  const logger = await createLogger(cli.log);
  const ui = createUiRuntime({ color: cli.color, ...runtimeOptions, logger });

  const index = await ui.stageRunner.withStage(
    "Index python files",
    () =>
      buildFileIndex({
        rootDir,
        maxDepth: config.maxDepth,
        maxFiles: config.maxFiles,
        excludeDirs: config.excludeDirs,
      }),
    (entries) => ({ counts: { files: entries.length } }),
  );

  const { reports, warnings } = await ui.stageRunner.withStage(
    "Parse imports",
    () =>
      parseIndexedFiles(index, {
        strict: config.strict,
        maxReadBytes: config.maxReadBytes,
        logger,
      }),
    (result) => ({
      counts: {
        files: result.reports.length,
        statements: result.reports.reduce((sum, report) => sum + report.statements.length, 0),
        errors: result.reports.reduce((sum, report) => sum + report.errors.length, 0),
      },
      warnings: result.warnings,
    }),
  );

  const modules = summarizeModules(reports);

  if (cli.json) {
    ui.renderer.lines(renderModulesJson(modules, reports));
    return { reports, modules, warnings };
  }

  ui.renderer.section(`Imports under ${dir}`);
  ui.renderer.kvTable([
    ["Files scanned", String(reports.length)],
    ["Modules", String(modules.length)],
  ]);
  ui.renderer.line();
  if (modules.length > 0) {
    ui.renderer.asciiTable(MODULE_TABLE_HEADERS, modules.map(moduleRow));
  }

  const skipped = reports.flatMap((report) =>
    report.errors.map((issue) => `${report.filePath}: ${issue.message}`),
  );
  for (const line of [...warnings, ...skipped]) {
    ui.status.warn(line);
  }

  return { reports, modules, warnings };
}

#!/usr/bin/env node
import { Command } from "commander";
import { formatCommand, type FormatCliOptions } from "./commands/format.js";
import { parseCommand, type ParseCliOptions } from "./commands/parse.js";
import { scanCommand, type ScanCliOptions } from "./commands/scan.js";
import { ImportParseError } from "./errors.js";

const program = new Command();

program
  .name("importlens")
  .description("Parse Python import statements into structured, normalized records.")
  .version("0.1.0");

program
  .command("parse")
  .description("Show the import statements of one or more Python files")
  .argument("<files...>", "python source files")
  .option("--json", "print JSON instead of tables", false)
  .option("--strict", "fail on the first statement that cannot be parsed")
  .option("--log <path>", "write a JSONL stage log to this path")
  .option("--config <path>", "config file (default: ./importlens.config.json)")
  .option("--no-color", "disable colored output")
  .action(async (files: string[], options: ParseCliOptions) => {
    await parseCommand(files, options);
  });

program
  .command("scan")
  .description("Index a directory of Python files and summarize which modules they import")
  .argument("<dir>", "directory to scan")
  .option("--depth <n>", "max directory traversal depth")
  .option("--max-files <n>", "max number of files scanned")
  .option("--json", "print JSON instead of tables", false)
  .option("--strict", "fail on the first statement that cannot be parsed")
  .option("--log <path>", "write a JSONL stage log to this path")
  .option("--config <path>", "config file (default: ./importlens.config.json)")
  .option("--no-color", "disable colored output")
  .action(async (dir: string, options: ScanCliOptions) => {
    await scanCommand(dir, options);
  });

program
  .command("format")
  .description("Print the import statements of a Python file in normalized form")
  .argument("<file>", "python source file")
  .option("--strict", "fail on the first statement that cannot be parsed")
  .option("--config <path>", "config file (default: ./importlens.config.json)")
  .option("--no-color", "disable colored output")
  .action(async (file: string, options: FormatCliOptions) => {
    await formatCommand(file, options);
  });

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  const prefix = error instanceof ImportParseError ? "parse error: " : "";
  process.stderr.write(`[importlens] ${prefix}${message}\n`);
  process.exitCode = 1;
});

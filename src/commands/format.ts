import path from "node:path";
import { detectLineSeparator } from "../parsers/sourceLines.js";
import { parsePythonImports } from "../parsers/pythonImports.js";
import { formatStatement } from "../parsers/statements.js";
import { applyOverrides, loadConfig } from "../utils/config.js";
import { readTextFile } from "../utils/fs.js";
import { createUiRuntime, type UiRuntimeOptions } from "../ui/runtime.js";

export interface FormatCliOptions {
  strict?: boolean;
  config?: string;
  color?: boolean;
}

/** Prints each import statement of `file` re-rendered, using the file's own line separator. */
export async function formatCommand(
  file: string,
  cli: FormatCliOptions,
  runtimeOptions: UiRuntimeOptions = {},
): Promise<string> {
  const cwd = process.cwd();
  const config = applyOverrides(await loadConfig(cwd, cli.config), { strict: cli.strict });
  const source = await readTextFile(path.resolve(cwd, file));
  const sep = detectLineSeparator(source);
  const { statements, errors } = parsePythonImports(source, { strict: config.strict });
  const ui = createUiRuntime({ color: cli.color, ...runtimeOptions });

  const output = statements.map((statement) => `${formatStatement(statement, { sep })}${sep}`).join("");
  if (output) {
    ui.renderer.lines(output);
  }
  for (const issue of errors) {
    ui.status.warn(`skipped: ${issue.message}`);
  }

  return output;
}

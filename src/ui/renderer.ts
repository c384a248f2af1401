import Table from "cli-table3";
import type { TerminalCapabilities } from "./capabilities.js";
import type { UiTheme } from "./theme.js";

export type WriteFn = (text: string) => void;

export class OutputRenderer {
  constructor(
    private readonly capabilities: TerminalCapabilities,
    private readonly theme: UiTheme,
    private readonly write: WriteFn = defaultWrite,
  ) {}

  line(text = ""): void {
    this.write(`${text}\n`);
  }

  lines(text: string): void {
    this.write(text.endsWith("\n") ? text : `${text}\n`);
  }

  section(title: string): void {
    this.line(this.theme.colors.heading(title));
  }

  warn(text: string): void {
    this.line(this.theme.colors.warn(`${this.theme.symbols.warn} ${text}`));
  }

  kvTable(rows: Array<[string, string]>): void {
    if (rows.length === 0) {
      return;
    }
    const leftWidth = Math.max(...rows.map(([k]) => k.length)) + 2;
    for (const [key, value] of rows) {
      this.line(`${pad(key, leftWidth)}${value}`);
    }
  }

  asciiTable(headers: string[], rows: string[][]): void {
    const tableOptions: ConstructorParameters<typeof Table>[0] = {
      head: headers,
      style: {
        head: [],
        border: [],
        compact: true,
      },
    };
    if (this.capabilities.supportsColor) {
      tableOptions.style = {
        head: ["cyan"],
        border: ["gray"],
        compact: true,
      };
    }

    const table = new Table(tableOptions);
    for (const row of rows) {
      table.push(row);
    }
    this.line(table.toString());
  }
}

function pad(value: string, width: number): string {
  if (value.length >= width) return value;
  return `${value}${" ".repeat(width - value.length)}`;
}

function defaultWrite(text: string): void {
  process.stdout.write(text);
}

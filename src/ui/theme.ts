import { Chalk } from "chalk";
import type { TerminalCapabilities, UiThemeName } from "./capabilities.js";

export interface UiTheme {
  name: UiThemeName;
  colors: {
    heading: (value: string) => string;
    ok: (value: string) => string;
    warn: (value: string) => string;
    err: (value: string) => string;
    dim: (value: string) => string;
  };
  symbols: {
    tick: string;
    cross: string;
    warn: string;
    spinnerFrames: string[];
  };
}

export function createTheme(capabilities: TerminalCapabilities): UiTheme {
  const chalk = new Chalk({ level: capabilities.supportsColor ? 3 : 0 });
  const identity = (value: string): string => value;
  const mono = capabilities.theme === "mono";

  const colors = mono
    ? {
        heading: identity,
        ok: identity,
        warn: identity,
        err: identity,
        dim: identity,
      }
    : {
        heading: (value: string) => chalk.bold.hex("#4B8BBE")(value),
        ok: (value: string) => chalk.hex("#59FF8C")(value),
        warn: (value: string) => chalk.hex("#FFD43B")(value),
        err: (value: string) => chalk.hex("#FF6B7A")(value),
        dim: (value: string) => chalk.hex("#8FA1BA")(value),
      };

  const symbols = capabilities.supportsUnicode
    ? {
        tick: "✓",
        cross: "✕",
        warn: "⚠",
        spinnerFrames: ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"],
      }
    : {
        tick: "[ok]",
        cross: "[x]",
        warn: "[!]",
        spinnerFrames: ["-", "\\", "|", "/"],
      };

  return {
    name: capabilities.theme,
    colors,
    symbols,
  };
}

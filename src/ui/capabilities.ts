export type UiThemeName = "mono" | "color";

export interface TerminalCapabilities {
  isTTY: boolean;
  supportsUnicode: boolean;
  supportsColor: boolean;
  animations: boolean;
  theme: UiThemeName;
}

export interface CapabilityOverrides {
  env?: NodeJS.ProcessEnv;
  isTTY?: boolean;
  platform?: NodeJS.Platform;
  supportsUnicode?: boolean;
  supportsColor?: boolean;
  color?: boolean;
}

export function detectTerminalCapabilities(overrides: CapabilityOverrides = {}): TerminalCapabilities {
  const env = overrides.env || process.env;
  const isTTY = overrides.isTTY ?? Boolean(process.stdout.isTTY);
  const platform = overrides.platform || process.platform;

  const supportsUnicode = overrides.supportsUnicode ?? detectUnicode(platform, env);
  const supportsColor = overrides.color === false ? false : (overrides.supportsColor ?? (isTTY && !env.NO_COLOR));

  // Spinners redraw the current line, which only makes sense on a terminal.
  const animations = isTTY;

  const requestedTheme = normalizeTheme(env.IMPORTLENS_THEME);
  const theme: UiThemeName = supportsColor ? requestedTheme : "mono";

  return {
    isTTY,
    supportsUnicode,
    supportsColor,
    animations,
    theme,
  };
}

function normalizeTheme(value?: string): UiThemeName {
  const normalized = (value || "").trim().toLowerCase();
  if (normalized === "mono") return "mono";
  return "color";
}

function detectUnicode(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): boolean {
  if (platform !== "win32") {
    return true;
  }

  if (env.WT_SESSION || env.TERM_PROGRAM === "vscode") {
    return true;
  }

  const term = (env.TERM || "").toLowerCase();
  return term.includes("xterm") || term.includes("utf");
}

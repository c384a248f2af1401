import type { Logger } from "../types.js";
import { detectTerminalCapabilities, type CapabilityOverrides, type TerminalCapabilities } from "./capabilities.js";
import { OutputRenderer, type WriteFn } from "./renderer.js";
import { StageRunner } from "./stageRunner.js";
import { createTheme, type UiTheme } from "./theme.js";

export interface UiRuntime {
  capabilities: TerminalCapabilities;
  theme: UiTheme;
  renderer: OutputRenderer;
  status: OutputRenderer;
  stageRunner: StageRunner;
}

export interface UiRuntimeOptions extends CapabilityOverrides {
  logger?: Logger;
  /** Destination for results; stdout by default. */
  write?: WriteFn;
  /** Destination for stage progress and warnings; stderr by default. */
  writeStatus?: WriteFn;
}

export function createUiRuntime(options: UiRuntimeOptions = {}): UiRuntime {
  const { logger, write, writeStatus, ...overrides } = options;
  const capabilities = detectTerminalCapabilities(overrides);
  const theme = createTheme(capabilities);
  const renderer = new OutputRenderer(capabilities, theme, write);
  const status = new OutputRenderer(capabilities, theme, writeStatus || writeStderr);
  const stageRunner = new StageRunner(status, capabilities, theme, logger);

  return {
    capabilities,
    theme,
    renderer,
    status,
    stageRunner,
  };
}

function writeStderr(text: string): void {
  process.stderr.write(text);
}

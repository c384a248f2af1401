import ora, { type Ora } from "ora";
import type { Logger } from "../types.js";
import { NullLogger } from "../utils/logger.js";
import type { TerminalCapabilities } from "./capabilities.js";
import type { OutputRenderer } from "./renderer.js";
import type { UiTheme } from "./theme.js";

export interface StageEvent {
  type: "stage:start" | "stage:end" | "stage:error";
  stage: string;
  ts: number;
  durationMs?: number;
  error?: string;
}

export interface StageOutcome {
  counts?: Record<string, number>;
  warnings?: string[];
}

export interface SpinnerLike {
  text: string;
  start: () => SpinnerLike;
  succeed: (text?: string) => SpinnerLike;
  fail: (text?: string) => SpinnerLike;
}

export type SpinnerFactory = (text: string, frames: string[]) => SpinnerLike;

export class StageRunner {
  private readonly listeners = new Set<(event: StageEvent) => void>();
  private readonly spinnerFactory: SpinnerFactory;

  constructor(
    private readonly renderer: OutputRenderer,
    private readonly capabilities: TerminalCapabilities,
    private readonly theme: UiTheme,
    private readonly logger: Logger = new NullLogger(),
    spinnerFactory?: SpinnerFactory,
  ) {
    this.spinnerFactory = spinnerFactory || defaultSpinnerFactory;
  }

  onEvent(listener: (event: StageEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Runs `fn` as a named stage: spinner on a terminal, a plain line otherwise,
   * and start/end/error entries in the log. `describe` turns the stage result
   * into the counts and warnings that are logged with the end entry.
   */
  async withStage<T>(
    stage: string,
    fn: () => Promise<T>,
    describe: (result: T) => StageOutcome = () => ({}),
  ): Promise<T> {
    const startedAt = await this.logger.stageStart(stage);
    this.emit({ type: "stage:start", stage, ts: startedAt });

    let spinner: SpinnerLike | undefined;
    if (this.capabilities.animations) {
      spinner = this.spinnerFactory(`${stage}...`, this.theme.symbols.spinnerFrames);
      spinner.start();
    } else {
      this.renderer.line(this.theme.colors.dim(`${stage}...`));
    }

    try {
      const result = await fn();
      const durationMs = Date.now() - startedAt;
      const outcome = describe(result);
      const doneText = `${this.theme.symbols.tick} ${stage} done in ${durationMs}ms`;

      if (spinner) {
        spinner.succeed(this.theme.colors.ok(doneText));
      } else {
        this.renderer.line(this.theme.colors.ok(doneText));
      }

      await this.logger.stageEnd(stage, startedAt, outcome.counts, outcome.warnings);
      this.emit({ type: "stage:end", stage, ts: Date.now(), durationMs });
      return result;
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      const message = error instanceof Error ? error.message : String(error);
      const failText = `${this.theme.symbols.cross} ${stage} failed in ${durationMs}ms: ${message}`;

      if (spinner) {
        spinner.fail(this.theme.colors.err(failText));
      } else {
        this.renderer.line(this.theme.colors.err(failText));
      }

      await this.logger.stageError(stage, startedAt, error);
      this.emit({ type: "stage:error", stage, ts: Date.now(), durationMs, error: message });
      throw error;
    }
  }

  private emit(event: StageEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

function defaultSpinnerFactory(text: string, frames: string[]): SpinnerLike {
  const spinner: Ora = ora({
    text,
    spinner: {
      frames,
      interval: 80,
    },
    discardStdin: false,
  });

  const adapter: SpinnerLike = {
    get text() {
      return spinner.text;
    },
    set text(value: string) {
      spinner.text = value;
    },
    start: () => {
      spinner.start();
      return adapter;
    },
    succeed: (value?: string) => {
      spinner.succeed(value);
      return adapter;
    },
    fail: (value?: string) => {
      spinner.fail(value);
      return adapter;
    },
  };

  return adapter;
}

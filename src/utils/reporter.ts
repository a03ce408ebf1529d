import { createApkForgeBanner, createCliTheme, type PhaseStatus, type CliTheme, type CliTone } from "./cli-theme";

export interface ReporterOptions {
  verbose?: boolean;
  useColor?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

/**
 * Console sink for a run. Info and success lines go to `out`, warnings and
 * errors to `err`; debug lines are dropped unless verbose.
 */
export class Reporter {
  readonly verbose: boolean;
  readonly theme: CliTheme;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(options: ReporterOptions = {}) {
    this.verbose = Boolean(options.verbose);
    this.theme = createCliTheme({ useColor: options.useColor });
    // eslint-disable-next-line no-console
    this.out = options.out ?? ((line) => console.log(line));
    // eslint-disable-next-line no-console
    this.err = options.err ?? ((line) => console.error(line));
  }

  banner(): void {
    this.out(createApkForgeBanner(this.theme.useColor));
  }

  phase(step: number, total: number, title: string, status: PhaseStatus, detail = ""): void {
    const line = this.theme.step(step, total, title, status, detail);
    if (status === "failed") {
      this.err(line);
      return;
    }
    this.out(line);
  }

  section(title: string): void {
    this.out("");
    this.out(this.theme.section(title));
  }

  kv(key: string, value: string, tone?: CliTone): void {
    this.out(this.theme.kv(key, value, tone));
  }

  info(message: string): void {
    this.out(this.theme.info(message));
  }

  success(message: string): void {
    this.out(this.theme.success(message));
  }

  warn(message: string): void {
    this.err(this.theme.warn(message));
  }

  error(message: string): void {
    this.err(this.theme.error(message));
  }

  debug(message: string): void {
    if (!this.verbose) {
      return;
    }
    for (const line of message.split("\n")) {
      this.out(this.theme.debug(line));
    }
  }
}

import { stdout as output } from "node:process";

// eslint-disable-next-line @typescript-eslint/no-require-imports
const pkgJson = require("../../package.json") as { version: string };

export type CliTone = "plain" | "accent" | "muted" | "info" | "success" | "warn" | "error";
export type PhaseStatus = "ok" | "failed";

export const APKFORGE_VERSION = pkgJson.version;

const ANSI_RESET = "\u001b[0m";
const ANSI_BOLD = "\u001b[1m";
const ANSI_DIM = "\u001b[2m";
const ANSI_RULE = "\u001b[1;35m";

const TONE_ANSI: Record<CliTone, string | null> = {
  plain: null,
  accent: "\u001b[1;36m",
  muted: ANSI_DIM,
  info: "\u001b[1;34m",
  success: "\u001b[1;32m",
  warn: "\u001b[1;33m",
  error: "\u001b[1;31m",
};

const KEY_WIDTH = 10;

/** Color only on a TTY, and never with NO_COLOR set or FORCE_COLOR=0. */
export function shouldUseColor(stream: NodeJS.WriteStream = output): boolean {
  if (!stream.isTTY || process.env.NO_COLOR !== undefined) {
    return false;
  }
  return process.env.FORCE_COLOR?.trim() !== "0";
}

function wrap(text: string, ansiCode: string | null, enabled: boolean): string {
  return enabled && ansiCode ? `${ansiCode}${text}${ANSI_RESET}` : text;
}

export function createApkForgeBanner(useColor: boolean): string {
  const rule = wrap("=".repeat(50), ANSI_RULE, useColor);
  const title = wrap(`APKFORGE v${APKFORGE_VERSION}`, ANSI_BOLD, useColor);
  return [rule, `${title}  ${wrap("rebuild / align / sign / install", ANSI_DIM, useColor)}`, rule].join("\n");
}

export interface CliTheme {
  useColor: boolean;
  section: (title: string) => string;
  info: (message: string) => string;
  success: (message: string) => string;
  warn: (message: string) => string;
  error: (message: string) => string;
  debug: (message: string) => string;
  kv: (key: string, value: string, tone?: CliTone) => string;
  step: (step: number, total: number, title: string, status: PhaseStatus, detail: string) => string;
}

export function createCliTheme(options: { useColor?: boolean } = {}): CliTheme {
  const useColor = options.useColor ?? shouldUseColor();
  const paint = (text: string, tone: CliTone = "plain") => wrap(text, TONE_ANSI[tone], useColor);
  const tagged = (tag: string, tone: CliTone) => (message: string) => `${paint(`[${tag}]`, tone)} ${message}`;

  return {
    useColor,
    section: (title) => `${paint("===", "muted")} ${paint(title, "accent")} ${paint("===", "muted")}`,
    info: tagged("INFO", "info"),
    success: tagged("OK", "success"),
    warn: tagged("WARN", "warn"),
    error: tagged("ERROR", "error"),
    debug: (message) => `${paint("[DEBUG]", "muted")} ${paint(message, "muted")}`,
    kv: (key, value, tone = "plain") => `  ${paint(`${key.padEnd(KEY_WIDTH)}:`, "muted")} ${paint(value, tone)}`,
    step: (step, total, title, status, detail) => {
      const badge = status === "ok" ? paint("OK", "success") : paint("FAIL", "error");
      return `${paint(`[${step}/${total}]`, "accent")} ${title} ${paint("->", "muted")} ${`${badge} ${detail}`.trim()}`;
    },
  };
}

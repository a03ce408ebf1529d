import { spawnSync } from "node:child_process";
import path from "node:path";

export interface RunOptions {
  timeoutMs?: number;
}

export interface RunResult {
  ok: boolean;
  status: number;
  stdout: string;
  stderr: string;
  error: string | null;
  timedOut: boolean;
}

export type CommandRunner = (cmd: string, args: string[], options?: RunOptions) => RunResult;

export const runCommand: CommandRunner = (cmd, args, options = {}) => {
  const result = spawnSync(cmd, args, {
    encoding: "utf-8",
    timeout: options.timeoutMs,
    killSignal: "SIGTERM",
    stdio: ["pipe", "pipe", "pipe"],
    maxBuffer: 64 * 1024 * 1024,
  });
  const status = result.status ?? 1;
  const stdout = typeof result.stdout === "string" ? result.stdout : "";
  const stderr = typeof result.stderr === "string" ? result.stderr : "";
  const timedOut = Boolean(result.error && "code" in result.error && result.error.code === "ETIMEDOUT");
  return {
    ok: status === 0 && !result.error,
    status,
    stdout,
    stderr,
    error: result.error ? String(result.error.message || result.error) : null,
    timedOut,
  };
};

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args]
    .map((part) => (/[\s"'$`\\]/.test(part) ? `'${part.replace(/'/g, `'\\''`)}'` : part))
    .join(" ");
}

/** Hide `pass:<secret>` and the keytool password flags when echoing a command. */
export function redactSecrets(args: string[]): string[] {
  const secretFlags = new Set(["-storepass", "-keypass"]);
  return args.map((arg, index) => {
    if (arg.startsWith("pass:")) {
      return "pass:******";
    }
    if (index > 0 && secretFlags.has(args[index - 1])) {
      return "******";
    }
    return arg;
  });
}

/** Verbose echo of a command about to run, with passwords masked. */
export function commandEcho(cmd: string, args: string[]): string {
  return `$ ${formatCommand(path.basename(cmd), redactSecrets(args))}`;
}

/** Verbose echo of whatever a finished command printed. */
export function outputEcho(result: RunResult): string[] {
  const lines: string[] = [];
  if (result.stdout.trim()) {
    lines.push(`STDOUT:\n${result.stdout.trimEnd()}`);
  }
  if (result.stderr.trim()) {
    lines.push(`STDERR:\n${result.stderr.trimEnd()}`);
  }
  return lines;
}

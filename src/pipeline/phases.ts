import fs from "node:fs";
import path from "node:path";

import type { PhaseName, PhaseResult, SigningIdentity, ToolPaths } from "../types";
import type { Reporter } from "../utils/reporter";
import { commandEcho, outputEcho, type CommandRunner } from "../utils/process";
import { MANIFEST_FILE } from "../project/sdk-version";

export interface PhaseContext {
  tools: ToolPaths;
  runner: CommandRunner;
  reporter: Reporter;
  timeoutMs: number;
  alignment: number;
}

function phaseResult(phase: PhaseName, ok: boolean, detail: string): PhaseResult {
  return { phase, ok, detail };
}

function requireTool(ctx: PhaseContext, name: keyof ToolPaths): string {
  const resolved = ctx.tools[name];
  if (!resolved) {
    throw new Error(`${name} is not available.`);
  }
  return resolved;
}

/** Run one tool invocation, echo it in verbose mode and report a failure. */
export function invoke(ctx: PhaseContext, cmd: string, args: string[], errorMsg: string): boolean {
  const { reporter } = ctx;
  reporter.debug(commandEcho(cmd, args));
  const result = ctx.runner(cmd, args, { timeoutMs: ctx.timeoutMs });
  for (const line of outputEcho(result)) {
    reporter.debug(line);
  }

  if (result.timedOut) {
    reporter.error(`${errorMsg}: timed out after ${Math.round(ctx.timeoutMs / 1000)}s`);
    return false;
  }
  if (!result.ok) {
    reporter.error(result.error ? `${errorMsg}: ${result.error}` : `${errorMsg} (code ${result.status})`);
    if (result.stderr.trim()) {
      reporter.error(result.stderr.trim());
    }
    return false;
  }
  return true;
}

export function buildRebuildArgs(inputDir: string, outputApk: string, useAapt2: boolean): string[] {
  const args = ["b", "-o", outputApk];
  if (useAapt2) {
    args.push("--use-aapt2");
  }
  args.push(inputDir);
  return args;
}

export function rebuildApk(ctx: PhaseContext, inputDir: string, outputApk: string, useAapt2: boolean): PhaseResult {
  if (!fs.existsSync(path.join(inputDir, MANIFEST_FILE))) {
    ctx.reporter.error(`Directory does not contain ${MANIFEST_FILE}: ${inputDir}`);
    return phaseResult("rebuild", false, `missing ${MANIFEST_FILE}`);
  }

  const apktool = requireTool(ctx, "apktool");
  if (!invoke(ctx, apktool, buildRebuildArgs(inputDir, outputApk, useAapt2), "apktool build failed")) {
    ctx.reporter.warn(useAapt2 ? "Retrying build without AAPT2..." : "Retrying build once...");
    if (!invoke(ctx, apktool, ["b", inputDir, "-o", outputApk], "apktool fallback build failed")) {
      return phaseResult("rebuild", false, "apktool exited non-zero");
    }
  }

  if (!fs.existsSync(outputApk)) {
    ctx.reporter.error(`apktool did not produce ${outputApk}`);
    return phaseResult("rebuild", false, "no output apk");
  }
  return phaseResult("rebuild", true, path.basename(outputApk));
}

export function alignApk(ctx: PhaseContext, inputApk: string, outputApk: string): PhaseResult {
  const zipalign = requireTool(ctx, "zipalign");
  const alignment = String(ctx.alignment);

  if (!invoke(ctx, zipalign, ["-v", alignment, inputApk, outputApk], "zipalign failed")) {
    return phaseResult("align", false, "zipalign exited non-zero");
  }
  if (!fs.existsSync(outputApk)) {
    ctx.reporter.error(`zipalign did not produce ${outputApk}`);
    return phaseResult("align", false, "no aligned apk");
  }

  ctx.reporter.debug("Checking alignment...");
  if (!invoke(ctx, zipalign, ["-c", alignment, outputApk], "Incorrect alignment")) {
    return phaseResult("align", false, "alignment check failed");
  }
  return phaseResult("align", true, `aligned to ${alignment} bytes`);
}

export function buildSignArgs(
  keystorePath: string,
  identity: SigningIdentity,
  inputApk: string,
  outputApk: string,
): string[] {
  return [
    "sign",
    "--ks",
    keystorePath,
    "--ks-pass",
    `pass:${identity.storePassword}`,
    "--ks-key-alias",
    identity.keyAlias,
    "--key-pass",
    `pass:${identity.keyPassword}`,
    "--out",
    outputApk,
    inputApk,
  ];
}

export function signApk(
  ctx: PhaseContext,
  inputApk: string,
  outputApk: string,
  keystorePath: string,
  identity: SigningIdentity,
): PhaseResult {
  const apksigner = requireTool(ctx, "apksigner");
  if (!invoke(ctx, apksigner, buildSignArgs(keystorePath, identity, inputApk, outputApk), "apksigner sign failed")) {
    return phaseResult("sign", false, "apksigner exited non-zero");
  }
  if (!fs.existsSync(outputApk)) {
    ctx.reporter.error(`apksigner did not produce ${outputApk}`);
    return phaseResult("sign", false, "no signed apk");
  }
  return phaseResult("sign", true, `key alias ${identity.keyAlias}`);
}

export function verifySignature(ctx: PhaseContext, apkPath: string): PhaseResult {
  const apksigner = requireTool(ctx, "apksigner");
  if (!invoke(ctx, apksigner, ["verify", apkPath], "Signature verification failed")) {
    return phaseResult("verify", false, "apksigner verify exited non-zero");
  }
  return phaseResult("verify", true, "signature verified");
}

/** Serials in state `device` from `adb devices` output. */
export function parseAdbDevices(output: string): string[] {
  return output
    .split(/\r?\n/)
    .slice(1)
    .map((line) => line.trim().split(/\s+/))
    .filter((cols) => cols.length >= 2 && cols[1] === "device")
    .map((cols) => cols[0]);
}

export interface InstallOutcome {
  result: PhaseResult;
  devices: string[];
}

export function installApk(ctx: PhaseContext, apkPath: string, deviceSerial: string | null): InstallOutcome {
  const adb = requireTool(ctx, "adb");
  const { reporter } = ctx;

  reporter.info("Searching for devices...");
  const listing = ctx.runner(adb, ["devices"], { timeoutMs: ctx.timeoutMs });
  if (!listing.ok) {
    reporter.error(`adb devices failed (code ${listing.status})${listing.stderr.trim() ? `: ${listing.stderr.trim()}` : ""}`);
    return { result: phaseResult("install", false, "adb devices failed"), devices: [] };
  }

  const attached = parseAdbDevices(listing.stdout);
  if (attached.length === 0) {
    reporter.error("No connected devices found");
    return { result: phaseResult("install", false, "no devices"), devices: [] };
  }

  let targets = attached;
  if (deviceSerial) {
    if (!attached.includes(deviceSerial)) {
      reporter.error(`Device '${deviceSerial}' is not connected. Attached: ${attached.join(", ")}`);
      return { result: phaseResult("install", false, `device ${deviceSerial} not connected`), devices: [] };
    }
    targets = [deviceSerial];
  }
  reporter.info(`Devices detected: ${targets.join(", ")}`);

  const installed: string[] = [];
  for (const device of targets) {
    reporter.info(`Installing on ${device}...`);
    if (invoke(ctx, adb, ["-s", device, "install", "-r", apkPath], `Install failed on ${device}`)) {
      installed.push(device);
    }
  }

  const ok = installed.length === targets.length;
  return {
    result: phaseResult("install", ok, `${installed.length}/${targets.length} device(s)`),
    devices: installed,
  };
}

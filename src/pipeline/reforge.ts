import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { resolveSigningIdentity } from "../config";
import { locateToolchain, requiredToolsFor, type ToolchainReport } from "../environment/toolchain";
import { detectTargetSdk, shouldUseAapt2 } from "../project/sdk-version";
import { provisionKeystore } from "../signing/keystore";
import {
  REQUIRED_TOOLS,
  type ApkForgeConfig,
  type PhaseName,
  type PhaseResult,
  type ReforgeOptions,
  type ReforgeResult,
  type ReforgeStatus,
  type SigningIdentity,
  type ToolName,
} from "../types";
import { ensureDir, isDirectory } from "../utils/paths";
import { runCommand, type CommandRunner } from "../utils/process";
import type { Reporter } from "../utils/reporter";
import { alignApk, installApk, rebuildApk, signApk, verifySignature, type PhaseContext } from "./phases";

export interface ReforgePipelineDeps {
  config: ApkForgeConfig;
  reporter: Reporter;
  runner?: CommandRunner;
  locateTools?: (config: ApkForgeConfig) => ToolchainReport;
  debugKeystorePath?: string;
  tempRoot?: string;
}

const PHASE_TITLES: Record<Exclude<PhaseName, "verify">, string> = {
  rebuild: "Rebuilding APK",
  align: "Aligning APK",
  sign: "Signing APK",
  install: "Installing APK",
};

export class ReforgePipeline {
  private readonly config: ApkForgeConfig;
  private readonly reporter: Reporter;
  private readonly runner: CommandRunner;
  private readonly locateTools: (config: ApkForgeConfig) => ToolchainReport;
  private readonly debugKeystorePath: string | undefined;
  private readonly tempRoot: string;

  constructor(deps: ReforgePipelineDeps) {
    this.config = deps.config;
    this.reporter = deps.reporter;
    this.runner = deps.runner ?? runCommand;
    this.locateTools = deps.locateTools ?? ((config) => locateToolchain(config));
    this.debugKeystorePath = deps.debugKeystorePath;
    this.tempRoot = deps.tempRoot ?? os.tmpdir();
  }

  private checkDependencies(install: boolean): { report: ToolchainReport; missing: ToolName[] } {
    const report = this.locateTools(this.config);
    for (const note of report.notes) {
      this.reporter.warn(note);
    }
    if (report.sdkRoot) {
      this.reporter.debug(`Android SDK root: ${report.sdkRoot}`);
    }
    for (const tool of REQUIRED_TOOLS) {
      const location = report.toolPaths[tool];
      if (location) {
        this.reporter.debug(`${tool} found at ${location} (${report.sources[tool] ?? "path"})`);
      }
    }
    const required = requiredToolsFor(install);
    return { report, missing: report.missing.filter((tool) => required.includes(tool)) };
  }

  run(options: ReforgeOptions): ReforgeResult {
    const { reporter } = this;
    const inputDir = path.resolve(options.inputDir);
    const outputApk = path.resolve(options.outputApk);
    const phases: PhaseResult[] = [];
    const installedDevices: string[] = [];

    const finish = (
      status: ReforgeStatus,
      failedPhase: PhaseName | null = null,
      missingTools: ToolName[] = [],
    ): ReforgeResult => ({
      ok: status === "success",
      status,
      outputApk,
      phases,
      failedPhase,
      missingTools,
      installedDevices,
    });

    reporter.banner();
    reporter.kv("INPUT", inputDir, "accent");
    reporter.kv("OUTPUT", outputApk, "accent");

    if (!isDirectory(inputDir)) {
      reporter.error(`Directory not found: ${inputDir}`);
      return finish("invalid-input");
    }

    const { report, missing } = this.checkDependencies(options.install);
    if (missing.length > 0) {
      for (const tool of missing) {
        reporter.error(`Missing tool: ${tool}`);
      }
      reporter.error(`[!!!] Missing dependencies: ${missing.join(", ")}`);
      return finish("missing-tools", null, missing);
    }

    ensureDir(path.dirname(outputApk));
    const workDir = fs.mkdtempSync(path.join(this.tempRoot, "apkforge-"));
    reporter.debug(`Temporary directory: ${workDir}`);

    const ctx: PhaseContext = {
      tools: report.toolPaths,
      runner: this.runner,
      reporter,
      timeoutMs: this.config.build.commandTimeoutSec * 1000,
      alignment: this.config.build.alignment,
    };
    const total = options.install ? 4 : 3;
    let current: PhaseName = "rebuild";

    const record = (step: number, result: PhaseResult): boolean => {
      phases.push(result);
      const title = result.phase === "verify" ? PHASE_TITLES.sign : PHASE_TITLES[result.phase];
      reporter.phase(step, total, title, result.ok ? "ok" : "failed", result.detail);
      return result.ok;
    };

    try {
      const unsignedApk = path.join(workDir, "unsigned.apk");
      const alignedApk = path.join(workDir, "aligned.apk");

      reporter.section(`PHASE 1: ${PHASE_TITLES.rebuild}`);
      const targetSdk = detectTargetSdk(inputDir);
      if (targetSdk) {
        reporter.debug(`targetSdkVersion ${targetSdk.version} (from ${targetSdk.source})`);
      } else {
        reporter.debug("targetSdkVersion not found; building without AAPT2 flag");
      }
      const useAapt2 = options.forceAapt2 ?? shouldUseAapt2(targetSdk, this.config.build.aapt2MinSdk);
      if (!record(1, rebuildApk(ctx, inputDir, unsignedApk, useAapt2))) {
        reporter.error("Failed rebuild");
        return finish("phase-failed", "rebuild");
      }

      current = "align";
      reporter.section(`PHASE 2: ${PHASE_TITLES.align}`);
      if (!record(2, alignApk(ctx, unsignedApk, alignedApk))) {
        reporter.error("Failed alignment");
        return finish("phase-failed", "align");
      }

      current = "sign";
      reporter.section(`PHASE 3: ${PHASE_TITLES.sign}`);
      const identity = resolveSigningIdentity(this.config, options.signing);
      const keystorePath = this.resolveKeystore(options.keystorePath, report, identity, ctx.timeoutMs);
      if (!keystorePath) {
        record(3, { phase: "sign", ok: false, detail: "no keystore" });
        reporter.error("Failed signature");
        return finish("phase-failed", "sign");
      }

      if (!record(3, signApk(ctx, alignedApk, outputApk, keystorePath, identity))) {
        reporter.error("Failed signature");
        return finish("phase-failed", "sign");
      }

      current = "verify";
      reporter.info("Verifying signature...");
      if (!record(3, verifySignature(ctx, outputApk))) {
        reporter.error(`Failed signature verification; unverified APK left at ${outputApk}`);
        return finish("phase-failed", "verify");
      }

      if (options.install) {
        current = "install";
        reporter.section(`PHASE 4: ${PHASE_TITLES.install}`);
        const outcome = installApk(ctx, outputApk, options.deviceSerial);
        installedDevices.push(...outcome.devices);
        if (!record(4, outcome.result)) {
          reporter.warn(`Installation failed, but APK generated: ${outputApk}`);
          return finish("install-failed", "install");
        }
      }

      reporter.success("PROCESS SUCCESSFULLY COMPLETED!");
      reporter.success(`Final APK: ${outputApk}`);
      return finish("success");
    } catch (error) {
      reporter.error(`CRITICAL ERROR: ${(error as Error).message}`);
      return finish("phase-failed", current);
    } finally {
      this.cleanup(workDir, options.keepTemp);
    }
  }

  private resolveKeystore(
    explicitPath: string | null,
    report: ToolchainReport,
    identity: SigningIdentity,
    timeoutMs: number,
  ): string | null {
    try {
      const keystore = provisionKeystore({
        explicitPath,
        keytool: report.toolPaths.keytool ?? "keytool",
        signing: this.config.signing,
        identity,
        runner: this.runner,
        timeoutMs,
        debugKeystorePath: this.debugKeystorePath,
        logger: (line) => this.reporter.info(line),
        debug: (line) => this.reporter.debug(line),
      });
      this.reporter.info(`Using keystore: ${path.basename(keystore.path)} (${keystore.origin})`);
      return keystore.path;
    } catch (error) {
      this.reporter.error((error as Error).message);
      return null;
    }
  }

  private cleanup(workDir: string, keep: boolean): void {
    if (keep) {
      this.reporter.info(`Intermediate files kept in ${workDir}`);
      return;
    }
    try {
      fs.rmSync(workDir, { recursive: true, force: true });
      this.reporter.debug(`Temporary directory deleted: ${workDir}`);
    } catch (error) {
      this.reporter.error(`Error clearing temporary directory: ${(error as Error).message}`);
    }
  }
}

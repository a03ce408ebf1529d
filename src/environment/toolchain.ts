import fs from "node:fs";
import path from "node:path";

import { REQUIRED_TOOLS, type ApkForgeConfig, type ToolName, type ToolPaths } from "../types";

export type ToolSource = "config" | "sdk" | "java-home" | "path";

export interface ToolchainReport {
  sdkRoot: string | null;
  toolPaths: ToolPaths;
  sources: Partial<Record<ToolName, ToolSource>>;
  missing: ToolName[];
  notes: string[];
}

function canExecute(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function firstExecutable(candidates: string[]): string | null {
  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const resolved = path.resolve(candidate);
    if (canExecute(resolved)) {
      return resolved;
    }
  }
  return null;
}

export function findInPath(binName: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const entries = (env.PATH ?? "")
    .split(path.delimiter)
    .map((v) => v.trim())
    .filter(Boolean);
  return firstExecutable(entries.map((entry) => path.join(entry, binName)));
}

/** Orders `34.0.0-rc1` below `34.0.0`, which is below `34.0.1`. */
export function compareVersionDirs(a: string, b: string): number {
  const [releaseA, ...preA] = a.split("-");
  const [releaseB, ...preB] = b.split("-");
  const pa = releaseA.split(".").map((part) => Number.parseInt(part, 10));
  const pb = releaseB.split(".").map((part) => Number.parseInt(part, 10));
  const length = Math.max(pa.length, pb.length);
  for (let i = 0; i < length; i += 1) {
    const x = Number.isFinite(pa[i]) ? pa[i] : -1;
    const y = Number.isFinite(pb[i]) ? pb[i] : -1;
    if (x !== y) {
      return x - y;
    }
  }
  const suffixA = preA.join("-");
  const suffixB = preB.join("-");
  if (!suffixA || !suffixB) {
    return Number(!suffixA) - Number(!suffixB);
  }
  return suffixA.localeCompare(suffixB, undefined, { numeric: true });
}

/** build-tools directories, newest first. */
export function listBuildToolsDirs(sdkRoot: string): string[] {
  const root = path.join(sdkRoot, "build-tools");
  if (!fs.existsSync(root)) {
    return [];
  }
  return fs
    .readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((a, b) => compareVersionDirs(b, a))
    .map((name) => path.join(root, name));
}

export function resolveSdkRoot(config: ApkForgeConfig, env: NodeJS.ProcessEnv = process.env): string | null {
  const candidates = [
    config.androidSdkRoot,
    env.ANDROID_SDK_ROOT?.trim() ?? "",
    env.ANDROID_HOME?.trim() ?? "",
  ].filter(Boolean);
  for (const candidate of candidates) {
    const resolved = path.resolve(candidate);
    if (fs.existsSync(resolved)) {
      return resolved;
    }
  }
  return null;
}

function sdkCandidates(tool: ToolName, sdkRoot: string | null): string[] {
  if (!sdkRoot) {
    return [];
  }
  if (tool === "adb") {
    return [path.join(sdkRoot, "platform-tools", "adb")];
  }
  if (tool === "zipalign" || tool === "apksigner") {
    return listBuildToolsDirs(sdkRoot).map((dir) => path.join(dir, tool));
  }
  return [];
}

/**
 * Resolve every required binary. A configured override wins; when it is not
 * executable the tool is reported missing rather than silently replaced.
 */
export function locateToolchain(config: ApkForgeConfig, env: NodeJS.ProcessEnv = process.env): ToolchainReport {
  const sdkRoot = resolveSdkRoot(config, env);
  const toolPaths: ToolPaths = {
    apktool: null,
    zipalign: null,
    apksigner: null,
    adb: null,
    keytool: null,
  };
  const sources: Partial<Record<ToolName, ToolSource>> = {};
  const notes: string[] = [];

  for (const tool of REQUIRED_TOOLS) {
    const override = config.tools[tool];
    if (override) {
      const resolved = firstExecutable([override]);
      if (resolved) {
        toolPaths[tool] = resolved;
        sources[tool] = "config";
      } else {
        notes.push(`Configured ${tool} path is not executable: ${override}`);
      }
      continue;
    }

    const fromSdk = firstExecutable(sdkCandidates(tool, sdkRoot));
    if (fromSdk) {
      toolPaths[tool] = fromSdk;
      sources[tool] = "sdk";
      continue;
    }

    const javaHome = env.JAVA_HOME?.trim();
    if (tool === "keytool" && javaHome) {
      const fromJava = firstExecutable([path.join(javaHome, "bin", "keytool")]);
      if (fromJava) {
        toolPaths[tool] = fromJava;
        sources[tool] = "java-home";
        continue;
      }
    }

    const fromPath = findInPath(tool, env);
    if (fromPath) {
      toolPaths[tool] = fromPath;
      sources[tool] = "path";
    }
  }

  return {
    sdkRoot,
    toolPaths,
    sources,
    missing: REQUIRED_TOOLS.filter((tool) => !toolPaths[tool]),
    notes,
  };
}

/** Tools a run needs; adb only matters when installing. */
export function requiredToolsFor(install: boolean): ToolName[] {
  return REQUIRED_TOOLS.filter((tool) => install || tool !== "adb");
}

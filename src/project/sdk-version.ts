import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";

export const MANIFEST_FILE = "AndroidManifest.xml";
export const APKTOOL_META_FILE = "apktool.yml";

export interface TargetSdkInfo {
  version: number;
  source: "manifest" | "apktool.yml";
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseSdkNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

function readText(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch {
    return null;
  }
}

export function parseManifestTargetSdk(manifest: string): number | null {
  const match = manifest.match(/targetSdkVersion\s*=\s*"(\d+)"/);
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

export function parseApktoolTargetSdk(source: string): number | null {
  // Older apktool releases write a `!!brut.androlib.meta.MetaInfo` type tag first.
  const body = source.replace(/^!!\S+\s*\n/, "");
  let doc: unknown;
  try {
    doc = yaml.load(body);
  } catch {
    return null;
  }
  if (!isObject(doc) || !isObject(doc.sdkInfo)) {
    return null;
  }
  return parseSdkNumber(doc.sdkInfo.targetSdkVersion);
}

/**
 * Decoded manifests usually lose `<uses-sdk>`, so apktool.yml is consulted when
 * the manifest has no targetSdkVersion. Returns null when neither yields one.
 */
export function detectTargetSdk(projectDir: string): TargetSdkInfo | null {
  const manifest = readText(path.join(projectDir, MANIFEST_FILE));
  if (manifest !== null) {
    const version = parseManifestTargetSdk(manifest);
    if (version !== null) {
      return { version, source: "manifest" };
    }
  }

  const meta = readText(path.join(projectDir, APKTOOL_META_FILE));
  if (meta !== null) {
    const version = parseApktoolTargetSdk(meta);
    if (version !== null) {
      return { version, source: "apktool.yml" };
    }
  }

  return null;
}

export function shouldUseAapt2(info: TargetSdkInfo | null, minSdk: number): boolean {
  return info !== null && info.version >= minSdk;
}

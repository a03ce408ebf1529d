import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { ApkForgeConfig, SigningIdentity } from "../types";
import { defaultConfigPath, ensureDir, resolvePath } from "../utils/paths";

export const DEFAULT_KEY_ALIAS = "androiddebugkey";
export const DEFAULT_KEYSTORE_PASSWORD = "android";

function defaultConfigObject() {
  return {
    tools: {
      apktool: "",
      zipalign: "",
      apksigner: "",
      adb: "",
      keytool: "",
    },
    androidSdkRoot: process.env.ANDROID_SDK_ROOT ?? "",
    signing: {
      keyAlias: DEFAULT_KEY_ALIAS,
      storePassword: DEFAULT_KEYSTORE_PASSWORD,
      keyPassword: DEFAULT_KEYSTORE_PASSWORD,
      distinguishedName: "CN=Android Debug,O=Android,C=US",
      keyAlgorithm: "RSA",
      keySize: 2048,
      validityDays: 10000,
      generatedKeystorePath: path.join(os.tmpdir(), "apkforge.keystore"),
    },
    build: {
      aapt2MinSdk: 34,
      alignment: 4,
      commandTimeoutSec: 120,
    },
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, incoming: unknown): Record<string, unknown> {
  if (!isObject(incoming)) {
    return base;
  }
  const output: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(incoming)) {
    const existing = output[key];
    if (isObject(existing) && isObject(value)) {
      output[key] = deepMerge(existing, value);
    } else {
      output[key] = value;
    }
  }
  return output;
}

function renameKeys(section: unknown, map: Record<string, string>): Record<string, unknown> {
  const out = isObject(section) ? { ...section } : {};
  for (const [oldKey, newKey] of Object.entries(map)) {
    if (oldKey in out && !(newKey in out)) {
      out[newKey] = out[oldKey];
    }
  }
  return out;
}

function normalizeLegacyKeys(input: Record<string, unknown>): Record<string, unknown> {
  const raw = renameKeys(input, { android_sdk_root: "androidSdkRoot" });

  if (isObject(raw.signing)) {
    raw.signing = renameKeys(raw.signing, {
      key_alias: "keyAlias",
      store_password: "storePassword",
      key_password: "keyPassword",
      distinguished_name: "distinguishedName",
      key_algorithm: "keyAlgorithm",
      key_size: "keySize",
      validity_days: "validityDays",
      generated_keystore_path: "generatedKeystorePath",
    });
  }

  if (isObject(raw.build)) {
    raw.build = renameKeys(raw.build, {
      aapt2_min_sdk: "aapt2MinSdk",
      command_timeout_sec: "commandTimeoutSec",
    });
  }

  return raw;
}

function section(merged: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = merged[key];
  return isObject(value) ? value : {};
}

function toInt(value: unknown, fallback: number, min: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(min, Math.round(parsed));
}

function toTrimmed(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function envOverride(name: string, fallback: string): string {
  const value = process.env[name];
  return value !== undefined && value !== "" ? value : fallback;
}

export function normalizeConfig(raw: Record<string, unknown>, configPath: string): ApkForgeConfig {
  const defaults = defaultConfigObject();
  const merged = deepMerge(defaults, normalizeLegacyKeys(raw));
  const tools = section(merged, "tools");
  const signing = section(merged, "signing");
  const build = section(merged, "build");

  const sdkRoot = toTrimmed(merged.androidSdkRoot);
  const generatedKeystore = toTrimmed(signing.generatedKeystorePath) || defaults.signing.generatedKeystorePath;

  return {
    tools: {
      apktool: toTrimmed(tools.apktool),
      zipalign: toTrimmed(tools.zipalign),
      apksigner: toTrimmed(tools.apksigner),
      adb: toTrimmed(tools.adb),
      keytool: toTrimmed(tools.keytool),
    },
    androidSdkRoot: sdkRoot ? resolvePath(sdkRoot) : "",
    signing: {
      keyAlias: envOverride("APKFORGE_KEY_ALIAS", String(signing.keyAlias ?? DEFAULT_KEY_ALIAS)),
      storePassword: envOverride(
        "APKFORGE_STORE_PASSWORD",
        String(signing.storePassword ?? DEFAULT_KEYSTORE_PASSWORD),
      ),
      keyPassword: envOverride("APKFORGE_KEY_PASSWORD", String(signing.keyPassword ?? DEFAULT_KEYSTORE_PASSWORD)),
      distinguishedName: String(signing.distinguishedName ?? defaults.signing.distinguishedName),
      keyAlgorithm: String(signing.keyAlgorithm ?? defaults.signing.keyAlgorithm),
      keySize: toInt(signing.keySize, defaults.signing.keySize, 512),
      validityDays: toInt(signing.validityDays, defaults.signing.validityDays, 1),
      generatedKeystorePath: resolvePath(generatedKeystore),
    },
    build: {
      aapt2MinSdk: toInt(build.aapt2MinSdk, defaults.build.aapt2MinSdk, 1),
      alignment: toInt(build.alignment, defaults.build.alignment, 1),
      commandTimeoutSec: toInt(build.commandTimeoutSec, defaults.build.commandTimeoutSec, 1),
    },
    configPath,
  };
}

export function loadConfig(configPath?: string): ApkForgeConfig {
  const finalPath = configPath ? resolvePath(configPath) : defaultConfigPath();
  ensureDir(path.dirname(finalPath));

  if (!fs.existsSync(finalPath)) {
    fs.writeFileSync(finalPath, `${JSON.stringify(defaultConfigObject(), null, 2)}\n`, "utf-8");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(finalPath, "utf-8"));
  } catch (error) {
    throw new Error(`Invalid config file ${finalPath}: ${(error as Error).message}`);
  }
  if (!isObject(raw)) {
    throw new Error(`Invalid config file ${finalPath}: expected a JSON object.`);
  }
  return normalizeConfig(raw, finalPath);
}

/**
 * CLI flags win over env vars, which win over the config file. A `--ks-pass`
 * without `--key-pass` also sets the key password, but only while that is
 * still the built-in default.
 */
export function resolveSigningIdentity(
  config: ApkForgeConfig,
  overrides: Partial<SigningIdentity> = {},
): SigningIdentity {
  const keyPasswordIsDefault = config.signing.keyPassword === DEFAULT_KEYSTORE_PASSWORD;
  return {
    keyAlias: overrides.keyAlias?.trim() || config.signing.keyAlias,
    storePassword: overrides.storePassword || config.signing.storePassword,
    keyPassword:
      overrides.keyPassword ||
      (keyPasswordIsDefault ? overrides.storePassword : undefined) ||
      config.signing.keyPassword,
  };
}

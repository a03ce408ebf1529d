import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export function apkforgeHome(): string {
  const value = process.env.APKFORGE_HOME?.trim();
  if (value) {
    return path.resolve(value);
  }
  return path.resolve(path.join(os.homedir(), ".apkforge"));
}

export function defaultConfigPath(): string {
  return path.join(apkforgeHome(), "config.json");
}

export function androidUserHome(): string {
  const value = process.env.ANDROID_USER_HOME?.trim();
  if (value) {
    return path.resolve(value);
  }
  return path.join(os.homedir(), ".android");
}

export function defaultDebugKeystorePath(): string {
  return path.join(androidUserHome(), "debug.keystore");
}

export function ensureDir(dirPath: string): string {
  fs.mkdirSync(dirPath, { recursive: true });
  return dirPath;
}

export function resolvePath(value: string): string {
  if (value.startsWith("~")) {
    return path.resolve(path.join(os.homedir(), value.slice(1)));
  }
  return path.resolve(value);
}

export function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

import fs from "node:fs";
import path from "node:path";

import { normalizeConfig } from "../config";
import type { ToolchainReport } from "../environment/toolchain";
import type { ApkForgeConfig, ToolName, ToolPaths } from "../types";
import type { CommandRunner, RunResult } from "../utils/process";

export interface RecordedCall {
  tool: string;
  args: string[];
}

export interface FakeRunner {
  runner: CommandRunner;
  calls: RecordedCall[];
  /** Calls as `tool arg0` keys, e.g. `apktool b`, `zipalign -c`. */
  keys: () => string[];
}

export type FakeResponse = Partial<RunResult> & { skipOutput?: boolean };

const ADB_DEVICES = "List of devices attached\nemulator-5554\tdevice\n";

function okResult(stdout = ""): RunResult {
  return { ok: true, status: 0, stdout, stderr: "", error: null, timedOut: false };
}

function valueAfter(args: string[], flag: string): string | null {
  const index = args.indexOf(flag);
  return index >= 0 && index + 1 < args.length ? args[index + 1] : null;
}

function producedFile(tool: string, args: string[]): string | null {
  if (tool === "apktool") {
    return valueAfter(args, "-o");
  }
  if (tool === "zipalign" && args[0] === "-v") {
    return args[args.length - 1] ?? null;
  }
  if (tool === "apksigner" && args[0] === "sign") {
    return valueAfter(args, "--out");
  }
  if (tool === "keytool") {
    return valueAfter(args, "-keystore");
  }
  return null;
}

/**
 * Stand-in for the Android tools: every call succeeds and writes the file the
 * real tool would produce unless `responses` overrides the `tool arg0` key.
 * A key maps to one response, or to a list consumed one call at a time.
 */
export function createFakeRunner(
  responses: Record<string, FakeResponse | FakeResponse[]> = {},
  adbDevicesOutput = ADB_DEVICES,
): FakeRunner {
  const calls: RecordedCall[] = [];
  const queues = new Map<string, FakeResponse[]>();
  for (const [key, value] of Object.entries(responses)) {
    queues.set(key, Array.isArray(value) ? [...value] : [value]);
  }

  const runner: CommandRunner = (cmd, args) => {
    const tool = path.basename(cmd);
    calls.push({ tool, args: [...args] });
    const key = `${tool} ${args[0] ?? ""}`.trim();

    const queue = queues.get(key);
    const override = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    const base = okResult(tool === "adb" && args[0] === "devices" ? adbDevicesOutput : "");
    const result: RunResult = { ...base, ...override };
    if (override && override.ok === false && override.status === undefined) {
      result.status = 1;
    }

    const produced = producedFile(tool, args);
    if (result.ok && produced && !override?.skipOutput) {
      fs.mkdirSync(path.dirname(produced), { recursive: true });
      fs.writeFileSync(produced, `${key}\n`);
    }
    return result;
  };

  return {
    runner,
    calls,
    keys: () => calls.map((call) => `${call.tool} ${call.args[0] ?? ""}`.trim()),
  };
}

export function fakeToolchain(missing: ToolName[] = []): ToolchainReport {
  const toolPaths: ToolPaths = {
    apktool: "/opt/android/bin/apktool",
    zipalign: "/opt/android/build-tools/34.0.0/zipalign",
    apksigner: "/opt/android/build-tools/34.0.0/apksigner",
    adb: "/opt/android/platform-tools/adb",
    keytool: "/opt/java/bin/keytool",
  };
  for (const tool of missing) {
    toolPaths[tool] = null;
  }
  return { sdkRoot: "/opt/android", toolPaths, sources: {}, missing, notes: [] };
}

export function makeTestConfig(workDir: string, raw: Record<string, unknown> = {}): ApkForgeConfig {
  return normalizeConfig(
    {
      ...raw,
      signing: {
        generatedKeystorePath: path.join(workDir, "generated.keystore"),
        ...(typeof raw.signing === "object" && raw.signing !== null ? raw.signing : {}),
      },
    },
    path.join(workDir, "config.json"),
  );
}

export function writeProject(dir: string, manifest: string | null, apktoolYml?: string): string {
  fs.mkdirSync(dir, { recursive: true });
  if (manifest !== null) {
    fs.writeFileSync(path.join(dir, "AndroidManifest.xml"), manifest, "utf-8");
  }
  if (apktoolYml !== undefined) {
    fs.writeFileSync(path.join(dir, "apktool.yml"), apktoolYml, "utf-8");
  }
  return dir;
}

export function manifestWithTargetSdk(version: number | null): string {
  const usesSdk = version === null ? "" : `\n  <uses-sdk android:minSdkVersion="21" android:targetSdkVersion="${version}"/>`;
  return `<?xml version="1.0" encoding="utf-8" standalone="no"?>
<manifest xmlns:android="http://schemas.android.com/apk/res/android" package="com.example.demo">${usesSdk}
  <application android:label="Demo"/>
</manifest>
`;
}

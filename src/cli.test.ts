import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { main, parseCliArgs } from "./cli";
import { createFakeRunner, fakeToolchain, manifestWithTargetSdk, writeProject } from "./testing/fake-toolchain";
import { APKFORGE_VERSION } from "./utils/cli-theme";

describe("parseCliArgs", () => {
  it("parses the short form", () => {
    const args = parseCliArgs(["-i", "./my_app", "-o", "out/final.apk"]);

    expect(args.verbose).toBe(false);
    expect(args.configPath).toBeNull();
    expect(args.options).toEqual({
      inputDir: path.resolve("./my_app"),
      outputApk: path.resolve("out/final.apk"),
      install: false,
      deviceSerial: null,
      keystorePath: null,
      signing: { keyAlias: undefined, storePassword: undefined, keyPassword: undefined },
      forceAapt2: null,
      keepTemp: false,
    });
  });

  it("parses long options and flags", () => {
    const args = parseCliArgs([
      "--input",
      "app",
      "--output",
      "app.apk",
      "--install",
      "-v",
      "--keystore",
      "release.jks",
      "--ks-alias",
      "upload",
      "--ks-pass",
      "test-secret",
      "--no-aapt2",
      "--keep-temp",
      "--config",
      "forge.json",
    ]);

    expect(args.verbose).toBe(true);
    expect(args.configPath).toBe("forge.json");
    expect(args.options?.install).toBe(true);
    expect(args.options?.keystorePath).toBe("release.jks");
    expect(args.options?.signing).toEqual({ keyAlias: "upload", storePassword: "test-secret", keyPassword: undefined });
    expect(args.options?.forceAapt2).toBe(false);
    expect(args.options?.keepTemp).toBe(true);
  });

  it("treats --device as a request to install", () => {
    const args = parseCliArgs(["-i", "app", "-o", "app.apk", "--device", "emulator-5556"]);
    expect(args.options?.install).toBe(true);
    expect(args.options?.deviceSerial).toBe("emulator-5556");
  });

  it("short-circuits on --help and --version", () => {
    expect(parseCliArgs(["--version"])).toEqual({
      help: false,
      version: true,
      verbose: false,
      configPath: null,
      options: null,
    });
    expect(parseCliArgs(["-i", "app", "-h"]).help).toBe(true);
  });

  it("rejects bad invocations", () => {
    expect(() => parseCliArgs(["-i", "app"])).toThrow("Both --input and --output are required.");
    expect(() => parseCliArgs(["-i", "app", "-o", "a.apk", "--bogus"])).toThrow("Unexpected arguments: --bogus");
    expect(() => parseCliArgs(["-i", "app", "-o"])).toThrow("Option -o requires a value.");
    expect(() => parseCliArgs(["-i", "app", "-o", "a.apk", "--aapt2", "--no-aapt2"])).toThrow(
      "--aapt2 and --no-aapt2 cannot be combined.",
    );
  });
});

describe("main", () => {
  let root: string;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "apkforge-cli-"));
    out = [];
    err = [];
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const sinks = () => ({ out: (line: string) => out.push(line), err: (line: string) => err.push(line), useColor: false });

  it("prints the version", async () => {
    await expect(main(["--version"], sinks())).resolves.toBe(0);
    expect(out).toEqual([`apkforge ${APKFORGE_VERSION}`]);
  });

  it("exits non-zero for a missing input directory without loading config", async () => {
    const missing = path.join(root, "missing");
    const configPath = path.join(root, "config.json");

    await expect(main(["-i", missing, "-o", path.join(root, "a.apk"), "--config", configPath], sinks())).resolves.toBe(1);
    expect(err).toEqual([`[ERROR] Directory not found: ${missing}`]);
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it("returns 0 after a full run", async () => {
    const input = writeProject(path.join(root, "app"), manifestWithTargetSdk(34));
    const output = path.join(root, "dist", "final.apk");
    const fake = createFakeRunner();
    const tempRoot = path.join(root, "tmp");
    fs.mkdirSync(tempRoot);
    fs.writeFileSync(
      path.join(root, "config.json"),
      JSON.stringify({ signing: { generatedKeystorePath: path.join(root, "gen.keystore") } }),
    );

    const code = await main(["-i", input, "-o", output, "--config", path.join(root, "config.json")], {
      ...sinks(),
      runner: fake.runner,
      locateTools: () => fakeToolchain(),
      debugKeystorePath: path.join(root, "none", "debug.keystore"),
      tempRoot,
    });

    expect(code).toBe(0);
    expect(fs.existsSync(output)).toBe(true);
    expect(fake.keys()[0]).toBe("apktool b");
  });

  it("returns 1 when a tool is missing", async () => {
    const input = writeProject(path.join(root, "app"), manifestWithTargetSdk(34));
    const fake = createFakeRunner();

    const code = await main(["-i", input, "-o", path.join(root, "a.apk"), "--config", path.join(root, "config.json")], {
      ...sinks(),
      runner: fake.runner,
      locateTools: () => fakeToolchain(["apktool"]),
    });

    expect(code).toBe(1);
    expect(fake.calls).toHaveLength(0);
  });

  it("propagates usage errors", async () => {
    await expect(main(["-i", "app", "-o", "a.apk", "--bogus"], sinks())).rejects.toThrow("Unexpected arguments: --bogus");
  });
});

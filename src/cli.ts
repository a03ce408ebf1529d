#!/usr/bin/env node

import path from "node:path";

import { loadConfig } from "./config";
import { ReforgePipeline, type ReforgePipelineDeps } from "./pipeline/reforge";
import type { ReforgeOptions } from "./types";
import { APKFORGE_VERSION, createCliTheme } from "./utils/cli-theme";
import { isDirectory } from "./utils/paths";
import { Reporter } from "./utils/reporter";

export interface CliArgs {
  help: boolean;
  version: boolean;
  verbose: boolean;
  configPath: string | null;
  options: ReforgeOptions | null;
}

export type CliDeps = Pick<ReforgePipelineDeps, "runner" | "locateTools" | "debugKeystorePath" | "tempRoot"> & {
  out?: (line: string) => void;
  err?: (line: string) => void;
  useColor?: boolean;
};

function helpText(): string {
  return `apkforge ${APKFORGE_VERSION} - rebuild, align, sign and install decompiled APKs

Usage:
  apkforge -i <dir> -o <apk> [options]
  apkforge --version

Options:
  -i, --input <dir>       Directory with the decompiled APK (apktool output)
  -o, --output <apk>      Path of the final signed APK
  --install               Install on every connected device after building
  --device <serial>       Install only on this device (implies --install)
  --keystore <path>       Custom keystore (default: ~/.android/debug.keystore)
  --ks-alias <alias>      Key alias (default: androiddebugkey)
  --ks-pass <password>    Keystore password (default: android)
  --key-pass <password>   Key password (default: keystore password)
  --aapt2 | --no-aapt2    Force or suppress apktool --use-aapt2
  --keep-temp             Keep the intermediate unsigned/aligned APKs
  --config <path>         Config file (default: ~/.apkforge/config.json)
  -v, --verbose           Show tool commands and their output
  -h, --help              Show this help

Examples:
  apkforge -i ./my_app/ -o final_app.apk
  apkforge -i ./my_app/ -o final_app.apk --install -v
  apkforge -i ./my_app/ -o final_app.apk --keystore my_keystore.jks --ks-alias release
`;
}

function takeOption(args: string[], names: string[]): { value: string | null; rest: string[] } {
  const out: string[] = [];
  let value: string | null = null;

  for (let i = 0; i < args.length; i += 1) {
    if (names.includes(args[i])) {
      if (i + 1 >= args.length) {
        throw new Error(`Option ${args[i]} requires a value.`);
      }
      value = args[i + 1];
      i += 1;
      continue;
    }
    out.push(args[i]);
  }

  return { value, rest: out };
}

function takeFlag(args: string[], names: string[]): { present: boolean; rest: string[] } {
  const rest = args.filter((arg) => !names.includes(arg));
  return { present: rest.length !== args.length, rest };
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { present: help, rest: afterHelp } = takeFlag(argv, ["-h", "--help"]);
  const { present: version, rest: afterVersion } = takeFlag(afterHelp, ["--version"]);
  if (help || version) {
    return { help, version, verbose: false, configPath: null, options: null };
  }

  const { value: input, rest: afterInput } = takeOption(afterVersion, ["-i", "--input"]);
  const { value: output, rest: afterOutput } = takeOption(afterInput, ["-o", "--output"]);
  const { value: configPath, rest: afterConfig } = takeOption(afterOutput, ["--config"]);
  const { value: keystore, rest: afterKeystore } = takeOption(afterConfig, ["--keystore"]);
  const { value: device, rest: afterDevice } = takeOption(afterKeystore, ["--device"]);
  const { value: keyAlias, rest: afterAlias } = takeOption(afterDevice, ["--ks-alias"]);
  const { value: storePassword, rest: afterStorePass } = takeOption(afterAlias, ["--ks-pass"]);
  const { value: keyPassword, rest: afterKeyPass } = takeOption(afterStorePass, ["--key-pass"]);
  const { present: install, rest: afterInstall } = takeFlag(afterKeyPass, ["--install"]);
  const { present: verbose, rest: afterVerbose } = takeFlag(afterInstall, ["-v", "--verbose"]);
  const { present: aapt2, rest: afterAapt2 } = takeFlag(afterVerbose, ["--aapt2"]);
  const { present: noAapt2, rest: afterNoAapt2 } = takeFlag(afterAapt2, ["--no-aapt2"]);
  const { present: keepTemp, rest } = takeFlag(afterNoAapt2, ["--keep-temp"]);

  if (rest.length > 0) {
    throw new Error(`Unexpected arguments: ${rest.join(" ")}`);
  }
  if (aapt2 && noAapt2) {
    throw new Error("--aapt2 and --no-aapt2 cannot be combined.");
  }
  if (!input || !output || !input.trim() || !output.trim()) {
    throw new Error("Both --input and --output are required. Run `apkforge --help` for usage.");
  }

  return {
    help: false,
    version: false,
    verbose,
    configPath: configPath?.trim() || null,
    options: {
      inputDir: path.resolve(input.trim()),
      outputApk: path.resolve(output.trim()),
      install: install || Boolean(device?.trim()),
      deviceSerial: device?.trim() || null,
      keystorePath: keystore?.trim() || null,
      signing: {
        keyAlias: keyAlias ?? undefined,
        storePassword: storePassword ?? undefined,
        keyPassword: keyPassword ?? undefined,
      },
      forceAapt2: aapt2 ? true : noAapt2 ? false : null,
      keepTemp,
    },
  };
}

export async function main(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<number> {
  // eslint-disable-next-line no-console
  const out = deps.out ?? ((line: string) => console.log(line));
  // eslint-disable-next-line no-console
  const err = deps.err ?? ((line: string) => console.error(line));

  if (argv.length === 0) {
    out(helpText());
    return 1;
  }

  const args = parseCliArgs(argv);
  if (args.help) {
    out(helpText());
    return 0;
  }
  if (args.version) {
    out(`apkforge ${APKFORGE_VERSION}`);
    return 0;
  }
  if (!args.options) {
    return 1;
  }

  if (!isDirectory(args.options.inputDir)) {
    const theme = createCliTheme({ useColor: deps.useColor });
    err(theme.error(`Directory not found: ${args.options.inputDir}`));
    return 1;
  }

  const config = loadConfig(args.configPath ?? undefined);
  const reporter = new Reporter({ verbose: args.verbose, useColor: deps.useColor, out, err });
  const pipeline = new ReforgePipeline({
    config,
    reporter,
    runner: deps.runner,
    locateTools: deps.locateTools,
    debugKeystorePath: deps.debugKeystorePath,
    tempRoot: deps.tempRoot,
  });

  const result = pipeline.run(args.options);
  return result.ok ? 0 : 1;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      // eslint-disable-next-line no-console
      console.error(`apkforge error: ${(error as Error).message}`);
      process.exitCode = 1;
    });
}

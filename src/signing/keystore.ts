import fs from "node:fs";
import path from "node:path";

import type { SigningConfig, SigningIdentity } from "../types";
import { defaultDebugKeystorePath, ensureDir, resolvePath } from "../utils/paths";
import { commandEcho, outputEcho, runCommand, type CommandRunner } from "../utils/process";

export type KeystoreOrigin = "supplied" | "debug" | "reused" | "generated";

export interface KeystoreResolution {
  path: string;
  origin: KeystoreOrigin;
}

export interface ProvisionKeystoreOptions {
  explicitPath?: string | null;
  keytool: string;
  signing: SigningConfig;
  identity: SigningIdentity;
  runner?: CommandRunner;
  timeoutMs?: number;
  debugKeystorePath?: string;
  logger?: (line: string) => void;
  /** Receives the keytool command echo and its output. */
  debug?: (line: string) => void;
}

export function buildKeytoolArgs(keystorePath: string, signing: SigningConfig, identity: SigningIdentity): string[] {
  return [
    "-genkey",
    "-v",
    "-keystore",
    keystorePath,
    "-alias",
    identity.keyAlias,
    "-keyalg",
    signing.keyAlgorithm,
    "-keysize",
    String(signing.keySize),
    "-validity",
    String(signing.validityDays),
    "-storepass",
    identity.storePassword,
    "-keypass",
    identity.keyPassword,
    "-dname",
    signing.distinguishedName,
  ];
}

/**
 * Pick the keystore to sign with: the supplied one, then the Android debug
 * keystore, then a keystore generated earlier by this tool. Only when none of
 * those exist is keytool run, once, to create it.
 */
export function provisionKeystore(options: ProvisionKeystoreOptions): KeystoreResolution {
  const logger = options.logger ?? (() => {});
  const debug = options.debug ?? (() => {});
  const runner = options.runner ?? runCommand;

  const explicit = options.explicitPath?.trim();
  if (explicit) {
    const supplied = resolvePath(explicit);
    if (!fs.existsSync(supplied)) {
      throw new Error(`Keystore not found: ${supplied}`);
    }
    return { path: supplied, origin: "supplied" };
  }

  const debugKeystore = options.debugKeystorePath ?? defaultDebugKeystorePath();
  if (fs.existsSync(debugKeystore)) {
    return { path: debugKeystore, origin: "debug" };
  }

  const generated = options.signing.generatedKeystorePath;
  if (fs.existsSync(generated)) {
    logger(`Reusing ${generated}; delete it if alias '${options.identity.keyAlias}' or its passwords have changed.`);
    return { path: generated, origin: "reused" };
  }

  logger(`No debug keystore at ${debugKeystore}. Creating ${generated}...`);
  ensureDir(path.dirname(generated));
  const args = buildKeytoolArgs(generated, options.signing, options.identity);
  debug(commandEcho(options.keytool, args));
  const result = runner(options.keytool, args, { timeoutMs: options.timeoutMs });
  for (const line of outputEcho(result)) {
    debug(line);
  }
  if (result.timedOut) {
    throw new Error(`Could not create keystore: keytool timed out after ${Math.round((options.timeoutMs ?? 0) / 1000)}s`);
  }
  if (!result.ok) {
    const detail = [result.stderr, result.error].filter(Boolean).join("\n").trim();
    throw new Error(`Could not create keystore (code ${result.status})${detail ? `: ${detail}` : ""}`);
  }
  if (!fs.existsSync(generated)) {
    throw new Error(`keytool reported success but ${generated} was not created.`);
  }
  return { path: generated, origin: "generated" };
}

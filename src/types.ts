export type ToolName = "apktool" | "zipalign" | "apksigner" | "adb" | "keytool";

export const REQUIRED_TOOLS: readonly ToolName[] = ["apktool", "zipalign", "apksigner", "adb", "keytool"];

export type ToolPaths = Record<ToolName, string | null>;

export interface ToolOverrides {
  apktool: string;
  zipalign: string;
  apksigner: string;
  adb: string;
  keytool: string;
}

export interface SigningIdentity {
  keyAlias: string;
  storePassword: string;
  keyPassword: string;
}

export interface SigningConfig extends SigningIdentity {
  distinguishedName: string;
  keyAlgorithm: string;
  keySize: number;
  validityDays: number;
  generatedKeystorePath: string;
}

export interface BuildConfig {
  aapt2MinSdk: number;
  alignment: number;
  commandTimeoutSec: number;
}

export interface ApkForgeConfig {
  tools: ToolOverrides;
  androidSdkRoot: string;
  signing: SigningConfig;
  build: BuildConfig;
  configPath: string;
}

export type PhaseName = "rebuild" | "align" | "sign" | "verify" | "install";

export interface PhaseResult {
  phase: PhaseName;
  ok: boolean;
  detail: string;
}

export type ReforgeStatus =
  | "success"
  | "invalid-input"
  | "missing-tools"
  | "phase-failed"
  | "install-failed";

export interface ReforgeOptions {
  inputDir: string;
  outputApk: string;
  install: boolean;
  deviceSerial: string | null;
  keystorePath: string | null;
  signing: Partial<SigningIdentity>;
  /** null lets the target SDK decide. */
  forceAapt2: boolean | null;
  keepTemp: boolean;
}

export interface ReforgeResult {
  ok: boolean;
  status: ReforgeStatus;
  outputApk: string;
  phases: PhaseResult[];
  failedPhase: PhaseName | null;
  missingTools: ToolName[];
  installedDevices: string[];
}

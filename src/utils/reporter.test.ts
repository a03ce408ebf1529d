import { createCliTheme } from "./cli-theme";
import { Reporter } from "./reporter";

describe("Reporter", () => {
  it("routes lines by severity and hides debug unless verbose", () => {
    const out: string[] = [];
    const err: string[] = [];
    const reporter = new Reporter({ useColor: false, out: (l) => out.push(l), err: (l) => err.push(l) });

    reporter.info("Searching for devices...");
    reporter.warn("Retrying build once...");
    reporter.debug("$ apktool b");
    reporter.phase(2, 3, "Aligning APK", "failed", "zipalign exited non-zero");

    expect(out).toEqual(["[INFO] Searching for devices..."]);
    expect(err).toEqual([
      "[WARN] Retrying build once...",
      "[2/3] Aligning APK -> FAIL zipalign exited non-zero",
    ]);
  });

  it("prints each debug line separately in verbose mode", () => {
    const out: string[] = [];
    const reporter = new Reporter({ verbose: true, useColor: false, out: (l) => out.push(l), err: () => {} });
    reporter.debug("STDOUT:\nVerifying alignment");
    expect(out).toEqual(["[DEBUG] STDOUT:", "[DEBUG] Verifying alignment"]);
  });
});

describe("createCliTheme", () => {
  it("wraps tones in ANSI codes when color is on", () => {
    const theme = createCliTheme({ useColor: true });
    expect(theme.success("done")).toBe("\u001b[1;32m[OK]\u001b[0m done");
    expect(theme.kv("INPUT", "/work/app")).toBe("  \u001b[2mINPUT     :\u001b[0m /work/app");
  });
});

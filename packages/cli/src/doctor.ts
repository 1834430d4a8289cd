import { reportHasErrors, runDiagnostics } from "@ferry/core";
import { renderHealthReport } from "@ferry/tui";
import type { CliContext } from "./context.js";
import { createProbes } from "./doctor-menu.js";
import { print, readFlag } from "./runtime-common.js";

/** Read-only report; exit code 1 when any finding is an error. */
export async function runDoctorReport(context: CliContext, options: { benchmark: boolean }): Promise<number> {
  const report = await runDiagnostics(createProbes(context), { benchmark: options.benchmark });
  for (const entry of renderHealthReport(report)) {
    print(entry);
  }
  return reportHasErrors(report) ? 1 : 0;
}

export async function runDoctorCommand(context: CliContext, args: string[]): Promise<number> {
  const benchmark = readFlag(args, "--benchmark");
  if (readFlag(args, "--auto") || !process.stdin.isTTY || !process.stdout.isTTY) {
    const code = await runDoctorReport(context, { benchmark });
    if (!readFlag(args, "--auto")) {
      print("Not a terminal; printed the unattended report. Run `ferry doctor` in a terminal for the menu.");
    }
    return code;
  }
  const { runDoctorInk } = await import("./doctor-ink.js");
  return await runDoctorInk(context);
}

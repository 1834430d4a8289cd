import fs from "node:fs";
import type { UnitId } from "@ferry/core";
import type { CliContext } from "./context.js";
import { parseUnitSelection, positionalArgs, print, printError, readOption, unitsFor } from "./runtime-common.js";

const DEFAULT_TAIL_LINES = 20;

export function tailLines(text: string, count: number): string[] {
  const lines = text.replace(/\n$/, "").split("\n");
  return text.length === 0 ? [] : lines.slice(Math.max(0, lines.length - count));
}

function printFileTail(label: string, filePath: string, count: number): void {
  print(`=== ${label} (${filePath}) ===`);
  if (!fs.existsSync(filePath)) {
    print("No logs found");
    return;
  }
  for (const entry of tailLines(fs.readFileSync(filePath, "utf8"), count)) {
    print(entry);
  }
}

async function printUnitLogs(context: CliContext, unit: UnitId, count: number): Promise<boolean> {
  const managed = context.supervisor.getUnit(unit);
  if (managed.logPath) {
    printFileTail(managed.label, managed.logPath, count);
    return true;
  }
  print(`=== ${managed.label} ===`);
  try {
    const result = await context.containerRuntime.logs(count);
    if (result.code !== 0) {
      print(`compose logs exited with code ${result.code}: ${result.stderr.trim()}`);
      return false;
    }
    for (const entry of tailLines(result.stdout, count)) {
      print(entry);
    }
    return true;
  } catch (error) {
    print(`Worker logs unavailable: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

export async function runLogsCommand(context: CliContext, args: string[]): Promise<number> {
  const [unitArg] = positionalArgs(args, ["--lines"]);
  const selection = parseUnitSelection(unitArg);
  if (!selection) {
    printError("Usage: ferry logs [daemon|gateway|worker|all] [--lines N]");
    return 1;
  }
  const rawLines = readOption(args, "--lines");
  const count = rawLines === undefined ? DEFAULT_TAIL_LINES : Number.parseInt(rawLines, 10);
  if (!Number.isInteger(count) || count <= 0) {
    printError(`Invalid --lines value: ${rawLines ?? ""}`);
    return 1;
  }

  let ok = true;
  for (const unit of unitsFor(selection)) {
    ok = (await printUnitLogs(context, unit, count)) && ok;
  }
  return ok ? 0 : 1;
}

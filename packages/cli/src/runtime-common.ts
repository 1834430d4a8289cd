import fs from "node:fs";
import path from "node:path";
import { UNIT_IDS, type GatewayRecord, type UnitId } from "@ferry/core";
import { line } from "@ferry/tui";

export function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

export function printError(text: string): void {
  process.stderr.write(`${text}\n`);
}

/** Log sink for long-running modes: every line carries the `[ferry]` prefix. */
export function log(text: string): void {
  print(line(text));
}

export type UnitSelection = "default" | "all" | UnitId;

/** Parses the optional unit argument of start/stop/restart/logs. */
export function parseUnitSelection(value: string | undefined): UnitSelection | null {
  if (value === undefined) {
    return "default";
  }
  if (value === "all") {
    return "all";
  }
  return UNIT_IDS.find((unit) => unit === value) ?? null;
}

/** Units a bare command acts on: the daemon and the gateway. */
export const DEFAULT_UNITS: readonly UnitId[] = ["daemon", "gateway"];

export function unitsFor(selection: UnitSelection): readonly UnitId[] {
  if (selection === "default") {
    return DEFAULT_UNITS;
  }
  if (selection === "all") {
    return UNIT_IDS;
  }
  return [selection];
}

export function readFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function readOption(args: string[], name: string): string | undefined {
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === name) {
      return args[index + 1];
    }
    if (token?.startsWith(`${name}=`)) {
      return token.slice(name.length + 1);
    }
  }
  return undefined;
}

export function positionalArgs(args: string[], optionsWithValues: readonly string[] = []): string[] {
  const positional: string[] = [];
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === undefined) {
      continue;
    }
    if (optionsWithValues.includes(token)) {
      index += 1;
      continue;
    }
    if (!token.startsWith("--")) {
      positional.push(token);
    }
  }
  return positional;
}

export function writeGatewayRecord(recordPath: string, record: GatewayRecord): void {
  fs.mkdirSync(path.dirname(recordPath), { recursive: true });
  const tempPath = `${recordPath}.tmp`;
  fs.writeFileSync(tempPath, `${JSON.stringify(record, null, 2)}\n`, "utf8");
  fs.renameSync(tempPath, recordPath);
}

/** Removes the record only if it still belongs to `pid`. */
export function removeGatewayRecord(recordPath: string, pid = process.pid): void {
  let raw: string;
  try {
    raw = fs.readFileSync(recordPath, "utf8");
  } catch {
    return;
  }
  let owner: unknown;
  try {
    owner = (JSON.parse(raw) as { pid?: unknown }).pid;
  } catch {
    owner = undefined;
  }
  if (owner === undefined || owner === pid) {
    fs.rmSync(recordPath, { force: true });
  }
}

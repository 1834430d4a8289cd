import { readPortAssignment, type UnitActionResult } from "@ferry/core";
import { renderActionResult, renderModelList, renderUnitStatuses } from "@ferry/tui";
import type { CliContext } from "./context.js";
import { parseUnitSelection, print, printError, readFlag, unitsFor } from "./runtime-common.js";

function reportActions(results: UnitActionResult[]): number {
  for (const result of results) {
    print(renderActionResult(result));
  }
  return results.every((result) => result.ok) ? 0 : 1;
}

function selectionOrUsage(command: string, value: string | undefined) {
  const selection = parseUnitSelection(value);
  if (!selection) {
    printError(`Unknown unit: ${value ?? ""}. Expected daemon|gateway|worker|all.`);
    printError(`Usage: ferry ${command} [daemon|gateway|worker|all]`);
  }
  return selection;
}

export async function runStartCommand(context: CliContext, args: string[]): Promise<number> {
  const selection = selectionOrUsage("start", args[0]);
  if (!selection) {
    return 1;
  }
  const results: UnitActionResult[] = [];
  for (const unit of unitsFor(selection)) {
    results.push(await context.supervisor.start(unit));
  }
  return reportActions(results);
}

export async function runStopCommand(context: CliContext, args: string[]): Promise<number> {
  const positional = args.filter((arg) => !arg.startsWith("--"));
  const selection = selectionOrUsage("stop", positional[0]);
  if (!selection) {
    return 1;
  }
  const force = readFlag(args, "--force");
  const results: UnitActionResult[] = [];
  // Stop the gateway before the daemon it forwards to.
  for (const unit of [...unitsFor(selection)].reverse()) {
    results.push(await context.supervisor.stop(unit, { force }));
  }
  return reportActions(results);
}

export async function runRestartCommand(context: CliContext, args: string[]): Promise<number> {
  const selection = selectionOrUsage("restart", args[0]);
  if (!selection) {
    return 1;
  }
  if (selection === "all") {
    return reportActions(await context.supervisor.restartAll());
  }
  const results: UnitActionResult[] = [];
  for (const unit of unitsFor(selection)) {
    results.push(await context.supervisor.restart(unit));
  }
  return reportActions(results);
}

export async function runStatusCommand(context: CliContext): Promise<number> {
  print("=== Service Status ===");
  const statuses = await context.supervisor.statusAll();
  for (const entry of renderUnitStatuses(statuses)) {
    print(entry);
  }

  const assignment = readPortAssignment(context.config.persistedConfigPath);
  print("");
  print("=== Configuration ===");
  if (assignment) {
    print(`Gateway port: ${assignment.port}`);
    print(`Model: ${assignment.model}`);
  } else {
    print(`Not configured (${context.config.persistedConfigPath} missing); run \`ferry setup\``);
  }

  print("");
  print("=== Model Status ===");
  try {
    for (const entry of renderModelList(await context.backend.listModels(), assignment?.model)) {
      print(entry);
    }
  } catch (error) {
    print(`Model list unavailable: ${error instanceof Error ? error.message : String(error)}`);
  }
  return statuses.every((status) => status.state === "running") ? 0 : 1;
}

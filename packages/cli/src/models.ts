import { errorMessage, readPortAssignment } from "@ferry/core";
import { indicator, renderModelList } from "@ferry/tui";
import type { CliContext } from "./context.js";
import { print, printError } from "./runtime-common.js";

export async function runModelsCommand(context: CliContext): Promise<number> {
  const activeModel = readPortAssignment(context.config.persistedConfigPath)?.model;
  print("Installed models:");
  try {
    for (const entry of renderModelList(await context.backend.listModels(), activeModel)) {
      print(entry);
    }
  } catch (error) {
    printError(`${indicator("fail")} ${errorMessage(error)}`);
    return 1;
  }

  print("");
  print("Catalog:");
  for (const entry of context.config.models.catalog) {
    print(`  ${entry.name.padEnd(16)} ${entry.description}`);
  }
  return 0;
}

export async function runPullCommand(context: CliContext, args: string[]): Promise<number> {
  const name = args.find((arg) => !arg.startsWith("--"));
  if (!name) {
    printError("Usage: ferry pull <model_name>");
    printError("Example: ferry pull llama3.2:3b");
    return 1;
  }
  print(`Pulling ${name}...`);
  try {
    const status = await context.backend.pullModel(name);
    print(`${indicator("ok")} ${name}: ${status || "done"}`);
    return 0;
  } catch (error) {
    printError(`${indicator("fail")} ${name}: ${errorMessage(error)}`);
    return 1;
  }
}

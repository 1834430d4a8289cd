import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import {
  WORKER_ENDPOINT_KEY,
  errorMessage,
  findAvailablePort,
  parsePort,
  probePortOccupied,
  readPortAssignment,
  upsertEnvFile,
  writePortAssignment,
  type ModelCatalogEntry
} from "@ferry/core";
import { indicator } from "@ferry/tui";
import type { CliContext } from "./context.js";
import { print, printError, readFlag, readOption } from "./runtime-common.js";

export type Ask = (question: string) => Promise<string>;

export function createReadlineAsk(): { ask: Ask; close: () => void } {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: (question) => new Promise<string>((resolve) => rl.question(question, resolve)),
    close: () => rl.close()
  };
}

/** Maps a menu answer ("1".."n", or a model name) onto the catalog. */
export function resolveModelChoice(answer: string, catalog: readonly ModelCatalogEntry[], fallback: string): string {
  const trimmed = answer.trim();
  if (!trimmed) {
    return fallback;
  }
  const index = Number.parseInt(trimmed, 10);
  if (String(index) === trimmed) {
    return catalog[index - 1]?.name ?? fallback;
  }
  return trimmed;
}

async function chooseModel(context: CliContext, ask: Ask | null): Promise<string> {
  const { catalog, fallback } = context.config.models;
  if (!ask) {
    return fallback;
  }
  print("Choose a model:");
  catalog.forEach((entry, index) => {
    print(`  ${index + 1}) ${entry.name} (${entry.description})`);
  });
  return resolveModelChoice(await ask(`Enter choice [1-${catalog.length}] or a model name: `), catalog, fallback);
}

async function pullWithFallback(context: CliContext, model: string): Promise<string> {
  print(`Pulling ${model}...`);
  try {
    await context.backend.pullModel(model);
    print(`${indicator("ok")} pulled ${model}`);
    return model;
  } catch (error) {
    print(`${indicator("warn")} could not pull ${model}: ${errorMessage(error)}`);
  }

  const fallback = context.config.models.fallback;
  if (fallback === model) {
    print(`    fix: ferry pull ${model}`);
    return model;
  }
  print(`Falling back to ${fallback}...`);
  try {
    await context.backend.pullModel(fallback);
    print(`${indicator("ok")} pulled ${fallback}`);
    return fallback;
  } catch (error) {
    print(`${indicator("warn")} could not pull ${fallback}: ${errorMessage(error)}`);
    print(`    fix: ferry pull ${model}`);
    return model;
  }
}

export async function runSetupCommand(
  context: CliContext,
  args: string[],
  options: { ask?: Ask | null } = {}
): Promise<number> {
  const { config } = context;
  const reconfigure = readFlag(args, "--reconfigure");
  const existing = readPortAssignment(config.persistedConfigPath);
  if (existing && !reconfigure) {
    print(`Already configured: model ${existing.model} on port ${existing.port} (${config.persistedConfigPath})`);
    print("Run `ferry setup --reconfigure` to change it.");
    return 0;
  }

  const rawPort = readOption(args, "--port");
  const requestedPort = rawPort === undefined ? null : parsePort(rawPort);
  if (rawPort !== undefined && requestedPort === null) {
    printError(`Invalid --port value: ${rawPort}`);
    return 1;
  }

  let interactive: { ask: Ask; close: () => void } | null = null;
  const modelOption = readOption(args, "--model");
  if (modelOption === undefined && options.ask === undefined && process.stdin.isTTY) {
    interactive = createReadlineAsk();
  }
  try {
    let model = modelOption ?? (await chooseModel(context, options.ask ?? interactive?.ask ?? null));

    const port =
      requestedPort ??
      (await findAvailablePort(config.gateway.portRange.low, config.gateway.portRange.high, {
        probe: (candidate, host) => probePortOccupied(candidate, host, config.gateway.probeTimeoutMs)
      }));
    print(`Gateway port: ${port}`);

    if (!readFlag(args, "--skip-pull")) {
      model = await pullWithFallback(context, model);
    }

    writePortAssignment(config.persistedConfigPath, { port, model });
    print(`${indicator("ok")} wrote ${config.persistedConfigPath}`);

    if (fs.existsSync(config.worker.composeDir)) {
      const envPath = path.join(config.worker.composeDir, ".env");
      upsertEnvFile(envPath, { [WORKER_ENDPOINT_KEY]: `http://localhost:${port}` });
      print(`${indicator("ok")} set ${WORKER_ENDPOINT_KEY} in ${envPath}`);
    } else {
      print(`${indicator("warn")} worker directory ${config.worker.composeDir} not found; endpoint not written`);
    }

    if (existing && existing.port !== port) {
      print(`Port changed from ${existing.port} to ${port}; run \`ferry restart all\` to apply it.`);
    }
    return 0;
  } finally {
    interactive?.close();
  }
}

import {
  checkGatewayHealth,
  checkInference,
  errorMessage,
  gatewayUrlForPort,
  readPortAssignment
} from "@ferry/core";
import { indicator } from "@ferry/tui";
import type { CliContext } from "./context.js";
import { print, printError, readOption } from "./runtime-common.js";

/** `ferry test`: health check, then one prompt through the gateway. */
export async function runTestCommand(context: CliContext, args: string[]): Promise<number> {
  const assignment = readPortAssignment(context.config.persistedConfigPath);
  if (!assignment) {
    printError(`No gateway port persisted in ${context.config.persistedConfigPath}; run \`ferry setup\``);
    return 1;
  }
  const gatewayUrl = gatewayUrlForPort(assignment.port);
  print(`Testing gateway at ${gatewayUrl}...`);

  try {
    const health = await checkGatewayHealth(gatewayUrl, context.config.backend.healthTimeoutMs);
    print(`${indicator("ok")} health: ${JSON.stringify(health.body)} (${health.latencyMs}ms)`);
  } catch (error) {
    print(`${indicator("fail")} health: ${errorMessage(error)}`);
    print("    fix: ferry start");
    return 1;
  }

  const prompt = readOption(args, "--prompt");
  try {
    const inference = await checkInference(gatewayUrl, {
      prompt,
      timeoutMs: context.config.diagnostics.inferenceTimeoutMs
    });
    print(`${indicator("ok")} inference: "${inference.preview}" (${inference.latencyMs}ms)`);
    return 0;
  } catch (error) {
    print(`${indicator("fail")} inference: ${errorMessage(error)}`);
    print("    fix: ferry logs gateway");
    return 1;
  }
}

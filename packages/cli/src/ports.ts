import { errorMessage, listListeningPorts, readPortAssignment } from "@ferry/core";
import type { CliContext } from "./context.js";
import { print, printError } from "./runtime-common.js";

export async function runPortsCommand(context: CliContext): Promise<number> {
  let ports: number[];
  try {
    ports = await listListeningPorts(context.runner);
  } catch (error) {
    printError(`Unable to list ports: ${errorMessage(error)}`);
    return 1;
  }

  const { low, high } = context.config.gateway.portRange;
  const gatewayPort = readPortAssignment(context.config.persistedConfigPath)?.port;
  const inRange = ports.filter((port) => port >= low && port <= high);

  print(`Listening TCP ports: ${ports.length > 0 ? ports.join(", ") : "(none)"}`);
  print(`In gateway range ${low}-${high}: ${inRange.length > 0 ? inRange.join(", ") : "(none)"}`);
  if (gatewayPort !== undefined) {
    print(`Persisted gateway port ${gatewayPort}: ${ports.includes(gatewayPort) ? "listening" : "not listening"}`);
  }
  return 0;
}

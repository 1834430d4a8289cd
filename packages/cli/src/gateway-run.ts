import {
  BackendClient,
  createGatewayService,
  findAvailablePort,
  parsePort,
  probePortOccupied,
  readPortAssignment,
  type ResolvedFerryConfig
} from "@ferry/core";
import { line, renderGatewayStatus } from "@ferry/tui";
import { log, print, printError, readOption, removeGatewayRecord, writeGatewayRecord } from "./runtime-common.js";

/** Runs the translator in the foreground until SIGINT or SIGTERM. */
export async function runGatewayCommand(config: ResolvedFerryConfig, args: string[]): Promise<number> {
  const assignment = readPortAssignment(config.persistedConfigPath);
  const model = readOption(args, "--model") ?? assignment?.model ?? config.models.fallback;
  const rawPort = readOption(args, "--port");
  const requestedPort = rawPort === undefined ? null : parsePort(rawPort);
  if (rawPort !== undefined && requestedPort === null) {
    printError(`Invalid --port value: ${rawPort}`);
    return 1;
  }

  const probe = (port: number, host: string) => probePortOccupied(port, host, config.gateway.probeTimeoutMs);
  const port =
    requestedPort ??
    assignment?.port ??
    (await findAvailablePort(config.gateway.portRange.low, config.gateway.portRange.high, { probe }));

  const gateway = createGatewayService({
    backend: new BackendClient(config.backend),
    model,
    host: config.gateway.host,
    port,
    persistedPort: assignment?.port ?? null,
    range: config.gateway.portRange,
    bindRetries: config.gateway.bindRetries,
    probe,
    generateTimeoutMs: config.backend.generateTimeoutMs,
    healthTimeoutMs: config.backend.healthTimeoutMs,
    log
  });

  const status = await gateway.start();
  if (status.port === undefined) {
    throw new Error("gateway started without a bound port");
  }
  writeGatewayRecord(config.gatewayRecordPath, {
    pid: process.pid,
    port: status.port,
    host: config.gateway.host,
    model,
    startedAt: status.startedAt ?? new Date().toISOString()
  });

  print(line(`runtime: node=${process.version} pid=${process.pid} backend=${config.backend.baseUrl}`));
  for (const entry of renderGatewayStatus(status)) {
    print(line(entry));
  }

  const signal = await new Promise<NodeJS.Signals>((resolve) => {
    const onSignal = (received: NodeJS.Signals): void => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(received);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });

  log(`received ${signal}, shutting down`);
  try {
    await gateway.stop();
  } finally {
    removeGatewayRecord(config.gatewayRecordPath);
  }
  return 0;
}

import type { BackendClient } from "../backend.js";
import { detectConfigDrift, readPortAssignment } from "../config-store.js";
import type { ResolvedFerryConfig } from "../config.js";
import { FerryError } from "../errors.js";
import { readGatewayRecord } from "../supervisor/detectors.js";
import type { ServiceSupervisor } from "../supervisor/supervisor.js";
import type { CommandRunner, ProcessTable } from "../supervisor/system.js";
import type { DiagnosticsProbes } from "./aggregator.js";
import { runBenchmark } from "./benchmark.js";
import { checkBackend, checkGatewayHealth, checkInference } from "./connectivity.js";
import { collectResources } from "./resources.js";

export function gatewayUrlForPort(port: number): string {
  return `http://127.0.0.1:${port}`;
}

/** Port the running gateway recorded for itself, or null when it is not running. */
export function readActualGatewayPort(recordPath: string, processTable: ProcessTable): number | null {
  const record = readGatewayRecord(recordPath);
  return record && processTable.isAlive(record.pid) ? record.port : null;
}

export function createDiagnosticsProbes(context: {
  config: ResolvedFerryConfig;
  supervisor: ServiceSupervisor;
  backend: BackendClient;
  processTable: ProcessTable;
  runner?: CommandRunner;
}): DiagnosticsProbes {
  const { config, supervisor, backend } = context;

  const persisted = () => readPortAssignment(config.persistedConfigPath);
  const gatewayUrl = (): string => {
    const assignment = persisted();
    if (!assignment) {
      throw new FerryError("config_invalid", `No gateway port persisted in ${config.persistedConfigPath}`);
    }
    return gatewayUrlForPort(assignment.port);
  };
  const model = (): string => persisted()?.model ?? config.models.fallback;

  return {
    units: supervisor.listUnits().map((unit) => unit.id),
    resources: () => collectResources({ diskPath: config.diagnostics.diskPath, runner: context.runner }),
    unitStatus: (unit) => supervisor.status(unit),
    backend: () => checkBackend(backend),
    gateway: () => checkGatewayHealth(gatewayUrl(), config.backend.healthTimeoutMs),
    inference: () => checkInference(gatewayUrl(), { timeoutMs: config.diagnostics.inferenceTimeoutMs }),
    drift: async () =>
      detectConfigDrift(
        persisted()?.port ?? null,
        readActualGatewayPort(config.gatewayRecordPath, context.processTable)
      ),
    benchmark: () =>
      runBenchmark(backend, {
        model: model(),
        prompt: config.diagnostics.benchmarkPrompt,
        timeoutMs: config.diagnostics.benchmarkTimeoutMs
      })
  };
}

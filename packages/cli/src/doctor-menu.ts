import {
  createDiagnosticsProbes,
  createRemediations,
  errorMessage,
  readGatewayRecord,
  runCheck,
  runDiagnostics,
  runRemediation,
  type CheckResult,
  type ConfirmFn,
  type DiagnosticsProbes,
  type RemediationId
} from "@ferry/core";
import {
  indicator,
  renderBenchmark,
  renderHealthReport,
  renderRemediationResult,
  renderUnitObservations,
  renderUnitStatuses
} from "@ferry/tui";
import type { CliContext } from "./context.js";

export interface DoctorMenuEntry {
  key: string;
  label: string;
  run(confirm: ConfirmFn): Promise<string[]>;
}

export function createProbes(context: CliContext): DiagnosticsProbes {
  return createDiagnosticsProbes({
    config: context.config,
    supervisor: context.supervisor,
    backend: context.backend,
    processTable: context.processTable,
    runner: context.runner
  });
}

function checkLine<T>(label: string, result: CheckResult<T>, describe: (value: T) => string): string {
  if (!("ok" in result)) {
    return `- ${label}: skipped`;
  }
  return result.ok
    ? `${indicator("ok")} ${label}: ${describe(result.value)}`
    : `${indicator("fail")} ${label}: ${result.error}`;
}

export function createDoctorMenu(context: CliContext): DoctorMenuEntry[] {
  const probes = createProbes(context);
  const remediations = createRemediations({
    supervisor: context.supervisor,
    backend: context.backend,
    containerRuntime: context.containerRuntime,
    logPaths: [context.config.daemon.logPath, context.config.gateway.logPath]
  });
  const remediate = (id: RemediationId) => async (confirm: ConfirmFn) =>
    renderRemediationResult(await runRemediation(remediations[id], { confirm }));

  return [
    {
      key: "1",
      label: "Quick status check",
      run: async () => renderUnitStatuses(await context.supervisor.statusAll())
    },
    {
      key: "2",
      label: "Full system diagnosis",
      run: async () => renderHealthReport(await runDiagnostics(probes))
    },
    {
      key: "3",
      label: "Test connectivity",
      run: async () => {
        const [backend, gateway, inference] = await Promise.all([
          runCheck(() => probes.backend(), 6_000),
          runCheck(() => probes.gateway(), 6_000),
          runCheck(() => probes.inference(), context.config.diagnostics.inferenceTimeoutMs + 1_000)
        ]);
        return [
          checkLine("backend", backend, (probe) => `reachable in ${probe.latencyMs}ms`),
          checkLine("gateway health", gateway, (probe) => `HTTP ${probe.status} in ${probe.latencyMs}ms`),
          checkLine("inference", inference, (probe) => `"${probe.preview}"`)
        ];
      }
    },
    {
      key: "4",
      label: "Performance benchmark",
      run: async () => {
        try {
          return renderBenchmark(await probes.benchmark());
        } catch (error) {
          return [`${indicator("fail")} ${errorMessage(error)}`];
        }
      }
    },
    { key: "5", label: "Restart daemon and gateway", run: remediate("restart-core") },
    { key: "6", label: "Clean logs", run: remediate("clean-logs") },
    { key: "7", label: "Clear model cache", run: remediate("clear-model-cache") },
    {
      key: "8",
      label: "Detailed status",
      run: async () => {
        const lines: string[] = [];
        for (const status of await context.supervisor.statusAll()) {
          lines.push(...renderUnitObservations(status));
        }
        const record = readGatewayRecord(context.config.gatewayRecordPath);
        lines.push(
          record
            ? `gateway record: pid ${record.pid} port ${record.port} model ${record.model} since ${record.startedAt}`
            : `gateway record: none at ${context.config.gatewayRecordPath}`
        );
        return lines;
      }
    },
    { key: "9", label: "Restart all services", run: remediate("restart-all") },
    { key: "p", label: "Prune containers", run: remediate("prune-containers") }
  ];
}

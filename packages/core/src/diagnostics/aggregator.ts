import type { BackendProbeResult } from "../backend.js";
import type { DriftCheck } from "../config-store.js";
import {
  BENCHMARK_TIMEOUT_MS,
  HEALTH_TIMEOUT_MS,
  INFERENCE_PROBE_TIMEOUT_MS
} from "../constants.js";
import { errorMessage } from "../errors.js";
import type { UnitStatus } from "../supervisor/supervisor.js";
import type { UnitId } from "../supervisor/units.js";
import type { BenchmarkResult } from "./benchmark.js";
import type { EndpointProbe, InferenceProbe } from "./connectivity.js";
import { deriveFindings, type Finding } from "./findings.js";
import type { ResourceSnapshot } from "./resources.js";

export type CheckResult<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: string; durationMs: number }
  | { skipped: true };

export type CheckName = "resources" | "units" | "backend" | "gateway" | "inference" | "drift" | "benchmark";

export interface DiagnosticsProbes {
  units: readonly UnitId[];
  resources(): Promise<ResourceSnapshot>;
  unitStatus(unit: UnitId): Promise<UnitStatus>;
  backend(): Promise<BackendProbeResult>;
  gateway(): Promise<EndpointProbe>;
  inference(): Promise<InferenceProbe>;
  drift(): Promise<DriftCheck>;
  benchmark(): Promise<BenchmarkResult>;
}

export interface DiagnosticsOptions {
  benchmark?: boolean;
  timeouts?: Partial<Record<CheckName, number>>;
  now?: () => number;
}

export interface HealthReport {
  generatedAt: string;
  resources: CheckResult<ResourceSnapshot>;
  units: Array<{ unit: UnitId; result: CheckResult<UnitStatus> }>;
  backend: CheckResult<BackendProbeResult>;
  gateway: CheckResult<EndpointProbe>;
  inference: CheckResult<InferenceProbe>;
  drift: CheckResult<DriftCheck>;
  benchmark: CheckResult<BenchmarkResult>;
  findings: Finding[];
}

export const DEFAULT_CHECK_TIMEOUTS: Record<CheckName, number> = {
  resources: 10_000,
  units: 15_000,
  backend: HEALTH_TIMEOUT_MS + 1_000,
  gateway: HEALTH_TIMEOUT_MS + 1_000,
  inference: INFERENCE_PROBE_TIMEOUT_MS + 1_000,
  drift: 5_000,
  benchmark: BENCHMARK_TIMEOUT_MS + 1_000
};

/**
 * Settles `task` into a {@link CheckResult}. A task still pending after
 * `timeoutMs` is reported as failed; its eventual outcome is ignored.
 */
export async function runCheck<T>(
  task: () => Promise<T>,
  timeoutMs: number,
  now: () => number = () => performance.now()
): Promise<CheckResult<T>> {
  const startedAt = now();
  const elapsed = (): number => Math.round(now() - startedAt);
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<CheckResult<T>>((resolve) => {
    timer = setTimeout(() => {
      resolve({ ok: false, error: `timed out after ${timeoutMs}ms`, durationMs: elapsed() });
    }, timeoutMs);
  });

  const settled = (async (): Promise<CheckResult<T>> => {
    try {
      const value = await task();
      return { ok: true, value, durationMs: elapsed() };
    } catch (error) {
      return { ok: false, error: errorMessage(error), durationMs: elapsed() };
    }
  })();

  try {
    return await Promise.race([settled, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function isCheckOk<T>(result: CheckResult<T>): result is { ok: true; value: T; durationMs: number } {
  return "ok" in result && result.ok;
}

export function isCheckFailed<T>(result: CheckResult<T>): result is { ok: false; error: string; durationMs: number } {
  return "ok" in result && !result.ok;
}

/** Runs every check concurrently and reports only after all of them settle. */
export async function runDiagnostics(
  probes: DiagnosticsProbes,
  options: DiagnosticsOptions = {}
): Promise<HealthReport> {
  const timeouts = { ...DEFAULT_CHECK_TIMEOUTS, ...options.timeouts };
  const now = options.now;

  const [resources, units, backend, gateway, inference, drift, benchmark] = await Promise.all([
    runCheck(() => probes.resources(), timeouts.resources, now),
    Promise.all(
      probes.units.map(async (unit) => ({
        unit,
        result: await runCheck(() => probes.unitStatus(unit), timeouts.units, now)
      }))
    ),
    runCheck(() => probes.backend(), timeouts.backend, now),
    runCheck(() => probes.gateway(), timeouts.gateway, now),
    runCheck(() => probes.inference(), timeouts.inference, now),
    runCheck(() => probes.drift(), timeouts.drift, now),
    options.benchmark
      ? runCheck(() => probes.benchmark(), timeouts.benchmark, now)
      : Promise.resolve<CheckResult<BenchmarkResult>>({ skipped: true })
  ]);

  const report: Omit<HealthReport, "findings"> = {
    generatedAt: new Date().toISOString(),
    resources,
    units,
    backend,
    gateway,
    inference,
    drift,
    benchmark
  };
  return { ...report, findings: deriveFindings(report) };
}

export function reportHasErrors(report: HealthReport): boolean {
  return report.findings.some((finding) => finding.level === "error");
}

import type {
  BackendModel,
  BenchmarkResult,
  CheckResult,
  Finding,
  FindingLevel,
  GatewayStatus,
  HealthReport,
  RemediationResult,
  ResourceSnapshot,
  UnitActionResult,
  UnitStatus
} from "@ferry/core";

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;
const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m"
};

export function line(text: string): string {
  return `[ferry] ${text}`;
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

function colorize(text: string, code: string): string {
  if (!process.stdout.isTTY) {
    return text;
  }
  return `${code}${text}${ANSI.reset}`;
}

function heading(text: string): string {
  return colorize(`=== ${text} ===`, `${ANSI.bold}${ANSI.cyan}`);
}

export type Indicator = "ok" | "fail" | "warn";

export function indicator(kind: Indicator): string {
  if (kind === "ok") {
    return colorize("✓", ANSI.green);
  }
  if (kind === "warn") {
    return colorize("!", ANSI.yellow);
  }
  return colorize("✗", ANSI.red);
}

function levelIndicator(level: FindingLevel): string {
  return indicator(level === "ok" ? "ok" : level === "warn" ? "warn" : "fail");
}

export function formatBytes(bytes: number): string {
  if (bytes >= 1024 ** 3) {
    return `${(bytes / 1024 ** 3).toFixed(1)}G`;
  }
  if (bytes >= 1024 ** 2) {
    return `${(bytes / 1024 ** 2).toFixed(0)}M`;
  }
  return `${Math.round(bytes / 1024)}K`;
}

export function formatDuration(ms: number): string {
  return ms >= 1000 ? `${(ms / 1000).toFixed(2)}s` : `${ms}ms`;
}

export function renderUnitStatus(status: UnitStatus): string {
  const kind: Indicator =
    status.state === "running" ? "ok" : status.state === "stopped" || status.state === "unconfigured" ? "fail" : "warn";
  const fraction = status.counts ? ` [${status.counts.running}/${status.counts.total}]` : "";
  return `${indicator(kind)} ${status.label}: ${status.state}${fraction} (${status.detail})`;
}

export function renderUnitStatuses(statuses: UnitStatus[]): string[] {
  return statuses.map(renderUnitStatus);
}

/** Detector-by-detector breakdown used by the detailed status view. */
export function renderUnitObservations(status: UnitStatus): string[] {
  return [
    renderUnitStatus(status),
    ...status.observations.map((entry) => colorize(`    ${entry.method}: ${entry.state} - ${entry.detail}`, ANSI.dim))
  ];
}

export function renderActionResult(result: UnitActionResult): string {
  const kind: Indicator =
    result.code === "not_configured" && result.ok
      ? "warn"
      : result.ok
        ? "ok"
        : result.code === "indeterminate"
          ? "warn"
          : "fail";
  return `${indicator(kind)} ${result.unit} ${result.action}: ${result.code} - ${result.message}`;
}

export function renderGatewayStatus(status: GatewayStatus): string[] {
  const kind: Indicator = status.state === "running" ? "ok" : status.state === "degraded" ? "warn" : "fail";
  const lines = [`${indicator(kind)} gateway ${status.state}${status.url ? ` at ${status.url}` : ""} (model ${status.model})`];
  for (const reason of status.degradedReasons) {
    lines.push(colorize(`  degraded: ${reason}`, ANSI.yellow));
  }
  return lines;
}

export function renderResources(snapshot: ResourceSnapshot): string[] {
  const { memory, disk } = snapshot;
  const lines = [
    `RAM: ${formatBytes(memory.totalBytes)} total, ${formatBytes(memory.usedBytes)} used, ${formatBytes(memory.availableBytes)} available`,
    `Disk ${disk.path}: ${disk.usedPercent}% used, ${formatBytes(disk.availableBytes)} available`,
    `Load: ${snapshot.loadAverage.map((value) => value.toFixed(2)).join(" ")} (${snapshot.cpuCount} CPUs)`
  ];
  for (const accelerator of snapshot.accelerators) {
    lines.push(`GPU: ${accelerator.name} ${accelerator.memoryUsedMiB}/${accelerator.memoryTotalMiB} MiB`);
  }
  if (snapshot.acceleratorError) {
    lines.push(colorize(`GPU: unavailable (${snapshot.acceleratorError})`, ANSI.yellow));
  }
  return lines;
}

export function renderBenchmark(result: BenchmarkResult): string[] {
  const lines = [
    `Model: ${result.model}`,
    `Duration: ${formatDuration(result.elapsedMs)}`,
    `Words generated: ${result.words}`,
    `Speed: ${result.wordsPerSecond} words/second`
  ];
  if (result.tokensPerSecond !== undefined) {
    lines.push(`Tokens: ${result.tokensPerSecond} tokens/second`);
  }
  lines.push(`Preview: ${result.preview}`);
  return lines;
}

function renderCheck<T>(label: string, result: CheckResult<T>, describe: (value: T) => string): string {
  if (!("ok" in result)) {
    return `${colorize("-", ANSI.dim)} ${label}: skipped`;
  }
  if (!result.ok) {
    return `${indicator("fail")} ${label}: ${result.error} (${formatDuration(result.durationMs)})`;
  }
  return `${indicator("ok")} ${label}: ${describe(result.value)} (${formatDuration(result.durationMs)})`;
}

export function renderFinding(finding: Finding): string[] {
  const lines = [`${levelIndicator(finding.level)} ${finding.message}`];
  if (finding.hint) {
    lines.push(colorize(`    fix: ${finding.hint}`, ANSI.dim));
  }
  return lines;
}

export function renderHealthReport(report: HealthReport): string[] {
  const lines: string[] = [heading("System Resources")];
  if ("ok" in report.resources && report.resources.ok) {
    lines.push(...renderResources(report.resources.value));
  } else {
    lines.push(renderCheck("resources", report.resources, () => ""));
  }

  lines.push("", heading("Services"));
  for (const { unit, result } of report.units) {
    if ("ok" in result && result.ok) {
      lines.push(renderUnitStatus(result.value));
    } else {
      lines.push(renderCheck(unit, result, () => ""));
    }
  }

  lines.push("", heading("Connectivity"));
  lines.push(renderCheck("backend", report.backend, (probe) => `reachable in ${probe.latencyMs}ms`));
  lines.push(renderCheck("gateway health", report.gateway, (probe) => `${probe.url} answered ${probe.status}`));
  lines.push(renderCheck("inference", report.inference, (probe) => `"${probe.preview}"`));

  lines.push("", heading("Configuration"));
  lines.push(
    renderCheck("drift", report.drift, (drift) => `${drift.ok ? "" : "MISMATCH: "}${drift.message}`)
  );

  if ("ok" in report.benchmark) {
    lines.push("", heading("Benchmark"));
    if (report.benchmark.ok) {
      lines.push(...renderBenchmark(report.benchmark.value));
    } else {
      lines.push(renderCheck("benchmark", report.benchmark, () => ""));
    }
  }

  lines.push("", heading("Findings"));
  for (const finding of report.findings) {
    lines.push(...renderFinding(finding));
  }
  return lines;
}

export function renderModelList(models: BackendModel[], activeModel?: string): string[] {
  if (models.length === 0) {
    return [colorize("No models installed.", ANSI.dim)];
  }
  return models.map((model) => {
    const marker = model.name === activeModel ? "*" : " ";
    const size = model.size === undefined ? "" : ` ${formatBytes(model.size)}`;
    return `${marker} ${model.name}${size}`;
  });
}

export function renderRemediationResult(result: RemediationResult): string[] {
  const kind: Indicator = !result.performed ? (result.ok ? "warn" : "fail") : result.ok ? "ok" : "fail";
  return [`${indicator(kind)} ${result.id}: ${result.message}`, ...result.details.map((detail) => `    ${detail}`)];
}

import { DISK_WARN_PERCENT, RAM_WARN_BYTES } from "../constants.js";
import type { HealthReport } from "./aggregator.js";

export type FindingLevel = "ok" | "warn" | "error";

export interface Finding {
  level: FindingLevel;
  check: string;
  message: string;
  /** Exact command, or the configuration change, that addresses the finding. */
  hint?: string;
}

function gib(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(1)}GB`;
}

export function deriveFindings(report: Omit<HealthReport, "findings">): Finding[] {
  const findings: Finding[] = [];

  const resources = report.resources;
  if ("ok" in resources) {
    if (!resources.ok) {
      findings.push({ level: "warn", check: "resources", message: `Resource snapshot failed: ${resources.error}` });
    } else {
      const { memory, disk } = resources.value;
      if (disk.usedPercent > DISK_WARN_PERCENT) {
        findings.push({
          level: "warn",
          check: "resources",
          message: `Disk ${disk.path} is ${disk.usedPercent}% full`,
          hint: "docker system prune -f"
        });
      }
      if (memory.totalBytes < RAM_WARN_BYTES) {
        findings.push({
          level: "warn",
          check: "resources",
          message: `Only ${gib(memory.totalBytes)} RAM; 4GB or more is recommended`,
          hint: "ferry setup --model llama3.2:1b --reconfigure"
        });
      }
      if (resources.value.acceleratorError) {
        findings.push({
          level: "warn",
          check: "resources",
          message: `GPU query failed: ${resources.value.acceleratorError}`
        });
      }
    }
  }

  for (const { unit, result } of report.units) {
    if (!("ok" in result)) {
      continue;
    }
    if (!result.ok) {
      findings.push({
        level: "error",
        check: `unit:${unit}`,
        message: `Could not determine ${unit} status: ${result.error}`,
        hint: `ferry status`
      });
      continue;
    }
    const status = result.value;
    if (status.state === "unconfigured") {
      findings.push({
        level: "error",
        check: `unit:${unit}`,
        message: `${status.label} is not configured: ${status.detail}`,
        hint: "set worker.composeDir in ferry.config.ts, then run ferry setup --reconfigure"
      });
    } else if (status.state === "stopped") {
      findings.push({
        level: "error",
        check: `unit:${unit}`,
        message: `${status.label} is not running`,
        hint: `ferry start ${unit}`
      });
    } else if (status.state === "indeterminate") {
      findings.push({
        level: "warn",
        check: `unit:${unit}`,
        message: `${status.label} state is indeterminate: ${status.detail}`,
        hint: `ferry restart ${unit}`
      });
    }
  }

  if ("ok" in report.backend && !report.backend.ok) {
    findings.push({
      level: "error",
      check: "backend",
      message: `Backend is unreachable: ${report.backend.error}`,
      hint: "ferry start daemon"
    });
  }
  if ("ok" in report.gateway && !report.gateway.ok) {
    findings.push({
      level: "error",
      check: "gateway",
      message: `Gateway health check failed: ${report.gateway.error}`,
      hint: "ferry restart gateway"
    });
  }
  if ("ok" in report.inference && !report.inference.ok) {
    findings.push({
      level: "error",
      check: "inference",
      message: `Inference through the gateway failed: ${report.inference.error}`,
      hint: "ferry logs gateway"
    });
  }

  const drift = report.drift;
  if ("ok" in drift) {
    if (!drift.ok) {
      findings.push({ level: "warn", check: "drift", message: `Drift check failed: ${drift.error}` });
    } else if (!drift.value.ok) {
      findings.push({
        level: drift.value.persistedPort === null ? "warn" : "error",
        check: "drift",
        message: drift.value.message,
        hint: drift.value.persistedPort === null ? "ferry setup" : "ferry restart gateway"
      });
    }
  }

  if ("ok" in report.benchmark && !report.benchmark.ok) {
    findings.push({
      level: "warn",
      check: "benchmark",
      message: report.benchmark.error,
      hint: "ferry models"
    });
  }

  if (findings.length === 0) {
    findings.push({ level: "ok", check: "all", message: "All checks passed" });
  }
  return findings;
}

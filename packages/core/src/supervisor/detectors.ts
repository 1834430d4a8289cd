import fs from "node:fs";
import { errorMessage } from "../errors.js";
import {
  CommandUnavailableError,
  WorkerNotConfiguredError,
  type ContainerCounts,
  type ContainerRuntime,
  type InitSystem,
  type ProcessTable
} from "./system.js";

export type DetectionMethod = "init-system" | "pid-file" | "process-pattern" | "container-runtime" | "container-label";

/**
 * `partial` is only produced by container detection: some, but not all,
 * services are up. `unavailable` means the method cannot answer on this host;
 * `unconfigured` means the unit has nothing installed to run.
 */
export type DetectionState = "running" | "stopped" | "partial" | "unavailable" | "unconfigured";

export interface DetectionResult {
  method: DetectionMethod;
  state: DetectionState;
  detail: string;
  pids?: number[];
  counts?: ContainerCounts;
}

export interface UnitDetector {
  readonly method: DetectionMethod;
  detect(): Promise<DetectionResult>;
}

export class InitSystemDetector implements UnitDetector {
  readonly method = "init-system";

  constructor(
    private readonly initSystem: InitSystem,
    private readonly unitName: string
  ) {}

  async detect(): Promise<DetectionResult> {
    try {
      const active = await this.initSystem.isActive(this.unitName);
      return {
        method: this.method,
        state: active ? "running" : "stopped",
        detail: active ? `${this.unitName} service is active` : `${this.unitName} service is not active`
      };
    } catch (error) {
      if (error instanceof CommandUnavailableError) {
        return { method: this.method, state: "unavailable", detail: error.message };
      }
      throw error;
    }
  }
}

export class ProcessPatternDetector implements UnitDetector {
  readonly method = "process-pattern";

  constructor(
    private readonly processTable: ProcessTable,
    private readonly pattern: string
  ) {}

  async detect(): Promise<DetectionResult> {
    try {
      const pids = await this.processTable.find(this.pattern);
      return {
        method: this.method,
        state: pids.length > 0 ? "running" : "stopped",
        detail:
          pids.length > 0
            ? `process matching "${this.pattern}" (pid ${pids.join(", ")})`
            : `no process matching "${this.pattern}"`,
        pids
      };
    } catch (error) {
      if (error instanceof CommandUnavailableError) {
        return { method: this.method, state: "unavailable", detail: error.message };
      }
      throw error;
    }
  }
}

export interface GatewayRecord {
  pid: number;
  port: number;
  host: string;
  model: string;
  startedAt: string;
}

export function readGatewayRecord(recordPath: string): GatewayRecord | null {
  let raw: string;
  try {
    raw = fs.readFileSync(recordPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
  try {
    const parsed = JSON.parse(raw) as Partial<GatewayRecord>;
    if (
      typeof parsed.pid !== "number" ||
      !Number.isInteger(parsed.pid) ||
      parsed.pid <= 0 ||
      typeof parsed.port !== "number"
    ) {
      return null;
    }
    return {
      pid: parsed.pid,
      port: parsed.port,
      host: typeof parsed.host === "string" ? parsed.host : "127.0.0.1",
      model: typeof parsed.model === "string" ? parsed.model : "",
      startedAt: typeof parsed.startedAt === "string" ? parsed.startedAt : ""
    };
  } catch {
    return null;
  }
}

export class PidFileDetector implements UnitDetector {
  readonly method = "pid-file";

  constructor(
    private readonly processTable: ProcessTable,
    private readonly recordPath: string
  ) {}

  async detect(): Promise<DetectionResult> {
    let record: GatewayRecord | null;
    try {
      record = readGatewayRecord(this.recordPath);
    } catch (error) {
      throw new Error(`Unable to read ${this.recordPath}: ${errorMessage(error)}`);
    }
    if (!record) {
      return { method: this.method, state: "stopped", detail: `no runtime record at ${this.recordPath}` };
    }
    if (!this.processTable.isAlive(record.pid)) {
      return { method: this.method, state: "stopped", detail: `recorded pid ${record.pid} is not alive` };
    }
    return {
      method: this.method,
      state: "running",
      detail: `pid ${record.pid} on port ${record.port}`,
      pids: [record.pid]
    };
  }
}

export class ContainerDetector implements UnitDetector {
  readonly method = "container-runtime";

  constructor(private readonly runtime: ContainerRuntime) {}

  async detect(): Promise<DetectionResult> {
    let counts: ContainerCounts;
    try {
      counts = await this.runtime.countRunning();
    } catch (error) {
      if (error instanceof CommandUnavailableError) {
        return { method: this.method, state: "unavailable", detail: error.message };
      }
      if (error instanceof WorkerNotConfiguredError) {
        return { method: this.method, state: "unconfigured", detail: error.message };
      }
      throw error;
    }
    return {
      method: this.method,
      state: classifyContainerCounts(counts),
      detail: `${counts.running} of ${counts.total} services running`,
      counts
    };
  }
}

/** Asks the container engine for containers carrying the compose project label. */
export class ContainerLabelDetector implements UnitDetector {
  readonly method = "container-label";

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly projectName: string
  ) {}

  async detect(): Promise<DetectionResult> {
    let services: string[];
    try {
      services = await this.runtime.listRunningContainers();
    } catch (error) {
      if (error instanceof CommandUnavailableError) {
        return { method: this.method, state: "unavailable", detail: error.message };
      }
      throw error;
    }
    if (services.length === 0) {
      return { method: this.method, state: "stopped", detail: `no running containers for project ${this.projectName}` };
    }
    return {
      method: this.method,
      state: "running",
      detail: `project ${this.projectName} has running containers: ${services.join(", ")}`
    };
  }
}

/** A compose project that defines no services is not running. */
export function classifyContainerCounts(counts: ContainerCounts): DetectionState {
  if (counts.total > 0 && counts.running === counts.total) {
    return "running";
  }
  if (counts.running === 0) {
    return "stopped";
  }
  return "partial";
}

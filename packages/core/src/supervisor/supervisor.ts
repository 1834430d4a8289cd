import {
  SUPERVISOR_RESTART_DELAY_MS,
  SUPERVISOR_SETTLE_MS,
  SUPERVISOR_STOP_GRACE_MS
} from "../constants.js";
import { errorMessage } from "../errors.js";
import type { DetectionMethod, DetectionResult } from "./detectors.js";
import type { ContainerCounts } from "./system.js";
import {
  UNIT_IDS,
  type LifecycleMechanism,
  type LifecycleOutcome,
  type ManagedUnit,
  type UnitId
} from "./units.js";

/** `unconfigured`: the unit has nothing installed to run, so lifecycle actions cannot help. */
export type UnitState = "running" | "stopped" | "indeterminate" | "unconfigured";

export interface DetectionObservation {
  method: DetectionMethod;
  state: DetectionResult["state"] | "error";
  detail: string;
}

export interface UnitStatus {
  unit: UnitId;
  label: string;
  state: UnitState;
  detail: string;
  /** Detector that reported the unit running. */
  via?: DetectionMethod;
  counts?: ContainerCounts;
  observations: DetectionObservation[];
}

export type UnitActionCode =
  | "started"
  | "already_running"
  | "start_failed"
  | "stopped"
  | "already_stopped"
  | "stop_failed"
  | "restarted"
  | "indeterminate"
  | "not_configured";

export interface UnitActionResult {
  unit: UnitId;
  action: "start" | "stop" | "restart";
  ok: boolean;
  code: UnitActionCode;
  message: string;
  via?: LifecycleMechanism;
  status?: UnitStatus;
  steps?: UnitActionResult[];
}

export interface SupervisorOptions {
  settleMs?: number;
  stopGraceMs?: number;
  restartDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  log?: (line: string) => void;
}

/** Composed restarts run in this order: the worker needs a live gateway. */
export const RESTART_ORDER: readonly UnitId[] = ["daemon", "gateway", "worker"];

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function describeUnitStatus(status: UnitStatus): string {
  if (status.counts) {
    return `${status.counts.running} of ${status.counts.total} services running`;
  }
  return status.detail;
}

export class ServiceSupervisor {
  private readonly units = new Map<UnitId, ManagedUnit>();
  private readonly settleMs: number;
  private readonly stopGraceMs: number;
  private readonly restartDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: (line: string) => void;

  constructor(units: readonly ManagedUnit[], options: SupervisorOptions = {}) {
    for (const unit of units) {
      if (this.units.has(unit.id)) {
        throw new Error(`Duplicate managed unit: ${unit.id}`);
      }
      this.units.set(unit.id, unit);
    }
    this.settleMs = options.settleMs ?? SUPERVISOR_SETTLE_MS;
    this.stopGraceMs = options.stopGraceMs ?? SUPERVISOR_STOP_GRACE_MS;
    this.restartDelayMs = options.restartDelayMs ?? SUPERVISOR_RESTART_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.log ?? (() => undefined);
  }

  listUnits(): ManagedUnit[] {
    return UNIT_IDS.flatMap((id) => {
      const unit = this.units.get(id);
      return unit ? [unit] : [];
    });
  }

  getUnit(id: UnitId): ManagedUnit {
    const unit = this.units.get(id);
    if (!unit) {
      throw new Error(`Unknown managed unit: ${id}`);
    }
    return unit;
  }

  async status(id: UnitId): Promise<UnitStatus> {
    const unit = this.getUnit(id);
    const observations: DetectionObservation[] = [];

    for (const detector of unit.detectors) {
      let result: DetectionResult;
      try {
        result = await detector.detect();
      } catch (error) {
        observations.push({ method: detector.method, state: "error", detail: errorMessage(error) });
        continue;
      }
      observations.push({ method: result.method, state: result.state, detail: result.detail });

      if (result.state === "running") {
        return {
          unit: id,
          label: unit.label,
          state: "running",
          detail: result.detail,
          via: result.method,
          counts: result.counts,
          observations
        };
      }
      if (result.state === "partial") {
        return {
          unit: id,
          label: unit.label,
          state: "indeterminate",
          detail: `partially running: ${result.detail}`,
          counts: result.counts,
          observations
        };
      }
      if (result.counts) {
        return {
          unit: id,
          label: unit.label,
          state: "stopped",
          detail: result.detail,
          counts: result.counts,
          observations
        };
      }
    }

    const unconfigured = observations.find((entry) => entry.state === "unconfigured");
    if (unconfigured) {
      return {
        unit: id,
        label: unit.label,
        state: "unconfigured",
        detail: unconfigured.detail,
        observations
      };
    }

    const answered = observations.filter((entry) => entry.state === "stopped");
    const failed = observations.filter((entry) => entry.state === "error");
    if (answered.length > 0 && failed.length === 0) {
      return {
        unit: id,
        label: unit.label,
        state: "stopped",
        detail: answered.map((entry) => entry.detail).join("; "),
        observations
      };
    }
    return {
      unit: id,
      label: unit.label,
      state: "indeterminate",
      detail:
        observations.map((entry) => `${entry.method}: ${entry.detail}`).join("; ") || "no detector configured",
      observations
    };
  }

  async statusAll(): Promise<UnitStatus[]> {
    const statuses: UnitStatus[] = [];
    for (const unit of this.listUnits()) {
      statuses.push(await this.status(unit.id));
    }
    return statuses;
  }

  async start(id: UnitId): Promise<UnitActionResult> {
    const unit = this.getUnit(id);
    const before = await this.status(id);
    if (before.state === "running") {
      return {
        unit: id,
        action: "start",
        ok: true,
        code: "already_running",
        message: `${unit.label} is already running (${before.detail})`,
        status: before
      };
    }
    if (before.state === "unconfigured") {
      return {
        unit: id,
        action: "start",
        ok: false,
        code: "not_configured",
        message: `${unit.label} is not configured: ${before.detail}`,
        status: before
      };
    }

    this.log(`starting ${id}`);
    let launch: LifecycleOutcome;
    try {
      launch = await unit.launch();
    } catch (error) {
      return {
        unit: id,
        action: "start",
        ok: false,
        code: "start_failed",
        message: `${unit.label} failed to start: ${errorMessage(error)}`
      };
    }
    if (!launch.ok) {
      return {
        unit: id,
        action: "start",
        ok: false,
        code: "start_failed",
        message: `${unit.label} failed to start: ${launch.message}`,
        via: launch.via
      };
    }

    await this.sleep(this.settleMs);
    return this.settledStartResult(unit, launch.via, launch.message);
  }

  private async settledStartResult(
    unit: ManagedUnit,
    via: LifecycleMechanism,
    launchMessage: string
  ): Promise<UnitActionResult> {
    const after = await this.status(unit.id);
    if (after.state === "running") {
      return {
        unit: unit.id,
        action: "start",
        ok: true,
        code: "started",
        message: `${unit.label} started (${launchMessage})`,
        via,
        status: after
      };
    }
    if (after.state === "indeterminate") {
      return {
        unit: unit.id,
        action: "start",
        ok: false,
        code: "indeterminate",
        message: `${unit.label} state is indeterminate after start: ${after.detail}`,
        via,
        status: after
      };
    }
    return {
      unit: unit.id,
      action: "start",
      ok: false,
      code: "start_failed",
      message: `${unit.label} is not running ${this.settleMs}ms after launch (${launchMessage})`,
      via,
      status: after
    };
  }

  async stop(id: UnitId, options: { force?: boolean } = {}): Promise<UnitActionResult> {
    const unit = this.getUnit(id);
    const before = await this.status(id);
    if (before.state === "stopped") {
      return {
        unit: id,
        action: "stop",
        ok: true,
        code: "already_stopped",
        message: `${unit.label} is not running`,
        status: before
      };
    }
    if (before.state === "unconfigured") {
      return {
        unit: id,
        action: "stop",
        ok: true,
        code: "not_configured",
        message: `${unit.label} is not configured: ${before.detail}`,
        status: before
      };
    }

    this.log(`stopping ${id}`);
    const terminated = await this.terminate(unit, false);
    if (!terminated.ok) {
      return {
        unit: id,
        action: "stop",
        ok: false,
        code: "stop_failed",
        message: `${unit.label} failed to stop: ${terminated.message}`,
        via: terminated.via
      };
    }

    await this.sleep(this.stopGraceMs);
    let after = await this.status(id);

    if (after.state === "running" && options.force) {
      this.log(`force stopping ${id}`);
      const killed = await this.terminate(unit, true);
      if (!killed.ok) {
        return {
          unit: id,
          action: "stop",
          ok: false,
          code: "stop_failed",
          message: `${unit.label} ignored SIGTERM and force stop failed: ${killed.message}`,
          via: killed.via,
          status: after
        };
      }
      await this.sleep(this.stopGraceMs);
      after = await this.status(id);
    }

    if (after.state === "stopped") {
      return {
        unit: id,
        action: "stop",
        ok: true,
        code: "stopped",
        message: `${unit.label} stopped (${terminated.message})`,
        via: terminated.via,
        status: after
      };
    }
    if (after.state === "indeterminate") {
      return {
        unit: id,
        action: "stop",
        ok: false,
        code: "indeterminate",
        message: `${unit.label} state is indeterminate after stop: ${after.detail}`,
        via: terminated.via,
        status: after
      };
    }
    return {
      unit: id,
      action: "stop",
      ok: false,
      code: "stop_failed",
      message: `${unit.label} is still running after ${this.stopGraceMs}ms grace period`,
      via: terminated.via,
      status: after
    };
  }

  private async terminate(unit: ManagedUnit, force: boolean): Promise<LifecycleOutcome> {
    try {
      return await unit.terminate({ force });
    } catch (error) {
      return { ok: false, via: "process-signal", message: errorMessage(error) };
    }
  }

  async restart(id: UnitId): Promise<UnitActionResult> {
    const unit = this.getUnit(id);

    if (unit.restartInPlace) {
      const before = await this.status(id);
      if (before.state === "running") {
        this.log(`restarting ${id} in place`);
        let outcome: LifecycleOutcome;
        try {
          outcome = await unit.restartInPlace();
        } catch (error) {
          outcome = { ok: false, via: "container-runtime", message: errorMessage(error) };
        }
        if (!outcome.ok) {
          return {
            unit: id,
            action: "restart",
            ok: false,
            code: "start_failed",
            message: `${unit.label} restart failed: ${outcome.message}`,
            via: outcome.via
          };
        }
        await this.sleep(this.settleMs);
        const settled = await this.settledStartResult(unit, outcome.via, outcome.message);
        return {
          ...settled,
          action: "restart",
          code: settled.ok ? "restarted" : settled.code,
          message: settled.ok ? `${unit.label} restarted` : settled.message,
          steps: [settled]
        };
      }
    }

    const stopped = await this.stop(id);
    if (stopped.code === "not_configured") {
      return { ...stopped, action: "restart", ok: false, steps: [stopped] };
    }
    if (stopped.code === "stop_failed") {
      return {
        unit: id,
        action: "restart",
        ok: false,
        code: "stop_failed",
        message: stopped.message,
        via: stopped.via,
        status: stopped.status,
        steps: [stopped]
      };
    }

    await this.sleep(this.restartDelayMs);
    const started = await this.start(id);
    return {
      unit: id,
      action: "restart",
      ok: started.ok,
      code: started.ok ? "restarted" : started.code,
      message: started.ok ? `${unit.label} restarted` : started.message,
      via: started.via,
      status: started.status,
      steps: [stopped, started]
    };
  }

  /** Restarts every managed unit, one at a time, in {@link RESTART_ORDER}. */
  async restartAll(): Promise<UnitActionResult[]> {
    const results: UnitActionResult[] = [];
    for (const id of RESTART_ORDER) {
      if (!this.units.has(id)) {
        continue;
      }
      results.push(await this.restart(id));
    }
    return results;
  }
}

import { errorMessage } from "../errors.js";
import {
  ContainerDetector,
  ContainerLabelDetector,
  InitSystemDetector,
  PidFileDetector,
  ProcessPatternDetector,
  readGatewayRecord,
  type UnitDetector
} from "./detectors.js";
import type {
  CommandResult,
  ContainerRuntime,
  DetachedSpawner,
  InitSystem,
  ProcessTable
} from "./system.js";

export type UnitId = "daemon" | "gateway" | "worker";

export const UNIT_IDS: readonly UnitId[] = ["daemon", "gateway", "worker"];

export type LifecycleMechanism = "init-system" | "detached-process" | "process-signal" | "container-runtime";

export interface LifecycleOutcome {
  ok: boolean;
  via: LifecycleMechanism;
  message: string;
}

export interface ManagedUnit {
  readonly id: UnitId;
  readonly label: string;
  readonly logPath?: string;
  /** Authoritative detector first; later entries are fallbacks. */
  readonly detectors: readonly UnitDetector[];
  launch(): Promise<LifecycleOutcome>;
  terminate(options: { force: boolean }): Promise<LifecycleOutcome>;
  restartInPlace?(): Promise<LifecycleOutcome>;
}

export interface LaunchCommand {
  command: string;
  args: readonly string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function commandOutcome(via: LifecycleMechanism, action: string, result: CommandResult): LifecycleOutcome {
  if (result.code === 0) {
    return { ok: true, via, message: `${action} succeeded` };
  }
  const stderr = result.stderr.trim();
  return {
    ok: false,
    via,
    message: `${action} exited with code ${result.code}${stderr ? `: ${stderr}` : ""}`
  };
}

export class InferenceDaemonUnit implements ManagedUnit {
  readonly id = "daemon";
  readonly label = "Inference daemon";
  readonly detectors: readonly UnitDetector[];

  constructor(
    private readonly options: {
      initSystem: InitSystem;
      processTable: ProcessTable;
      spawn: DetachedSpawner;
      initUnit: string;
      processPattern: string;
      launchCommand: LaunchCommand;
      logPath: string;
    }
  ) {
    this.detectors = [
      new InitSystemDetector(options.initSystem, options.initUnit),
      new ProcessPatternDetector(options.processTable, options.processPattern)
    ];
  }

  get logPath(): string {
    return this.options.logPath;
  }

  async launch(): Promise<LifecycleOutcome> {
    let preferredFailure: string;
    try {
      const result = await this.options.initSystem.start(this.options.initUnit);
      const outcome = commandOutcome("init-system", `systemctl start ${this.options.initUnit}`, result);
      if (outcome.ok) {
        return outcome;
      }
      preferredFailure = outcome.message;
    } catch (error) {
      preferredFailure = errorMessage(error);
    }

    try {
      const spawned = await this.options.spawn({
        ...this.options.launchCommand,
        logPath: this.options.logPath
      });
      return {
        ok: true,
        via: "detached-process",
        message: `init system unavailable (${preferredFailure}); started ${this.options.launchCommand.command} as pid ${spawned.pid}`
      };
    } catch (error) {
      return {
        ok: false,
        via: "detached-process",
        message: `init system start failed (${preferredFailure}); direct launch failed: ${errorMessage(error)}`
      };
    }
  }

  async terminate(options: { force: boolean }): Promise<LifecycleOutcome> {
    let managedByInit = false;
    try {
      managedByInit = await this.options.initSystem.isActive(this.options.initUnit);
    } catch {
      managedByInit = false;
    }

    if (managedByInit && !options.force) {
      const outcome = commandOutcome(
        "init-system",
        `systemctl stop ${this.options.initUnit}`,
        await this.options.initSystem.stop(this.options.initUnit)
      );
      if (outcome.ok) {
        return outcome;
      }
    }

    const signal = options.force ? "SIGKILL" : "SIGTERM";
    const matched = await this.options.processTable.signal(this.options.processPattern, signal);
    return {
      ok: matched,
      via: "process-signal",
      message: matched
        ? `sent ${signal} to processes matching "${this.options.processPattern}"`
        : `no process matching "${this.options.processPattern}"`
    };
  }
}

export class GatewayUnit implements ManagedUnit {
  readonly id = "gateway";
  readonly label = "Gateway";
  readonly detectors: readonly UnitDetector[];

  constructor(
    private readonly options: {
      processTable: ProcessTable;
      spawn: DetachedSpawner;
      recordPath: string;
      processPattern: string;
      launchCommand: LaunchCommand;
      logPath: string;
    }
  ) {
    this.detectors = [
      new PidFileDetector(options.processTable, options.recordPath),
      new ProcessPatternDetector(options.processTable, options.processPattern)
    ];
  }

  get logPath(): string {
    return this.options.logPath;
  }

  async launch(): Promise<LifecycleOutcome> {
    try {
      const spawned = await this.options.spawn({
        ...this.options.launchCommand,
        logPath: this.options.logPath
      });
      return { ok: true, via: "detached-process", message: `started gateway as pid ${spawned.pid}` };
    } catch (error) {
      return { ok: false, via: "detached-process", message: `gateway launch failed: ${errorMessage(error)}` };
    }
  }

  async terminate(options: { force: boolean }): Promise<LifecycleOutcome> {
    const signal = options.force ? "SIGKILL" : "SIGTERM";
    const record = readGatewayRecord(this.options.recordPath);
    if (record && this.options.processTable.isAlive(record.pid)) {
      const sent = this.options.processTable.kill(record.pid, signal);
      if (sent) {
        return { ok: true, via: "process-signal", message: `sent ${signal} to gateway pid ${record.pid}` };
      }
    }
    const matched = await this.options.processTable.signal(this.options.processPattern, signal);
    return {
      ok: matched,
      via: "process-signal",
      message: matched
        ? `sent ${signal} to processes matching "${this.options.processPattern}"`
        : `no process matching "${this.options.processPattern}"`
    };
  }
}

export class ContainerWorkerUnit implements ManagedUnit {
  readonly id = "worker";
  readonly label = "Container worker";
  readonly detectors: readonly UnitDetector[];

  constructor(
    private readonly runtime: ContainerRuntime,
    projectName = "worker"
  ) {
    this.detectors = [new ContainerDetector(runtime), new ContainerLabelDetector(runtime, projectName)];
  }

  async launch(): Promise<LifecycleOutcome> {
    try {
      return commandOutcome("container-runtime", "compose up -d", await this.runtime.up());
    } catch (error) {
      return { ok: false, via: "container-runtime", message: errorMessage(error) };
    }
  }

  async terminate(): Promise<LifecycleOutcome> {
    try {
      return commandOutcome("container-runtime", "compose stop", await this.runtime.stop());
    } catch (error) {
      return { ok: false, via: "container-runtime", message: errorMessage(error) };
    }
  }

  async restartInPlace(): Promise<LifecycleOutcome> {
    try {
      return commandOutcome("container-runtime", "compose restart", await this.runtime.restart());
    } catch (error) {
      return { ok: false, via: "container-runtime", message: errorMessage(error) };
    }
  }
}

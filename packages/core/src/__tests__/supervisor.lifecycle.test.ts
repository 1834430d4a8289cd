import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  ComposeContainerRuntime,
  ContainerWorkerUnit,
  composeProjectName,
  ServiceSupervisor,
  type DetectionResult,
  type LifecycleOutcome,
  type ManagedUnit,
  type UnitDetector,
  type UnitId
} from "../index.js";
import type { CommandResult, CommandRunner } from "../supervisor/system.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ferry-supervisor-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

const noSleep = async (): Promise<void> => undefined;

class FakeUnit implements ManagedUnit {
  readonly label: string;
  readonly detectors: readonly UnitDetector[];
  running: boolean;
  launches = 0;
  terminations: boolean[] = [];
  launchOutcome: LifecycleOutcome = { ok: true, via: "detached-process", message: "spawned" };
  /** When false the process ignores SIGTERM. */
  stopsOnTerm = true;
  comesUp = true;
  private readonly events: string[];
  private readonly delayMs: number;

  constructor(
    readonly id: UnitId,
    options: { running?: boolean; events?: string[]; delayMs?: number } = {}
  ) {
    this.label = `Fake ${id}`;
    this.running = options.running ?? false;
    this.events = options.events ?? [];
    this.delayMs = options.delayMs ?? 0;
    this.detectors = [
      {
        method: "process-pattern",
        detect: async (): Promise<DetectionResult> => ({
          method: "process-pattern",
          state: this.running ? "running" : "stopped",
          detail: this.running ? `${id} is up` : `${id} is down`
        })
      }
    ];
  }

  private async pause(): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
  }

  async launch(): Promise<LifecycleOutcome> {
    this.events.push(`${this.id}:launch:begin`);
    await this.pause();
    this.launches += 1;
    if (this.launchOutcome.ok && this.comesUp) {
      this.running = true;
    }
    this.events.push(`${this.id}:launch:end`);
    return this.launchOutcome;
  }

  async terminate(options: { force: boolean }): Promise<LifecycleOutcome> {
    this.events.push(`${this.id}:terminate:begin`);
    await this.pause();
    this.terminations.push(options.force);
    if (options.force || this.stopsOnTerm) {
      this.running = false;
    }
    this.events.push(`${this.id}:terminate:end`);
    return { ok: true, via: "process-signal", message: options.force ? "sent SIGKILL" : "sent SIGTERM" };
  }
}

function staticDetector(result: DetectionResult | Error): UnitDetector {
  return {
    method: result instanceof Error ? "init-system" : result.method,
    detect: async () => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }
  };
}

function unitWithDetectors(detectors: UnitDetector[]): ManagedUnit {
  return {
    id: "daemon",
    label: "Inference daemon",
    detectors,
    launch: async () => ({ ok: true, via: "init-system", message: "started" }),
    terminate: async () => ({ ok: true, via: "init-system", message: "stopped" })
  };
}

describe("supervisor status", () => {
  it("falls back to the next detector when the first one fails", async () => {
    const supervisor = new ServiceSupervisor([
      unitWithDetectors([
        staticDetector(new Error("systemctl crashed")),
        staticDetector({ method: "process-pattern", state: "running", detail: "pid 42" })
      ])
    ]);

    const status = await supervisor.status("daemon");

    expect(status.state).toBe("running");
    expect(status.via).toBe("process-pattern");
    expect(status.observations).toEqual([
      { method: "init-system", state: "error", detail: "systemctl crashed" },
      { method: "process-pattern", state: "running", detail: "pid 42" }
    ]);
  });

  it("reports stopped when every detector that can answer says stopped", async () => {
    const supervisor = new ServiceSupervisor([
      unitWithDetectors([
        staticDetector({ method: "init-system", state: "unavailable", detail: "systemctl is not available on this host" }),
        staticDetector({ method: "process-pattern", state: "stopped", detail: "no process" })
      ])
    ]);

    const status = await supervisor.status("daemon");

    expect(status.state).toBe("stopped");
    expect(status.detail).toBe("no process");
  });

  it("reports indeterminate when a failing detector leaves the answer open", async () => {
    const supervisor = new ServiceSupervisor([
      unitWithDetectors([
        staticDetector(new Error("permission denied")),
        staticDetector({ method: "process-pattern", state: "stopped", detail: "no process" })
      ])
    ]);

    const status = await supervisor.status("daemon");

    expect(status.state).toBe("indeterminate");
    expect(status.detail).toBe("init-system: permission denied; process-pattern: no process");
  });

  it("reports indeterminate when no detector can answer", async () => {
    const supervisor = new ServiceSupervisor([
      unitWithDetectors([
        staticDetector({ method: "init-system", state: "unavailable", detail: "systemctl is not available on this host" })
      ])
    ]);

    await expect(supervisor.status("daemon")).resolves.toMatchObject({ state: "indeterminate" });
  });

  it("maps partial container counts to indeterminate", async () => {
    const supervisor = new ServiceSupervisor([
      unitWithDetectors([
        staticDetector({
          method: "container-runtime",
          state: "partial",
          detail: "1 of 2 services running",
          counts: { running: 1, total: 2 }
        })
      ])
    ]);

    const status = await supervisor.status("daemon");

    expect(status.state).toBe("indeterminate");
    expect(status.detail).toBe("partially running: 1 of 2 services running");
    expect(status.counts).toEqual({ running: 1, total: 2 });
  });
});

describe("supervisor start and stop", () => {
  it("does not launch a unit that is already running", async () => {
    const unit = new FakeUnit("daemon", { running: true });
    const supervisor = new ServiceSupervisor([unit], { sleep: noSleep });

    const result = await supervisor.start("daemon");

    expect(result.code).toBe("already_running");
    expect(result.ok).toBe(true);
    expect(unit.launches).toBe(0);
  });

  it("launches a stopped unit and waits for it to settle", async () => {
    const unit = new FakeUnit("daemon");
    const sleeps: number[] = [];
    const supervisor = new ServiceSupervisor([unit], {
      settleMs: 250,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    });

    const result = await supervisor.start("daemon");

    expect(result.code).toBe("started");
    expect(result.message).toBe("Fake daemon started (spawned)");
    expect(result.via).toBe("detached-process");
    expect(sleeps).toEqual([250]);
  });

  it("reports start_failed when the launch is refused", async () => {
    const unit = new FakeUnit("daemon");
    unit.launchOutcome = { ok: false, via: "init-system", message: "unit not found" };
    const supervisor = new ServiceSupervisor([unit], { sleep: noSleep });

    const result = await supervisor.start("daemon");

    expect(result).toMatchObject({
      ok: false,
      code: "start_failed",
      message: "Fake daemon failed to start: unit not found"
    });
  });

  it("reports start_failed when the unit is not up after the settle delay", async () => {
    const unit = new FakeUnit("gateway");
    unit.comesUp = false;
    const supervisor = new ServiceSupervisor([unit], { settleMs: 10, sleep: noSleep });

    const result = await supervisor.start("gateway");

    expect(result.code).toBe("start_failed");
    expect(result.message).toBe("Fake gateway is not running 10ms after launch (spawned)");
  });

  it("reports already_stopped without terminating", async () => {
    const unit = new FakeUnit("gateway");
    const supervisor = new ServiceSupervisor([unit], { sleep: noSleep });

    const result = await supervisor.stop("gateway");

    expect(result.code).toBe("already_stopped");
    expect(unit.terminations).toEqual([]);
  });

  it("stops a running unit with a graceful signal", async () => {
    const unit = new FakeUnit("gateway", { running: true });
    const supervisor = new ServiceSupervisor([unit], { sleep: noSleep });

    const result = await supervisor.stop("gateway");

    expect(result.code).toBe("stopped");
    expect(unit.terminations).toEqual([false]);
  });

  it("reports stop_failed when the unit ignores SIGTERM and force is not set", async () => {
    const unit = new FakeUnit("gateway", { running: true });
    unit.stopsOnTerm = false;
    const supervisor = new ServiceSupervisor([unit], { stopGraceMs: 20, sleep: noSleep });

    const result = await supervisor.stop("gateway");

    expect(result.code).toBe("stop_failed");
    expect(result.message).toBe("Fake gateway is still running after 20ms grace period");
    expect(unit.terminations).toEqual([false]);
  });

  it("escalates to a forced kill when asked", async () => {
    const unit = new FakeUnit("gateway", { running: true });
    unit.stopsOnTerm = false;
    const supervisor = new ServiceSupervisor([unit], { sleep: noSleep });

    const result = await supervisor.stop("gateway", { force: true });

    expect(result.code).toBe("stopped");
    expect(unit.terminations).toEqual([false, true]);
  });
});

describe("supervisor restart", () => {
  it("does not start again when the stop fails", async () => {
    const unit = new FakeUnit("daemon", { running: true });
    unit.stopsOnTerm = false;
    const supervisor = new ServiceSupervisor([unit], { sleep: noSleep });

    const result = await supervisor.restart("daemon");

    expect(result.code).toBe("stop_failed");
    expect(result.ok).toBe(false);
    expect(unit.launches).toBe(0);
  });

  it("waits the restart delay between stop and start", async () => {
    const unit = new FakeUnit("daemon", { running: true });
    const sleeps: number[] = [];
    const supervisor = new ServiceSupervisor([unit], {
      settleMs: 1,
      stopGraceMs: 2,
      restartDelayMs: 3,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    });

    const result = await supervisor.restart("daemon");

    expect(result.code).toBe("restarted");
    expect(result.steps?.map((step) => step.code)).toEqual(["stopped", "started"]);
    expect(sleeps).toEqual([2, 3, 1]);
  });

  it("restarts units strictly in order, each finishing before the next begins", async () => {
    const events: string[] = [];
    const supervisor = new ServiceSupervisor(
      [
        new FakeUnit("worker", { running: true, events, delayMs: 1 }),
        new FakeUnit("gateway", { running: true, events, delayMs: 15 }),
        new FakeUnit("daemon", { running: true, events, delayMs: 30 })
      ],
      { sleep: noSleep }
    );

    const results = await supervisor.restartAll();

    expect(results.map((result) => [result.unit, result.code])).toEqual([
      ["daemon", "restarted"],
      ["gateway", "restarted"],
      ["worker", "restarted"]
    ]);
    expect(events).toEqual([
      "daemon:terminate:begin",
      "daemon:terminate:end",
      "daemon:launch:begin",
      "daemon:launch:end",
      "gateway:terminate:begin",
      "gateway:terminate:end",
      "gateway:launch:begin",
      "gateway:launch:end",
      "worker:terminate:begin",
      "worker:terminate:end",
      "worker:launch:begin",
      "worker:launch:end"
    ]);
  });

  it("skips units that are not managed", async () => {
    const supervisor = new ServiceSupervisor([new FakeUnit("gateway", { running: true })], { sleep: noSleep });

    const results = await supervisor.restartAll();

    expect(results.map((result) => result.unit)).toEqual(["gateway"]);
  });
});

describe("container worker unit", () => {
  function composeRunner(
    state: { services: string[]; running: string[]; configFails?: boolean; labelled?: string[] },
    calls: string[][]
  ): CommandRunner {
    return async (file, args): Promise<CommandResult> => {
      calls.push([file, ...args]);
      const joined = args.join(" ");
      if (joined.startsWith("ps --filter label=com.docker.compose.project=")) {
        return { code: 0, stdout: (state.labelled ?? state.running).join("\n"), stderr: "" };
      }
      if (joined === "compose config --services" && state.configFails) {
        return { code: 15, stdout: "", stderr: "yaml: line 3: mapping values are not allowed here" };
      }
      if (joined === "compose config --services") {
        return { code: 0, stdout: state.services.map((entry) => `${entry}\n`).join(""), stderr: "" };
      }
      if (joined === "compose ps --services --filter status=running") {
        return { code: 0, stdout: state.running.join("\n"), stderr: "" };
      }
      if (joined === "compose up -d" || joined === "compose restart") {
        state.running = [...state.services];
        return { code: 0, stdout: "", stderr: "" };
      }
      if (joined === "compose stop") {
        state.running = [];
        return { code: 0, stdout: "", stderr: "" };
      }
      return { code: 1, stdout: "", stderr: `unexpected: ${joined}` };
    };
  }

  it("treats a project with no services as stopped", async () => {
    const calls: string[][] = [];
    const runtime = new ComposeContainerRuntime({
      projectDir: makeTempDir(),
      runner: composeRunner({ services: [], running: [] }, calls)
    });
    const supervisor = new ServiceSupervisor([new ContainerWorkerUnit(runtime)], { sleep: noSleep });

    const status = await supervisor.status("worker");

    expect(status.state).toBe("stopped");
    expect(status.counts).toEqual({ running: 0, total: 0 });
  });

  it("reports indeterminate when only some services run", async () => {
    const calls: string[][] = [];
    const runtime = new ComposeContainerRuntime({
      projectDir: makeTempDir(),
      runner: composeRunner({ services: ["api", "worker"], running: ["worker"] }, calls)
    });
    const supervisor = new ServiceSupervisor([new ContainerWorkerUnit(runtime)], { sleep: noSleep });

    const status = await supervisor.status("worker");

    expect(status.state).toBe("indeterminate");
    expect(status.detail).toBe("partially running: 1 of 2 services running");
  });

  it("restarts a running worker in place", async () => {
    const calls: string[][] = [];
    const runtime = new ComposeContainerRuntime({
      projectDir: makeTempDir(),
      runner: composeRunner({ services: ["worker"], running: ["worker"] }, calls)
    });
    const supervisor = new ServiceSupervisor([new ContainerWorkerUnit(runtime)], { sleep: noSleep });

    const result = await supervisor.restart("worker");

    expect(result.code).toBe("restarted");
    expect(calls.map((call) => call.slice(1).join(" "))).toContain("compose restart");
    expect(calls.map((call) => call.slice(1).join(" "))).not.toContain("compose stop");
  });

  it("brings a stopped worker up with compose up", async () => {
    const calls: string[][] = [];
    const runtime = new ComposeContainerRuntime({
      projectDir: makeTempDir(),
      runner: composeRunner({ services: ["worker"], running: [] }, calls)
    });
    const supervisor = new ServiceSupervisor([new ContainerWorkerUnit(runtime)], { sleep: noSleep });

    const result = await supervisor.start("worker");

    expect(result.code).toBe("started");
    expect(result.message).toBe("Container worker started (compose up -d succeeded)");
    expect(calls).toContainEqual(["docker", "compose", "up", "-d"]);
  });

  it("reports a missing worker directory as unconfigured and does not launch", async () => {
    const calls: string[][] = [];
    const projectDir = path.join(makeTempDir(), "missing-worker");
    const runtime = new ComposeContainerRuntime({
      projectDir,
      runner: composeRunner({ services: ["worker"], running: [], labelled: [] }, calls)
    });
    const supervisor = new ServiceSupervisor([new ContainerWorkerUnit(runtime, "missing-worker")], {
      sleep: noSleep
    });

    const status = await supervisor.status("worker");
    const started = await supervisor.start("worker");
    const restarted = await supervisor.restart("worker");

    expect(status.state).toBe("unconfigured");
    expect(status.detail).toBe(`Worker directory not found: ${projectDir}`);
    expect(status.observations).toEqual([
      { method: "container-runtime", state: "unconfigured", detail: `Worker directory not found: ${projectDir}` },
      { method: "container-label", state: "stopped", detail: "no running containers for project missing-worker" }
    ]);
    expect(started).toMatchObject({ ok: false, code: "not_configured" });
    expect(started.message).toBe(`Container worker is not configured: Worker directory not found: ${projectDir}`);
    expect(restarted).toMatchObject({ action: "restart", ok: false, code: "not_configured" });
    expect(calls.every((call) => call[1] === "ps")).toBe(true);
  });

  it("falls back to container labels when compose cannot read the project", async () => {
    const calls: string[][] = [];
    const runtime = new ComposeContainerRuntime({
      projectDir: makeTempDir(),
      projectName: "ferry-worker",
      runner: composeRunner({ services: [], running: [], configFails: true, labelled: ["api", "api", "queue"] }, calls)
    });
    const supervisor = new ServiceSupervisor([new ContainerWorkerUnit(runtime, "ferry-worker")], { sleep: noSleep });

    const status = await supervisor.status("worker");

    expect(status.state).toBe("running");
    expect(status.via).toBe("container-label");
    expect(status.detail).toBe("project ferry-worker has running containers: api, queue");
    expect(calls).toContainEqual([
      "docker",
      "ps",
      "--filter",
      "label=com.docker.compose.project=ferry-worker",
      "--filter",
      "status=running",
      "--format",
      '{{.Label "com.docker.compose.service"}}'
    ]);
  });

  it("is indeterminate when compose fails and no labelled container runs", async () => {
    const runtime = new ComposeContainerRuntime({
      projectDir: makeTempDir(),
      projectName: "ferry-worker",
      runner: composeRunner({ services: [], running: [], configFails: true, labelled: [] }, [])
    });
    const supervisor = new ServiceSupervisor([new ContainerWorkerUnit(runtime, "ferry-worker")], { sleep: noSleep });

    const status = await supervisor.status("worker");

    expect(status.state).toBe("indeterminate");
    expect(status.detail).toBe(
      "container-runtime: compose config exited with code 15: yaml: line 3: mapping values are not allowed here; " +
        "container-label: no running containers for project ferry-worker"
    );
  });

  it.each([
    ["/srv/worker", "worker"],
    ["/home/me/My Worker.v2", "myworkerv2"],
    ["/opt/ferry_worker-1", "ferry_worker-1"]
  ])("derives the compose project name of %s", (dir, expected) => {
    expect(composeProjectName(dir)).toBe(expected);
  });
});

import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  BackendClient,
  ComposeContainerRuntime,
  composeProjectName,
  ContainerWorkerUnit,
  GatewayUnit,
  InferenceDaemonUnit,
  PgrepProcessTable,
  ServiceSupervisor,
  SystemctlInitSystem,
  defaultCommandRunner,
  spawnDetached,
  type CommandRunner,
  type ContainerRuntime,
  type DetachedSpawner,
  type InitSystem,
  type ManagedUnit,
  type ProcessTable,
  type ResolvedFerryConfig
} from "@ferry/core";
import { log } from "./runtime-common.js";

/** Marker argument that makes the detached gateway findable by process pattern. */
export const GATEWAY_PROCESS_NAME = "ferry-gateway";

export interface CliContext {
  config: ResolvedFerryConfig;
  backend: BackendClient;
  supervisor: ServiceSupervisor;
  processTable: ProcessTable;
  initSystem: InitSystem;
  containerRuntime: ContainerRuntime;
  runner: CommandRunner;
}

export interface CliContextOverrides {
  runner?: CommandRunner;
  spawn?: DetachedSpawner;
  processTable?: ProcessTable;
  initSystem?: InitSystem;
  containerRuntime?: ContainerRuntime;
  sleep?: (ms: number) => Promise<void>;
}

function binPath(): string {
  const modulePath = fileURLToPath(import.meta.url);
  return path.join(path.dirname(modulePath), `bin${path.extname(modulePath)}`);
}

/** Command line that re-enters this CLI in foreground gateway mode. */
export function gatewayLaunchCommand(): { command: string; args: string[] } {
  return {
    command: process.execPath,
    args: [...process.execArgv, binPath(), "gateway", "--name", GATEWAY_PROCESS_NAME]
  };
}

export function createCliContext(config: ResolvedFerryConfig, overrides: CliContextOverrides = {}): CliContext {
  const runner = overrides.runner ?? defaultCommandRunner;
  const spawn = overrides.spawn ?? spawnDetached;
  const processTable = overrides.processTable ?? new PgrepProcessTable(runner);
  const initSystem = overrides.initSystem ?? new SystemctlInitSystem(runner, { sudo: config.daemon.useSudo });
  const containerRuntime =
    overrides.containerRuntime ??
    new ComposeContainerRuntime({
      projectDir: config.worker.composeDir,
      command: config.worker.composeCommand,
      runner
    });

  const [daemonCommand = "ollama", ...daemonArgs] = config.daemon.command;
  const units: ManagedUnit[] = [
    new InferenceDaemonUnit({
      initSystem,
      processTable,
      spawn,
      initUnit: config.daemon.initUnit,
      processPattern: config.daemon.processPattern,
      launchCommand: { command: daemonCommand, args: daemonArgs },
      logPath: config.daemon.logPath
    }),
    new GatewayUnit({
      processTable,
      spawn,
      recordPath: config.gatewayRecordPath,
      processPattern: GATEWAY_PROCESS_NAME,
      launchCommand: gatewayLaunchCommand(),
      logPath: config.gateway.logPath
    }),
    new ContainerWorkerUnit(containerRuntime, composeProjectName(config.worker.composeDir))
  ];

  return {
    config,
    backend: new BackendClient(config.backend),
    supervisor: new ServiceSupervisor(units, {
      ...config.supervisor,
      sleep: overrides.sleep,
      log
    }),
    processTable,
    initSystem,
    containerRuntime,
    runner
  };
}

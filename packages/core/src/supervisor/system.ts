import { execFile, spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);
const COMMAND_TIMEOUT_MS = 30_000;
const COMMAND_MAX_BUFFER = 8 * 1024 * 1024;

export const COMMAND_NOT_FOUND = 127;
export const COMMAND_TIMED_OUT = 124;

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: { cwd?: string; timeoutMs?: number }
) => Promise<CommandResult>;

function toText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Buffer) {
    return value.toString("utf8");
  }
  return "";
}

function field(value: unknown, key: string): unknown {
  return value && typeof value === "object" ? (value as Record<string, unknown>)[key] : undefined;
}

/** Never rejects for a non-zero exit; the exit code is part of the result. */
export const defaultCommandRunner: CommandRunner = async (file, args, options = {}) => {
  try {
    const result = await execFileAsync(file, [...args], {
      cwd: options.cwd,
      timeout: options.timeoutMs ?? COMMAND_TIMEOUT_MS,
      maxBuffer: COMMAND_MAX_BUFFER,
      encoding: "utf8"
    });
    return { code: 0, stdout: toText(result.stdout), stderr: toText(result.stderr) };
  } catch (error) {
    const code = field(error, "code");
    const stdout = toText(field(error, "stdout"));
    const stderr = toText(field(error, "stderr")) || (error instanceof Error ? error.message : String(error));
    if (code === "ENOENT") {
      return { code: COMMAND_NOT_FOUND, stdout, stderr: `${file}: command not found` };
    }
    if (field(error, "killed") === true) {
      return { code: COMMAND_TIMED_OUT, stdout, stderr: `${file} timed out` };
    }
    return { code: typeof code === "number" ? code : 1, stdout, stderr };
  }
};

export class CommandUnavailableError extends Error {
  constructor(public readonly command: string) {
    super(`${command} is not available on this host`);
    this.name = "CommandUnavailableError";
  }
}

/** The worker's compose directory does not exist, so there is nothing to run. */
export class WorkerNotConfiguredError extends Error {
  constructor(public readonly projectDir: string) {
    super(`Worker directory not found: ${projectDir}`);
    this.name = "WorkerNotConfiguredError";
  }
}

function describeFailure(command: string, result: CommandResult): string {
  const stderr = result.stderr.trim();
  return `${command} exited with code ${result.code}${stderr ? `: ${stderr}` : ""}`;
}

export interface InitSystem {
  isActive(unit: string): Promise<boolean>;
  start(unit: string): Promise<CommandResult>;
  stop(unit: string): Promise<CommandResult>;
}

export class SystemctlInitSystem implements InitSystem {
  constructor(
    private readonly runner: CommandRunner = defaultCommandRunner,
    private readonly options: { sudo?: boolean } = {}
  ) {}

  async isActive(unit: string): Promise<boolean> {
    const result = await this.runner("systemctl", ["is-active", "--quiet", unit]);
    if (result.code === COMMAND_NOT_FOUND) {
      throw new CommandUnavailableError("systemctl");
    }
    return result.code === 0;
  }

  async start(unit: string): Promise<CommandResult> {
    return await this.control("start", unit);
  }

  async stop(unit: string): Promise<CommandResult> {
    return await this.control("stop", unit);
  }

  private async control(action: "start" | "stop", unit: string): Promise<CommandResult> {
    // -n keeps sudo from blocking on a password prompt.
    return this.options.sudo
      ? await this.runner("sudo", ["-n", "systemctl", action, unit])
      : await this.runner("systemctl", [action, unit]);
  }
}

export interface ProcessTable {
  find(pattern: string): Promise<number[]>;
  signal(pattern: string, signal: NodeJS.Signals): Promise<boolean>;
  isAlive(pid: number): boolean;
  kill(pid: number, signal: NodeJS.Signals): boolean;
}

export class PgrepProcessTable implements ProcessTable {
  constructor(private readonly runner: CommandRunner = defaultCommandRunner) {}

  async find(pattern: string): Promise<number[]> {
    const result = await this.runner("pgrep", ["-f", pattern]);
    if (result.code === COMMAND_NOT_FOUND) {
      throw new CommandUnavailableError("pgrep");
    }
    if (result.code === 1) {
      return [];
    }
    if (result.code !== 0) {
      throw new Error(describeFailure("pgrep", result));
    }
    return result.stdout
      .split("\n")
      .map((entry) => Number.parseInt(entry.trim(), 10))
      .filter((pid) => Number.isInteger(pid) && pid > 0 && pid !== process.pid);
  }

  async signal(pattern: string, signal: NodeJS.Signals): Promise<boolean> {
    const result = await this.runner("pkill", [`-${signal.replace(/^SIG/, "")}`, "-f", pattern]);
    if (result.code === COMMAND_NOT_FOUND) {
      throw new CommandUnavailableError("pkill");
    }
    if (result.code > 1) {
      throw new Error(describeFailure("pkill", result));
    }
    return result.code === 0;
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      return (error as NodeJS.ErrnoException).code === "EPERM";
    }
  }

  kill(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ESRCH") {
        return false;
      }
      throw error;
    }
  }
}

export interface ContainerCounts {
  running: number;
  total: number;
}

export interface ContainerRuntime {
  listServices(): Promise<string[]>;
  countRunning(): Promise<ContainerCounts>;
  /** Services with a running container labelled with this compose project; needs no project directory. */
  listRunningContainers(): Promise<string[]>;
  up(): Promise<CommandResult>;
  restart(): Promise<CommandResult>;
  stop(): Promise<CommandResult>;
  prune(): Promise<CommandResult>;
  logs(lines: number): Promise<CommandResult>;
}

function splitLines(text: string): string[] {
  return text
    .split("\n")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Compose's default project name: the directory name, lowercased, without other characters. */
export function composeProjectName(projectDir: string): string {
  return path.basename(projectDir).toLowerCase().replace(/[^a-z0-9_-]/g, "");
}

export class ComposeContainerRuntime implements ContainerRuntime {
  constructor(
    private readonly options: {
      projectDir: string;
      projectName?: string;
      command?: readonly string[];
      runner?: CommandRunner;
    }
  ) {}

  get projectName(): string {
    return this.options.projectName ?? composeProjectName(this.options.projectDir);
  }

  private get runner(): CommandRunner {
    return this.options.runner ?? defaultCommandRunner;
  }

  private get command(): readonly string[] {
    return this.options.command ?? ["docker", "compose"];
  }

  private async compose(args: readonly string[], timeoutMs?: number): Promise<CommandResult> {
    if (!fs.existsSync(this.options.projectDir)) {
      throw new WorkerNotConfiguredError(this.options.projectDir);
    }
    const [file = "docker", ...prefix] = this.command;
    const result = await this.runner(file, [...prefix, ...args], {
      cwd: this.options.projectDir,
      timeoutMs
    });
    if (result.code === COMMAND_NOT_FOUND) {
      throw new CommandUnavailableError(this.command.join(" "));
    }
    return result;
  }

  async listServices(): Promise<string[]> {
    const result = await this.compose(["config", "--services"]);
    if (result.code !== 0) {
      throw new Error(describeFailure("compose config", result));
    }
    return splitLines(result.stdout);
  }

  async countRunning(): Promise<ContainerCounts> {
    const total = await this.listServices();
    const running = await this.compose(["ps", "--services", "--filter", "status=running"]);
    if (running.code !== 0) {
      throw new Error(describeFailure("compose ps", running));
    }
    const defined = new Set(total);
    return {
      running: splitLines(running.stdout).filter((service) => defined.has(service)).length,
      total: total.length
    };
  }

  async listRunningContainers(): Promise<string[]> {
    const [file = "docker"] = this.command;
    const result = await this.runner(file, [
      "ps",
      "--filter",
      `label=com.docker.compose.project=${this.projectName}`,
      "--filter",
      "status=running",
      "--format",
      '{{.Label "com.docker.compose.service"}}'
    ]);
    if (result.code === COMMAND_NOT_FOUND) {
      throw new CommandUnavailableError(file);
    }
    if (result.code !== 0) {
      throw new Error(describeFailure(`${file} ps`, result));
    }
    return [...new Set(splitLines(result.stdout))];
  }

  async up(): Promise<CommandResult> {
    return await this.compose(["up", "-d"], 10 * 60 * 1000);
  }

  async restart(): Promise<CommandResult> {
    return await this.compose(["restart"], 5 * 60 * 1000);
  }

  async stop(): Promise<CommandResult> {
    return await this.compose(["stop"], 5 * 60 * 1000);
  }

  async prune(): Promise<CommandResult> {
    const [file = "docker"] = this.command;
    return await this.runner(file, ["system", "prune", "-f"], { timeoutMs: 10 * 60 * 1000 });
  }

  async logs(lines: number): Promise<CommandResult> {
    return await this.compose(["logs", "--no-color", "--tail", String(lines)]);
  }
}

export interface DetachedProcess {
  pid: number;
  logPath: string;
}

export interface DetachedSpawnRequest {
  command: string;
  args: readonly string[];
  logPath: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type DetachedSpawner = (request: DetachedSpawnRequest) => Promise<DetachedProcess>;

/**
 * Starts a child in its own process group with stdout/stderr appended to
 * `logPath`. The child outlives the caller: nothing here waits for it to exit.
 */
export const spawnDetached: DetachedSpawner = async (request) => {
  fs.mkdirSync(path.dirname(request.logPath), { recursive: true });
  const logFd = fs.openSync(request.logPath, "a");
  try {
    const child = spawn(request.command, [...request.args], {
      detached: true,
      stdio: ["ignore", logFd, logFd],
      cwd: request.cwd,
      env: request.env ?? process.env
    });
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      child.once("error", onError);
      child.once("spawn", () => {
        child.off("error", onError);
        resolve();
      });
    });
    if (child.pid === undefined) {
      throw new Error(`failed to start ${request.command} (missing pid)`);
    }
    child.unref();
    return { pid: child.pid, logPath: request.logPath };
  } finally {
    fs.closeSync(logFd);
  }
};

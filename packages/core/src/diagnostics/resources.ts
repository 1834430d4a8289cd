import fs from "node:fs/promises";
import os from "node:os";
import { errorMessage } from "../errors.js";
import { COMMAND_NOT_FOUND, defaultCommandRunner, type CommandRunner } from "../supervisor/system.js";

export interface MemorySnapshot {
  totalBytes: number;
  usedBytes: number;
  availableBytes: number;
}

export interface DiskSnapshot {
  path: string;
  totalBytes: number;
  availableBytes: number;
  /** Rounded up, the way df reports Use%. */
  usedPercent: number;
}

export interface AcceleratorSnapshot {
  name: string;
  memoryTotalMiB: number;
  memoryUsedMiB: number;
}

export interface ResourceSnapshot {
  memory: MemorySnapshot;
  disk: DiskSnapshot;
  loadAverage: [number, number, number];
  cpuCount: number;
  accelerators: AcceleratorSnapshot[];
  /** Set when nvidia-smi is installed but failed; the other readings are still valid. */
  acceleratorError?: string;
}

/** Parses /proc/meminfo; returns null when MemTotal is missing. */
export function parseMeminfo(text: string): MemorySnapshot | null {
  const values = new Map<string, number>();
  for (const line of text.split("\n")) {
    const match = line.match(/^(\w+):\s+(\d+)\s*kB/);
    if (match?.[1] && match[2]) {
      values.set(match[1], Number.parseInt(match[2], 10) * 1024);
    }
  }
  const total = values.get("MemTotal");
  if (total === undefined) {
    return null;
  }
  const available = values.get("MemAvailable") ?? values.get("MemFree") ?? 0;
  return { totalBytes: total, availableBytes: available, usedBytes: total - available };
}

export async function readMemory(meminfoPath = "/proc/meminfo"): Promise<MemorySnapshot> {
  try {
    const parsed = parseMeminfo(await fs.readFile(meminfoPath, "utf8"));
    if (parsed) {
      return parsed;
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }
  const total = os.totalmem();
  const free = os.freemem();
  return { totalBytes: total, availableBytes: free, usedBytes: total - free };
}

export function diskUsageFromStatfs(
  diskPath: string,
  stats: { bsize: number; blocks: number; bfree: number; bavail: number }
): DiskSnapshot {
  const usedBlocks = stats.blocks - stats.bfree;
  const visibleBlocks = usedBlocks + stats.bavail;
  return {
    path: diskPath,
    totalBytes: stats.blocks * stats.bsize,
    availableBytes: stats.bavail * stats.bsize,
    usedPercent: visibleBlocks > 0 ? Math.ceil((usedBlocks / visibleBlocks) * 100) : 0
  };
}

export async function readDisk(diskPath: string): Promise<DiskSnapshot> {
  return diskUsageFromStatfs(diskPath, await fs.statfs(diskPath));
}

/** Parses `nvidia-smi --query-gpu=name,memory.total,memory.used --format=csv,noheader,nounits`. */
export function parseNvidiaSmi(output: string): AcceleratorSnapshot[] {
  const accelerators: AcceleratorSnapshot[] = [];
  for (const line of output.split("\n")) {
    const parts = line.split(",").map((part) => part.trim());
    if (parts.length < 3) {
      continue;
    }
    const [name = "", total = "", used = ""] = parts;
    const memoryTotalMiB = Number.parseInt(total, 10);
    const memoryUsedMiB = Number.parseInt(used, 10);
    if (!name || Number.isNaN(memoryTotalMiB) || Number.isNaN(memoryUsedMiB)) {
      continue;
    }
    accelerators.push({ name, memoryTotalMiB, memoryUsedMiB });
  }
  return accelerators;
}

export async function readAccelerators(runner: CommandRunner = defaultCommandRunner): Promise<AcceleratorSnapshot[]> {
  const result = await runner(
    "nvidia-smi",
    ["--query-gpu=name,memory.total,memory.used", "--format=csv,noheader,nounits"],
    { timeoutMs: 10_000 }
  );
  if (result.code === COMMAND_NOT_FOUND) {
    return [];
  }
  if (result.code !== 0) {
    throw new Error(`nvidia-smi exited with code ${result.code}: ${result.stderr.trim()}`);
  }
  return parseNvidiaSmi(result.stdout);
}

export async function collectResources(options: {
  diskPath: string;
  runner?: CommandRunner;
  meminfoPath?: string;
}): Promise<ResourceSnapshot> {
  const [memory, disk, accelerators] = await Promise.all([
    readMemory(options.meminfoPath),
    readDisk(options.diskPath),
    readAccelerators(options.runner).then(
      (found): { found: AcceleratorSnapshot[]; error?: string } => ({ found }),
      (error: unknown) => ({ found: [], error: errorMessage(error) })
    )
  ]);
  const [one = 0, five = 0, fifteen = 0] = os.loadavg();
  return {
    memory,
    disk,
    loadAverage: [one, five, fifteen],
    cpuCount: os.cpus().length,
    accelerators: accelerators.found,
    ...(accelerators.error ? { acceleratorError: accelerators.error } : {})
  };
}

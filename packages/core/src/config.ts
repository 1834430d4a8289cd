import os from "node:os";
import path from "node:path";
import { z } from "zod";
import {
  BENCHMARK_PROMPT,
  BENCHMARK_TIMEOUT_MS,
  DEFAULT_BACKEND_URL,
  DEFAULT_BIND_RETRIES,
  DEFAULT_MODEL,
  DEFAULT_PORT_PROBE_TIMEOUT_MS,
  DEFAULT_PORT_RANGE,
  GENERATE_TIMEOUT_MS,
  HEALTH_TIMEOUT_MS,
  INFERENCE_PROBE_TIMEOUT_MS,
  SUPERVISOR_RESTART_DELAY_MS,
  SUPERVISOR_SETTLE_MS,
  SUPERVISOR_STOP_GRACE_MS
} from "./constants.js";
import { FerryError } from "./errors.js";

export interface PortRange {
  low: number;
  high: number;
}

export interface ModelCatalogEntry {
  name: string;
  description: string;
}

export interface FerryBackendConfig {
  baseUrl?: string;
  generateTimeoutMs?: number;
  healthTimeoutMs?: number;
}

export interface FerryGatewayConfig {
  host?: string;
  portRange?: PortRange;
  bindRetries?: number;
  probeTimeoutMs?: number;
  logPath?: string;
}

export interface FerryDaemonConfig {
  initUnit?: string;
  useSudo?: boolean;
  processPattern?: string;
  command?: string[];
  logPath?: string;
}

export interface FerryWorkerConfig {
  composeDir?: string;
  composeCommand?: string[];
}

export interface FerrySupervisorConfig {
  settleMs?: number;
  stopGraceMs?: number;
  restartDelayMs?: number;
}

export interface FerryDiagnosticsConfig {
  inferenceTimeoutMs?: number;
  benchmarkTimeoutMs?: number;
  benchmarkPrompt?: string;
  diskPath?: string;
}

export interface FerryModelsConfig {
  catalog?: ModelCatalogEntry[];
  fallback?: string;
}

export interface FerryConfig {
  stateDir?: string;
  backend?: FerryBackendConfig;
  gateway?: FerryGatewayConfig;
  daemon?: FerryDaemonConfig;
  worker?: FerryWorkerConfig;
  supervisor?: FerrySupervisorConfig;
  diagnostics?: FerryDiagnosticsConfig;
  models?: FerryModelsConfig;
}

export interface ResolvedFerryConfig {
  stateDir: string;
  persistedConfigPath: string;
  gatewayRecordPath: string;
  backend: Required<FerryBackendConfig>;
  gateway: Required<FerryGatewayConfig>;
  daemon: Required<FerryDaemonConfig>;
  worker: Required<FerryWorkerConfig>;
  supervisor: Required<FerrySupervisorConfig>;
  diagnostics: Required<FerryDiagnosticsConfig>;
  models: Required<FerryModelsConfig>;
}

const DEFAULT_MODEL_CATALOG: ModelCatalogEntry[] = [
  { name: "llama3.2:1b", description: "Lightweight, ~1GB" },
  { name: "llama3.2:3b", description: "Balanced, ~2GB" },
  { name: "llama3.1:8b", description: "High quality, ~4.7GB" },
  { name: "qwen2.5:7b", description: "Alternative, ~4.4GB" },
  { name: "mistral:7b", description: "Popular choice, ~4.1GB" }
];

const portSchema = z.number().int().min(1).max(65_535);
const timeoutSchema = z.number().int().positive();
const commandSchema = z.array(z.string().min(1)).min(1);

export const ferryConfigSchema = z
  .object({
    stateDir: z.string().min(1).optional(),
    backend: z
      .object({
        baseUrl: z.string().url().optional(),
        generateTimeoutMs: timeoutSchema.optional(),
        healthTimeoutMs: timeoutSchema.max(5_000).optional()
      })
      .optional(),
    gateway: z
      .object({
        host: z.string().min(1).optional(),
        portRange: z
          .object({ low: portSchema, high: portSchema })
          .refine((range) => range.low <= range.high, { message: "portRange.low must be <= portRange.high" })
          .optional(),
        bindRetries: z.number().int().min(0).max(10).optional(),
        probeTimeoutMs: timeoutSchema.optional(),
        logPath: z.string().min(1).optional()
      })
      .optional(),
    daemon: z
      .object({
        initUnit: z.string().min(1).optional(),
        useSudo: z.boolean().optional(),
        processPattern: z.string().min(1).optional(),
        command: commandSchema.optional(),
        logPath: z.string().min(1).optional()
      })
      .optional(),
    worker: z
      .object({
        composeDir: z.string().min(1).optional(),
        composeCommand: commandSchema.optional()
      })
      .optional(),
    supervisor: z
      .object({
        settleMs: z.number().int().min(0).optional(),
        stopGraceMs: z.number().int().min(0).optional(),
        restartDelayMs: z.number().int().min(0).optional()
      })
      .optional(),
    diagnostics: z
      .object({
        inferenceTimeoutMs: timeoutSchema.optional(),
        benchmarkTimeoutMs: timeoutSchema.optional(),
        benchmarkPrompt: z.string().min(1).optional(),
        diskPath: z.string().min(1).optional()
      })
      .optional(),
    models: z
      .object({
        catalog: z.array(z.object({ name: z.string().min(1), description: z.string() })).min(1).optional(),
        fallback: z.string().min(1).optional()
      })
      .optional()
  })
  .strict();

export function defineConfig<T extends FerryConfig>(config: T): T {
  return config;
}

export function parseFerryConfig(raw: unknown, source = "config"): FerryConfig {
  const parsed = ferryConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new FerryError("config_invalid", `Invalid ${source}: ${issues}`);
  }
  return parsed.data;
}

export function resolveFerryConfig(
  config: FerryConfig,
  options: { homeDir?: string } = {}
): ResolvedFerryConfig {
  const homeDir = options.homeDir ?? os.homedir();
  const stateDir = config.stateDir ?? path.join(homeDir, ".ferry");

  return {
    stateDir,
    persistedConfigPath: path.join(stateDir, "config.env"),
    gatewayRecordPath: path.join(stateDir, "gateway.json"),
    backend: {
      baseUrl: (config.backend?.baseUrl ?? DEFAULT_BACKEND_URL).replace(/\/+$/, ""),
      generateTimeoutMs: config.backend?.generateTimeoutMs ?? GENERATE_TIMEOUT_MS,
      healthTimeoutMs: config.backend?.healthTimeoutMs ?? HEALTH_TIMEOUT_MS
    },
    gateway: {
      host: config.gateway?.host ?? "0.0.0.0",
      portRange: config.gateway?.portRange ?? { ...DEFAULT_PORT_RANGE },
      bindRetries: config.gateway?.bindRetries ?? DEFAULT_BIND_RETRIES,
      probeTimeoutMs: config.gateway?.probeTimeoutMs ?? DEFAULT_PORT_PROBE_TIMEOUT_MS,
      logPath: config.gateway?.logPath ?? path.join(stateDir, "gateway.log")
    },
    daemon: {
      initUnit: config.daemon?.initUnit ?? "ollama",
      useSudo: config.daemon?.useSudo ?? true,
      processPattern: config.daemon?.processPattern ?? "ollama serve",
      command: config.daemon?.command ?? ["ollama", "serve"],
      logPath: config.daemon?.logPath ?? path.join(stateDir, "daemon.log")
    },
    worker: {
      composeDir: config.worker?.composeDir ?? path.join(stateDir, "worker"),
      composeCommand: config.worker?.composeCommand ?? ["docker", "compose"]
    },
    supervisor: {
      settleMs: config.supervisor?.settleMs ?? SUPERVISOR_SETTLE_MS,
      stopGraceMs: config.supervisor?.stopGraceMs ?? SUPERVISOR_STOP_GRACE_MS,
      restartDelayMs: config.supervisor?.restartDelayMs ?? SUPERVISOR_RESTART_DELAY_MS
    },
    diagnostics: {
      inferenceTimeoutMs: config.diagnostics?.inferenceTimeoutMs ?? INFERENCE_PROBE_TIMEOUT_MS,
      benchmarkTimeoutMs: config.diagnostics?.benchmarkTimeoutMs ?? BENCHMARK_TIMEOUT_MS,
      benchmarkPrompt: config.diagnostics?.benchmarkPrompt ?? BENCHMARK_PROMPT,
      diskPath: config.diagnostics?.diskPath ?? "/"
    },
    models: {
      catalog: config.models?.catalog ?? DEFAULT_MODEL_CATALOG,
      fallback: config.models?.fallback ?? DEFAULT_MODEL
    }
  };
}

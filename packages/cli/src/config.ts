import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import {
  parseFerryConfig,
  resolveFerryConfig,
  type FerryConfig,
  type ResolvedFerryConfig
} from "@ferry/core";
import { parse as parseDotEnv } from "dotenv";

export interface LoadedCliConfig {
  projectRoot: string;
  configPath: string | null;
  config: ResolvedFerryConfig;
}

const CONFIG_CANDIDATES = [
  "ferry.config.ts",
  "ferry.config.mts",
  "ferry.config.js",
  "ferry.config.mjs",
  "ferry.config.json"
];

const MAX_UNWRAP_DEPTH = 8;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object";
}

/** Follows `default` re-exports that CJS/ESM interop wraps around a config object. */
export function unwrapModuleDefault(value: unknown): unknown {
  let current = value;
  for (let depth = 0; depth < MAX_UNWRAP_DEPTH; depth += 1) {
    if (!isRecord(current) || !("default" in current)) {
      break;
    }
    const keys = Object.keys(current).filter((key) => key !== "__esModule");
    if (keys.length !== 1) {
      break;
    }
    const next = current.default;
    if (next === undefined || next === current) {
      break;
    }
    current = next;
  }
  return current;
}

async function importConfigModule(configPath: string): Promise<unknown> {
  const moduleUrl = pathToFileURL(configPath).href;
  if (configPath.endsWith(".ts") || configPath.endsWith(".mts")) {
    const { tsImport } = await import("tsx/esm/api");
    return await tsImport(moduleUrl, { parentURL: moduleUrl });
  }
  return await import(moduleUrl);
}

function loadProjectEnvFiles(projectRoot: string, env: NodeJS.ProcessEnv): void {
  // Variables already set in the shell win over .env files.
  const shellDefined = new Set(Object.keys(env));
  const merged: Record<string, string> = {};
  for (const candidate of [".env", ".env.local"]) {
    const filePath = path.join(projectRoot, candidate);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      continue;
    }
    Object.assign(merged, parseDotEnv(fs.readFileSync(filePath, "utf8")));
  }
  for (const [key, value] of Object.entries(merged)) {
    if (!shellDefined.has(key)) {
      env[key] = value;
    }
  }
}

async function readConfigFile(configPath: string): Promise<FerryConfig> {
  let raw: unknown;
  if (configPath.endsWith(".json")) {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } else {
    const loaded = await importConfigModule(configPath);
    raw = unwrapModuleDefault(isRecord(loaded) ? (loaded.config ?? loaded.default ?? loaded) : loaded);
  }
  return parseFerryConfig(raw, configPath);
}

function resolveMaybePath(projectRoot: string, filePath: string | undefined): string | undefined {
  if (!filePath) {
    return undefined;
  }
  return path.isAbsolute(filePath) ? filePath : path.resolve(projectRoot, filePath);
}

function applyEnvironment(projectRoot: string, config: FerryConfig, env: NodeJS.ProcessEnv): FerryConfig {
  const stateDir = env.FERRY_HOME?.trim() || config.stateDir;
  const backendUrl = env.FERRY_BACKEND_URL?.trim();
  return {
    ...config,
    stateDir: resolveMaybePath(projectRoot, stateDir),
    backend: backendUrl ? { ...config.backend, baseUrl: backendUrl } : config.backend,
    worker: config.worker
      ? { ...config.worker, composeDir: resolveMaybePath(projectRoot, config.worker.composeDir) }
      : undefined
  };
}

export async function loadCliConfig(
  projectRoot = process.cwd(),
  options: { env?: NodeJS.ProcessEnv; homeDir?: string } = {}
): Promise<LoadedCliConfig> {
  const resolvedRoot = path.resolve(projectRoot);
  const env = options.env ?? process.env;
  loadProjectEnvFiles(resolvedRoot, env);

  let configPath: string | null = null;
  for (const candidate of CONFIG_CANDIDATES) {
    const absolute = path.join(resolvedRoot, candidate);
    if (fs.existsSync(absolute) && fs.statSync(absolute).isFile()) {
      configPath = absolute;
      break;
    }
  }

  const fileConfig = configPath ? await readConfigFile(configPath) : {};
  const config = resolveFerryConfig(applyEnvironment(resolvedRoot, fileConfig, env), {
    homeDir: options.homeDir
  });

  return {
    projectRoot: resolvedRoot,
    configPath,
    config
  };
}

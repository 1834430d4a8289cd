import fs from "node:fs";
import path from "node:path";
import { parse as parseDotEnv } from "dotenv";
import { CONFIG_KEYS } from "./constants.js";
import { FerryError } from "./errors.js";

export interface PortAssignment {
  port: number;
  model: string;
}

export interface DriftCheck {
  ok: boolean;
  persistedPort: number | null;
  actualPort: number | null;
  message: string;
}

const ENV_LINE_PATTERN = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=/;

export function readPersistedConfig(filePath: string): Record<string, string> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw error;
  }
  return parseDotEnv(raw);
}

export function parsePort(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return null;
  }
  const port = Number.parseInt(value.trim(), 10);
  return port >= 1 && port <= 65_535 ? port : null;
}

export function readPortAssignment(filePath: string): PortAssignment | null {
  const values = readPersistedConfig(filePath);
  const rawPort = values[CONFIG_KEYS.port];
  const model = values[CONFIG_KEYS.model]?.trim() ?? "";
  if (rawPort === undefined && !model) {
    return null;
  }
  const port = parsePort(rawPort);
  if (port === null) {
    throw new FerryError(
      "config_invalid",
      `${CONFIG_KEYS.port} in ${filePath} must be an integer in [1, 65535] (got ${rawPort ?? "nothing"})`
    );
  }
  if (!model) {
    throw new FerryError("config_invalid", `${CONFIG_KEYS.model} is missing from ${filePath}`);
  }
  return { port, model };
}

function formatEnvValue(value: string): string {
  if (/^[A-Za-z0-9_./:@+-]*$/.test(value)) {
    return value;
  }
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Rewrites `KEY=value` lines in place and appends keys the file does not have yet.
 * Comments, blank lines and unrelated keys are kept as written.
 */
export function upsertEnvFile(filePath: string, updates: Record<string, string>): void {
  let existing = "";
  try {
    existing = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }

  const pending = new Map(Object.entries(updates));
  const lines = existing.length > 0 ? existing.replace(/\n$/, "").split("\n") : [];
  const next = lines.map((line) => {
    const key = line.match(ENV_LINE_PATTERN)?.[1];
    if (key === undefined || !pending.has(key)) {
      return line;
    }
    const value = pending.get(key) ?? "";
    pending.delete(key);
    return `${key}=${formatEnvValue(value)}`;
  });
  for (const [key, value] of pending) {
    next.push(`${key}=${formatEnvValue(value)}`);
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  fs.writeFileSync(tempPath, `${next.join("\n")}\n`, "utf8");
  fs.renameSync(tempPath, filePath);
}

export function writePortAssignment(filePath: string, assignment: PortAssignment): void {
  if (!Number.isInteger(assignment.port) || assignment.port < 1 || assignment.port > 65_535) {
    throw new FerryError("config_invalid", `Refusing to persist invalid port ${assignment.port}`);
  }
  upsertEnvFile(filePath, {
    [CONFIG_KEYS.model]: assignment.model,
    [CONFIG_KEYS.port]: String(assignment.port)
  });
}

export function detectConfigDrift(persistedPort: number | null, actualPort: number | null): DriftCheck {
  if (persistedPort === null) {
    return {
      ok: false,
      persistedPort,
      actualPort,
      message: "No gateway port is persisted; run `ferry setup`"
    };
  }
  if (actualPort === null) {
    return {
      ok: true,
      persistedPort,
      actualPort,
      message: `Gateway is not running; persisted port ${persistedPort} cannot be compared`
    };
  }
  if (persistedPort !== actualPort) {
    return {
      ok: false,
      persistedPort,
      actualPort,
      message: `Configuration drift: persisted port ${persistedPort} but gateway is bound to ${actualPort}`
    };
  }
  return {
    ok: true,
    persistedPort,
    actualPort,
    message: `Gateway bound to persisted port ${persistedPort}`
  };
}

import fs from "node:fs";
import type { BackendClient } from "../backend.js";
import { LOG_KEEP_LINES } from "../constants.js";
import { errorMessage } from "../errors.js";
import type { ServiceSupervisor, UnitActionResult } from "../supervisor/supervisor.js";
import type { ContainerRuntime } from "../supervisor/system.js";

export type RemediationId = "restart-core" | "restart-all" | "clean-logs" | "clear-model-cache" | "prune-containers";

export interface RemediationOutcome {
  ok: boolean;
  message: string;
  details: string[];
}

export interface RemediationAction {
  id: RemediationId;
  label: string;
  /** Question put to the operator before anything runs. */
  confirmation: string;
  run(): Promise<RemediationOutcome>;
}

export type ConfirmFn = (question: string) => Promise<boolean>;

export interface RemediationResult extends RemediationOutcome {
  id: RemediationId;
  performed: boolean;
}

export interface LogTruncation {
  path: string;
  linesBefore: number;
  linesAfter: number;
}

/** Keeps the last `keepLines` lines of a log file. Returns null when the file does not exist. */
export function truncateLogFile(filePath: string, keepLines = LOG_KEEP_LINES): LogTruncation | null {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
  const trailingNewline = content.endsWith("\n");
  const lines = content.length === 0 ? [] : (trailingNewline ? content.slice(0, -1) : content).split("\n");
  const kept = lines.slice(Math.max(0, lines.length - keepLines));
  if (kept.length < lines.length) {
    const tempPath = `${filePath}.tmp`;
    fs.writeFileSync(tempPath, kept.length > 0 ? `${kept.join("\n")}${trailingNewline ? "\n" : ""}` : "", "utf8");
    fs.renameSync(tempPath, filePath);
  }
  return { path: filePath, linesBefore: lines.length, linesAfter: kept.length };
}

function fromActions(results: UnitActionResult[]): RemediationOutcome {
  return {
    ok: results.every((result) => result.ok),
    message: results.every((result) => result.ok) ? "restart complete" : "restart finished with failures",
    details: results.map((result) => `${result.unit}: ${result.code} - ${result.message}`)
  };
}

export function createRemediations(context: {
  supervisor: ServiceSupervisor;
  backend: Pick<BackendClient, "listModels" | "deleteModel">;
  containerRuntime: Pick<ContainerRuntime, "prune">;
  logPaths: readonly string[];
  keepLines?: number;
}): Record<RemediationId, RemediationAction> {
  const keepLines = context.keepLines ?? LOG_KEEP_LINES;
  return {
    "restart-core": {
      id: "restart-core",
      label: "Restart inference daemon and gateway",
      confirmation: "Restart the inference daemon and the gateway?",
      run: async () => {
        const results: UnitActionResult[] = [];
        results.push(await context.supervisor.restart("daemon"));
        results.push(await context.supervisor.restart("gateway"));
        return fromActions(results);
      }
    },
    "restart-all": {
      id: "restart-all",
      label: "Restart everything",
      confirmation: "Restart the daemon, the gateway and the container worker?",
      run: async () => fromActions(await context.supervisor.restartAll())
    },
    "clean-logs": {
      id: "clean-logs",
      label: "Clean logs",
      confirmation: `Truncate managed logs to their last ${keepLines} lines?`,
      run: async () => {
        const details = context.logPaths.map((logPath) => {
          const truncated = truncateLogFile(logPath, keepLines);
          return truncated
            ? `${logPath}: ${truncated.linesBefore} -> ${truncated.linesAfter} lines`
            : `${logPath}: not found`;
        });
        return { ok: true, message: "logs cleaned", details };
      }
    },
    "clear-model-cache": {
      id: "clear-model-cache",
      label: "Clear model cache",
      confirmation: "Delete every downloaded model? They will need to be pulled again.",
      run: async () => {
        const models = await context.backend.listModels();
        const details: string[] = [];
        let failures = 0;
        for (const model of models) {
          try {
            await context.backend.deleteModel(model.name);
            details.push(`deleted ${model.name}`);
          } catch (error) {
            failures += 1;
            details.push(`failed to delete ${model.name}: ${errorMessage(error)}`);
          }
        }
        return {
          ok: failures === 0,
          message: models.length === 0 ? "no models to delete" : `deleted ${models.length - failures} of ${models.length} models`,
          details
        };
      }
    },
    "prune-containers": {
      id: "prune-containers",
      label: "Prune containers",
      confirmation: "Remove stopped containers, unused networks and dangling images?",
      run: async () => {
        const result = await context.containerRuntime.prune();
        const output = (result.code === 0 ? result.stdout : result.stderr).trim();
        return {
          ok: result.code === 0,
          message: result.code === 0 ? "container runtime pruned" : `prune exited with code ${result.code}`,
          details: output ? output.split("\n").slice(-5) : []
        };
      }
    }
  };
}

/**
 * Runs a remediation only after the operator confirms it. Unattended runs never
 * remediate.
 */
export async function runRemediation(
  action: RemediationAction,
  options: { confirm: ConfirmFn; unattended?: boolean }
): Promise<RemediationResult> {
  if (options.unattended) {
    return {
      id: action.id,
      performed: false,
      ok: false,
      message: `${action.label} requires an interactive confirmation`,
      details: []
    };
  }
  if (!(await options.confirm(action.confirmation))) {
    return { id: action.id, performed: false, ok: true, message: "cancelled", details: [] };
  }
  try {
    return { id: action.id, performed: true, ...(await action.run()) };
  } catch (error) {
    return { id: action.id, performed: true, ok: false, message: errorMessage(error), details: [] };
  }
}

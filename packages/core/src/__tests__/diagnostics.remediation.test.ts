import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  ServiceSupervisor,
  createRemediations,
  runRemediation,
  truncateLogFile,
  type BackendModel,
  type RemediationAction
} from "../index.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ferry-remediation-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, index) => `line ${index + 1}\n`).join("");
}

function remediations(options: {
  models?: BackendModel[];
  deleteFails?: string;
  logPaths?: string[];
  deleted?: string[];
}) {
  return createRemediations({
    supervisor: new ServiceSupervisor([]),
    backend: {
      listModels: async () => options.models ?? [],
      deleteModel: async (name) => {
        if (name === options.deleteFails) {
          throw new Error("model is in use");
        }
        options.deleted?.push(name);
      }
    },
    containerRuntime: {
      prune: async () => ({ code: 0, stdout: "Deleted Containers:\nabc123\nTotal reclaimed space: 1.2GB\n", stderr: "" })
    },
    logPaths: options.logPaths ?? [],
    keepLines: 3
  });
}

describe("truncateLogFile", () => {
  it("keeps the last lines of a long log", () => {
    const filePath = path.join(makeTempDir(), "gateway.log");
    fs.writeFileSync(filePath, numberedLines(1500));

    expect(truncateLogFile(filePath, 1000)).toEqual({ path: filePath, linesBefore: 1500, linesAfter: 1000 });

    const content = fs.readFileSync(filePath, "utf8");
    expect(content.startsWith("line 501\n")).toBe(true);
    expect(content.endsWith("line 1500\n")).toBe(true);
    expect(content.split("\n")).toHaveLength(1001);
  });

  it("leaves a short log untouched", () => {
    const filePath = path.join(makeTempDir(), "daemon.log");
    fs.writeFileSync(filePath, "only\ntwo");

    expect(truncateLogFile(filePath, 1000)).toEqual({ path: filePath, linesBefore: 2, linesAfter: 2 });
    expect(fs.readFileSync(filePath, "utf8")).toBe("only\ntwo");
  });

  it("returns null for a missing log", () => {
    expect(truncateLogFile(path.join(makeTempDir(), "missing.log"))).toBeNull();
  });
});

describe("runRemediation", () => {
  function countingAction(): RemediationAction & { runs: number } {
    const action = {
      id: "clean-logs" as const,
      label: "Clean logs",
      confirmation: "Truncate?",
      runs: 0,
      run: async () => {
        action.runs += 1;
        return { ok: true, message: "logs cleaned", details: [] };
      }
    };
    return action;
  }

  it("does nothing when the operator declines", async () => {
    const action = countingAction();
    const questions: string[] = [];

    const result = await runRemediation(action, {
      confirm: async (question) => {
        questions.push(question);
        return false;
      }
    });

    expect(result).toEqual({ id: "clean-logs", performed: false, ok: true, message: "cancelled", details: [] });
    expect(questions).toEqual(["Truncate?"]);
    expect(action.runs).toBe(0);
  });

  it("refuses to remediate unattended without asking", async () => {
    const action = countingAction();
    let asked = false;

    const result = await runRemediation(action, {
      unattended: true,
      confirm: async () => {
        asked = true;
        return true;
      }
    });

    expect(result).toEqual({
      id: "clean-logs",
      performed: false,
      ok: false,
      message: "Clean logs requires an interactive confirmation",
      details: []
    });
    expect(asked).toBe(false);
    expect(action.runs).toBe(0);
  });

  it("runs the action once confirmed", async () => {
    const action = countingAction();

    const result = await runRemediation(action, { confirm: async () => true });

    expect(result).toEqual({ id: "clean-logs", performed: true, ok: true, message: "logs cleaned", details: [] });
    expect(action.runs).toBe(1);
  });

  it("reports a throwing action as a failed remediation", async () => {
    const action: RemediationAction = {
      id: "prune-containers",
      label: "Prune containers",
      confirmation: "Prune?",
      run: async () => {
        throw new Error("docker: permission denied");
      }
    };

    await expect(runRemediation(action, { confirm: async () => true })).resolves.toEqual({
      id: "prune-containers",
      performed: true,
      ok: false,
      message: "docker: permission denied",
      details: []
    });
  });
});

describe("remediation actions", () => {
  it("cleans every managed log and notes missing ones", async () => {
    const dir = makeTempDir();
    const present = path.join(dir, "daemon.log");
    const missing = path.join(dir, "gateway.log");
    fs.writeFileSync(present, numberedLines(5));

    const outcome = await remediations({ logPaths: [present, missing] })["clean-logs"].run();

    expect(outcome).toEqual({
      ok: true,
      message: "logs cleaned",
      details: [`${present}: 5 -> 3 lines`, `${missing}: not found`]
    });
    expect(fs.readFileSync(present, "utf8")).toBe("line 3\nline 4\nline 5\n");
  });

  it("deletes every model and reports partial failures", async () => {
    const deleted: string[] = [];
    const outcome = await remediations({
      models: [{ name: "llama3.2:1b" }, { name: "phi3:mini" }],
      deleteFails: "phi3:mini",
      deleted
    })["clear-model-cache"].run();

    expect(outcome).toEqual({
      ok: false,
      message: "deleted 1 of 2 models",
      details: ["deleted llama3.2:1b", "failed to delete phi3:mini: model is in use"]
    });
    expect(deleted).toEqual(["llama3.2:1b"]);
  });

  it("summarises the prune output", async () => {
    const outcome = await remediations({})["prune-containers"].run();

    expect(outcome).toEqual({
      ok: true,
      message: "container runtime pruned",
      details: ["Deleted Containers:", "abc123", "Total reclaimed space: 1.2GB"]
    });
  });

  it("asks before each restart", () => {
    const actions = remediations({});

    expect(actions["restart-core"].confirmation).toBe("Restart the inference daemon and the gateway?");
    expect(actions["restart-all"].confirmation).toBe("Restart the daemon, the gateway and the container worker?");
    expect(actions["clean-logs"].confirmation).toBe("Truncate managed logs to their last 3 lines?");
  });
});

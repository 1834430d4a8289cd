import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadCliConfig, unwrapModuleDefault } from "../config.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ferry-cli-config-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadCliConfig", () => {
  it("uses defaults under the home directory when no config file exists", async () => {
    const projectRoot = makeTempDir();
    const homeDir = makeTempDir();

    const loaded = await loadCliConfig(projectRoot, { env: {}, homeDir });

    expect(loaded.configPath).toBeNull();
    expect(loaded.config.stateDir).toBe(path.join(homeDir, ".ferry"));
    expect(loaded.config.persistedConfigPath).toBe(path.join(homeDir, ".ferry", "config.env"));
    expect(loaded.config.gatewayRecordPath).toBe(path.join(homeDir, ".ferry", "gateway.json"));
    expect(loaded.config.worker.composeDir).toBe(path.join(homeDir, ".ferry", "worker"));
    expect(loaded.config.gateway.portRange).toEqual({ low: 11000, high: 12000 });
    expect(loaded.config.backend.baseUrl).toBe("http://127.0.0.1:11434");
  });

  it("honours FERRY_HOME and FERRY_BACKEND_URL from the environment", async () => {
    const projectRoot = makeTempDir();
    const stateDir = path.join(makeTempDir(), "state");

    const loaded = await loadCliConfig(projectRoot, {
      env: { FERRY_HOME: stateDir, FERRY_BACKEND_URL: "http://127.0.0.1:21434/" },
      homeDir: makeTempDir()
    });

    expect(loaded.config.stateDir).toBe(stateDir);
    expect(loaded.config.backend.baseUrl).toBe("http://127.0.0.1:21434");
  });

  it("loads .env files from the project root without overriding the shell", async () => {
    const projectRoot = makeTempDir();
    fs.writeFileSync(path.join(projectRoot, ".env"), "FERRY_HOME=./state\nFERRY_BACKEND_URL=http://127.0.0.1:1\n");
    const env: NodeJS.ProcessEnv = { FERRY_BACKEND_URL: "http://127.0.0.1:2" };

    const loaded = await loadCliConfig(projectRoot, { env, homeDir: makeTempDir() });

    expect(loaded.config.stateDir).toBe(path.join(projectRoot, "state"));
    expect(loaded.config.backend.baseUrl).toBe("http://127.0.0.1:2");
    expect(env.FERRY_HOME).toBe("./state");
  });

  it("reads ferry.config.json and resolves relative paths against the project root", async () => {
    const projectRoot = makeTempDir();
    fs.writeFileSync(
      path.join(projectRoot, "ferry.config.json"),
      JSON.stringify({
        stateDir: ".ferry-state",
        gateway: { portRange: { low: 12000, high: 12010 } },
        worker: { composeDir: "worker" }
      })
    );

    const loaded = await loadCliConfig(projectRoot, { env: {}, homeDir: makeTempDir() });

    expect(loaded.configPath).toBe(path.join(projectRoot, "ferry.config.json"));
    expect(loaded.config.stateDir).toBe(path.join(projectRoot, ".ferry-state"));
    expect(loaded.config.gateway.portRange).toEqual({ low: 12000, high: 12010 });
    expect(loaded.config.worker.composeDir).toBe(path.join(projectRoot, "worker"));
  });

  it("rejects unknown keys and inverted port ranges", async () => {
    const unknownKey = makeTempDir();
    fs.writeFileSync(path.join(unknownKey, "ferry.config.json"), JSON.stringify({ bogus: true }));
    const inverted = makeTempDir();
    fs.writeFileSync(
      path.join(inverted, "ferry.config.json"),
      JSON.stringify({ gateway: { portRange: { low: 12000, high: 11000 } } })
    );

    await expect(loadCliConfig(unknownKey, { env: {} })).rejects.toMatchObject({ code: "config_invalid" });
    await expect(loadCliConfig(inverted, { env: {} })).rejects.toMatchObject({ code: "config_invalid" });
  });
});

describe("unwrapModuleDefault", () => {
  it("follows nested default exports", () => {
    const config = { stateDir: "/tmp/x" };

    expect(unwrapModuleDefault({ default: { default: config } })).toBe(config);
    expect(unwrapModuleDefault({ __esModule: true, default: config })).toBe(config);
  });

  it("stops at an object with other keys", () => {
    const value = { default: {}, other: 1 };

    expect(unwrapModuleDefault(value)).toBe(value);
  });
});

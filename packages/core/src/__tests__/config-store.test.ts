import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  detectConfigDrift,
  parsePort,
  readPersistedConfig,
  readPortAssignment,
  upsertEnvFile,
  writePortAssignment
} from "../index.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ferry-config-store-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("port assignment", () => {
  it("returns null when nothing is persisted", () => {
    const filePath = path.join(makeTempDir(), "config.env");

    expect(readPortAssignment(filePath)).toBeNull();
  });

  it("writes the model and port and reads them back", () => {
    const filePath = path.join(makeTempDir(), "state", "config.env");

    writePortAssignment(filePath, { port: 11002, model: "llama3.2:3b" });

    expect(fs.readFileSync(filePath, "utf8")).toBe("MODEL_NAME=llama3.2:3b\nGATEWAY_PORT=11002\n");
    expect(readPortAssignment(filePath)).toEqual({ port: 11002, model: "llama3.2:3b" });
  });

  it("rejects an unparseable persisted port", () => {
    const filePath = path.join(makeTempDir(), "config.env");
    fs.writeFileSync(filePath, "MODEL_NAME=llama3.2:1b\nGATEWAY_PORT=eleven\n");

    expect(() => readPortAssignment(filePath)).toThrowError(
      expect.objectContaining({ code: "config_invalid" })
    );
  });

  it("rejects a persisted port without a model", () => {
    const filePath = path.join(makeTempDir(), "config.env");
    fs.writeFileSync(filePath, "GATEWAY_PORT=11002\n");

    expect(() => readPortAssignment(filePath)).toThrowError(`MODEL_NAME is missing from ${filePath}`);
  });

  it("refuses to persist an out-of-range port", () => {
    const filePath = path.join(makeTempDir(), "config.env");

    expect(() => writePortAssignment(filePath, { port: 70000, model: "x" })).toThrowError(
      "Refusing to persist invalid port 70000"
    );
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it.each([
    ["11002", 11002],
    [" 11003 ", 11003],
    ["0", null],
    ["65536", null],
    ["-1", null],
    ["12.5", null],
    [undefined, null]
  ])("parses %j as %j", (value, expected) => {
    expect(parsePort(value)).toBe(expected);
  });
});

describe("upsertEnvFile", () => {
  it("rewrites matching keys in place and keeps everything else", () => {
    const filePath = path.join(makeTempDir(), ".env");
    fs.writeFileSync(filePath, "# worker settings\nWORKER_ID=abc\n\nGATEWAY_ENDPOINT=http://localhost:1\n");

    upsertEnvFile(filePath, { GATEWAY_ENDPOINT: "http://localhost:11002", EXTRA: "value with space" });

    expect(fs.readFileSync(filePath, "utf8")).toBe(
      '# worker settings\nWORKER_ID=abc\n\nGATEWAY_ENDPOINT=http://localhost:11002\nEXTRA="value with space"\n'
    );
    expect(readPersistedConfig(filePath)).toEqual({
      WORKER_ID: "abc",
      GATEWAY_ENDPOINT: "http://localhost:11002",
      EXTRA: "value with space"
    });
  });

  it("preserves a model already persisted when only the port changes", () => {
    const filePath = path.join(makeTempDir(), "config.env");
    writePortAssignment(filePath, { port: 11000, model: "phi3:mini" });

    upsertEnvFile(filePath, { GATEWAY_PORT: "11005" });

    expect(readPortAssignment(filePath)).toEqual({ port: 11005, model: "phi3:mini" });
  });
});

describe("detectConfigDrift", () => {
  it("flags a missing persisted port", () => {
    expect(detectConfigDrift(null, 11002)).toEqual({
      ok: false,
      persistedPort: null,
      actualPort: 11002,
      message: "No gateway port is persisted; run `ferry setup`"
    });
  });

  it("cannot compare when the gateway is not running", () => {
    expect(detectConfigDrift(11002, null)).toMatchObject({
      ok: true,
      message: "Gateway is not running; persisted port 11002 cannot be compared"
    });
  });

  it("flags a mismatch", () => {
    expect(detectConfigDrift(11002, 11003)).toMatchObject({
      ok: false,
      message: "Configuration drift: persisted port 11002 but gateway is bound to 11003"
    });
  });

  it("accepts a match", () => {
    expect(detectConfigDrift(11002, 11002)).toMatchObject({
      ok: true,
      message: "Gateway bound to persisted port 11002"
    });
  });
});

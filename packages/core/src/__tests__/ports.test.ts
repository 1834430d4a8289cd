import http from "node:http";
import net from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import {
  findAvailablePort,
  listListeningPorts,
  listenWithPortRetry,
  parseListeningPorts,
  probePortOccupied
} from "../ports.js";
import { FerryError } from "../errors.js";
import type { CommandRunner } from "../supervisor/system.js";

const servers: net.Server[] = [];

async function listen(server: net.Server, port = 0): Promise<number> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, "127.0.0.1", () => {
      server.off("error", reject);
      resolve();
    });
  });
  servers.push(server);
  const address = server.address();
  if (!address || typeof address !== "object") {
    throw new Error("server has no address");
  }
  return address.port;
}

async function occupyPort(): Promise<number> {
  return await listen(net.createServer());
}

async function freePort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  servers.pop();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

afterEach(async () => {
  for (const server of servers.splice(0)) {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

describe("findAvailablePort", () => {
  it("returns the first port the probe reports free", async () => {
    const occupied = new Set([11000, 11001]);
    const port = await findAvailablePort(11000, 11005, {
      probe: async (candidate) => occupied.has(candidate)
    });
    expect(port).toBe(11002);
  });

  it("returns the single free port in the range", async () => {
    const port = await findAvailablePort(11000, 11004, {
      probe: async (candidate) => candidate !== 11003
    });
    expect(port).toBe(11003);
  });

  it("skips excluded ports", async () => {
    const port = await findAvailablePort(11000, 11005, {
      exclude: [11000, 11001],
      probe: async () => false
    });
    expect(port).toBe(11002);
  });

  it("fails with port_range_exhausted when every port is occupied", async () => {
    const attempt = findAvailablePort(11000, 11002, { probe: async () => true });
    await expect(attempt).rejects.toBeInstanceOf(FerryError);
    await expect(attempt).rejects.toMatchObject({
      code: "port_range_exhausted",
      message: "No available port in range 11000-11002"
    });
  });

  it.each([
    [12000, 11000],
    [0, 10],
    [65000, 70000],
    [1.5, 10]
  ])("rejects the invalid range %s-%s", async (low, high) => {
    await expect(findAvailablePort(low, high, { probe: async () => false })).rejects.toMatchObject({
      code: "invalid_port_range"
    });
  });

  it("treats a real listener as occupied", async () => {
    const port = await occupyPort();
    await expect(findAvailablePort(port, port)).rejects.toMatchObject({ code: "port_range_exhausted" });
  });
});

describe("probePortOccupied", () => {
  it("reports a listening port as occupied and a closed one as free", async () => {
    const busy = await occupyPort();
    const closed = await freePort();

    await expect(probePortOccupied(busy)).resolves.toBe(true);
    await expect(probePortOccupied(closed)).resolves.toBe(false);
  });
});

describe("listenWithPortRetry", () => {
  it("renegotiates after EADDRINUSE and binds the next free port", async () => {
    const blocked = await occupyPort();
    const target = await freePort();
    const retries: Array<[number, number]> = [];
    const server = http.createServer();
    servers.push(server);

    const bound = await listenWithPortRetry(server, {
      host: "127.0.0.1",
      port: blocked,
      range: { low: Math.min(blocked, target), high: Math.max(blocked, target) },
      probe: async (candidate) => candidate !== target,
      onRetry: (failed, next) => retries.push([failed, next])
    });

    expect(bound).toBe(target);
    expect(retries).toEqual([[blocked, target]]);
  });

  it("fails with port_bind_exhausted once the retries are used up", async () => {
    const first = await occupyPort();
    const second = await occupyPort();
    const server = http.createServer();

    const attempt = listenWithPortRetry(server, {
      host: "127.0.0.1",
      port: first,
      range: { low: Math.min(first, second), high: Math.max(first, second) },
      retries: 1,
      probe: async (candidate) => candidate !== second
    });

    await expect(attempt).rejects.toMatchObject({
      code: "port_bind_exhausted",
      message: `Could not bind after 2 attempt(s); ports in use: ${first}, ${second}`
    });
  });

  it("turns an exhausted range during retry into port_bind_exhausted", async () => {
    const blocked = await occupyPort();
    const server = http.createServer();

    await expect(
      listenWithPortRetry(server, {
        host: "127.0.0.1",
        port: blocked,
        range: { low: blocked, high: blocked },
        probe: async () => false
      })
    ).rejects.toMatchObject({
      code: "port_bind_exhausted",
      message: `Could not bind after 1 attempt(s): No available port in range ${blocked}-${blocked}`
    });
  });
});

describe("listening ports", () => {
  const ssOutput = [
    "State  Recv-Q Send-Q Local Address:Port  Peer Address:Port Process",
    "LISTEN 0      4096   127.0.0.53%lo:53         0.0.0.0:*",
    "LISTEN 0      128          0.0.0.0:22         0.0.0.0:*",
    "LISTEN 0      4096       127.0.0.1:11434      0.0.0.0:*",
    "LISTEN 0      128             [::]:22            [::]:*",
    ""
  ].join("\n");

  it("parses, de-duplicates and sorts ss output", () => {
    expect(parseListeningPorts(ssOutput)).toEqual([22, 53, 11434]);
  });

  it("runs ss through the command runner", async () => {
    const calls: string[][] = [];
    const runner: CommandRunner = async (file, args) => {
      calls.push([file, ...args]);
      return { code: 0, stdout: ssOutput, stderr: "" };
    };

    await expect(listListeningPorts(runner)).resolves.toEqual([22, 53, 11434]);
    expect(calls).toEqual([["ss", "-tln"]]);
  });
});

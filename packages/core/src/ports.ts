import type http from "node:http";
import net from "node:net";
import { DEFAULT_BIND_RETRIES, DEFAULT_PORT_PROBE_TIMEOUT_MS } from "./constants.js";
import type { PortRange } from "./config.js";
import { FerryError, errorMessage, isFerryError } from "./errors.js";
import { defaultCommandRunner, type CommandRunner } from "./supervisor/system.js";

/** Resolves true when something accepts connections on the port. */
export type PortProbe = (port: number, host: string) => Promise<boolean>;

export function probePortOccupied(
  port: number,
  host = "127.0.0.1",
  timeoutMs = DEFAULT_PORT_PROBE_TIMEOUT_MS
): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const socket = net.createConnection({ port, host });
    let settled = false;

    const finish = (occupied: boolean): void => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      resolve(occupied);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(true));
    // A silent port is not proof of absence; only a refusal is.
    socket.once("timeout", () => finish(true));
    socket.once("error", () => finish(false));
  });
}

function assertPortRange(low: number, high: number): void {
  const valid =
    Number.isInteger(low) && Number.isInteger(high) && low >= 1 && high <= 65_535 && low <= high;
  if (!valid) {
    throw new FerryError("invalid_port_range", `Invalid port range ${low}-${high}`);
  }
}

export async function findAvailablePort(
  low: number,
  high: number,
  options: {
    exclude?: Iterable<number>;
    host?: string;
    probe?: PortProbe;
  } = {}
): Promise<number> {
  assertPortRange(low, high);
  const excluded = new Set(options.exclude ?? []);
  const host = options.host ?? "127.0.0.1";
  const probe = options.probe ?? ((port: number, probeHost: string) => probePortOccupied(port, probeHost));

  for (let port = low; port <= high; port += 1) {
    if (excluded.has(port)) {
      continue;
    }
    if (!(await probe(port, host))) {
      return port;
    }
  }

  throw new FerryError("port_range_exhausted", `No available port in range ${low}-${high}`);
}

function listenOnce(server: http.Server, port: number, host: string): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off("error", onError);
      const address = server.address();
      resolve(address && typeof address === "object" ? address.port : port);
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

/**
 * Binds `server`, starting at `port`. The negotiator only probes, so another
 * process can take a port between the probe and the bind; every EADDRINUSE is
 * answered by negotiating again without the ports that already failed.
 */
export async function listenWithPortRetry(
  server: http.Server,
  options: {
    host: string;
    port: number;
    range: PortRange;
    retries?: number;
    probe?: PortProbe;
    onRetry?: (failedPort: number, nextPort: number) => void;
  }
): Promise<number> {
  const retries = options.retries ?? DEFAULT_BIND_RETRIES;
  const failed: number[] = [];
  let candidate = options.port;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await listenOnce(server, candidate, options.host);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "EADDRINUSE") {
        throw error;
      }
      failed.push(candidate);
    }

    if (attempt >= retries) {
      throw new FerryError(
        "port_bind_exhausted",
        `Could not bind after ${failed.length} attempt(s); ports in use: ${failed.join(", ")}`
      );
    }

    const failedPort = candidate;
    try {
      candidate = await findAvailablePort(options.range.low, options.range.high, {
        exclude: failed,
        probe: options.probe
      });
    } catch (error) {
      if (isFerryError(error, "port_range_exhausted")) {
        throw new FerryError(
          "port_bind_exhausted",
          `Could not bind after ${failed.length} attempt(s): ${errorMessage(error)}`,
          { cause: error }
        );
      }
      throw error;
    }
    options.onRetry?.(failedPort, candidate);
  }
}

export function parseListeningPorts(output: string): number[] {
  const ports = new Set<number>();
  for (const rawLine of output.split("\n")) {
    const line = rawLine.trim();
    if (!line.includes("LISTEN")) {
      continue;
    }
    const columns = line.split(/\s+/);
    const local = columns[columns.indexOf("LISTEN") + 3];
    const portText = local?.slice(local.lastIndexOf(":") + 1) ?? "";
    const port = Number.parseInt(portText, 10);
    if (Number.isInteger(port) && port > 0) {
      ports.add(port);
    }
  }
  return [...ports].sort((left, right) => left - right);
}

export async function listListeningPorts(runner: CommandRunner = defaultCommandRunner): Promise<number[]> {
  const result = await runner("ss", ["-tln"]);
  if (result.code !== 0) {
    throw new Error(`ss exited with code ${result.code}: ${result.stderr.trim()}`);
  }
  return parseListeningPorts(result.stdout);
}

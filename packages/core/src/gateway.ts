import http from "node:http";
import type { BackendClient } from "./backend.js";
import type { PortRange } from "./config.js";
import { GATEWAY_DRAIN_MS } from "./constants.js";
import { detectConfigDrift } from "./config-store.js";
import { errorMessage } from "./errors.js";
import { nowIso, writeJson } from "./gateway/helpers.js";
import { handleGatewayRequest, type GatewayRouteContext } from "./gateway/routes.js";
import { listenWithPortRetry, type PortProbe } from "./ports.js";

export { CORS_HEADERS, readRequestBody, RequestBodyTooLargeError } from "./gateway/helpers.js";
export {
  handleGatewayRequest,
  parseTranslationRequest,
  requestPathname,
  type GatewayRouteContext,
  type TranslationRequest,
  type TranslationResponse
} from "./gateway/routes.js";

export type GatewayState = "stopped" | "running" | "degraded";

export interface GatewayStatus {
  state: GatewayState;
  host: string;
  model: string;
  url?: string;
  port?: number;
  startedAt?: string;
  degradedReasons: string[];
}

export interface GatewayServiceOptions {
  backend: BackendClient;
  model: string;
  host: string;
  /** First port to try; normally the persisted assignment. */
  port: number;
  /** Persisted port the bound port is reconciled against; null when nothing is persisted. */
  persistedPort: number | null;
  range: PortRange;
  bindRetries?: number;
  probe?: PortProbe;
  generateTimeoutMs?: number;
  healthTimeoutMs?: number;
  maxBodyBytes?: number;
  log?: (line: string) => void;
}

function displayHost(host: string): string {
  return host === "0.0.0.0" || host === "::" ? "127.0.0.1" : host;
}

export interface GatewayStopOptions {
  /** How long in-flight requests may finish before their connections are closed. */
  drainMs?: number;
}

export class GatewayService {
  private server: http.Server | null = null;
  private inFlight: AbortController | null = null;
  private port: number | undefined;
  private startedAt: string | undefined;
  private degradedReasons: string[] = [];
  private readonly routeContext: GatewayRouteContext;
  private readonly log: (line: string) => void;

  constructor(private readonly options: GatewayServiceOptions) {
    this.routeContext = {
      backend: options.backend,
      model: options.model,
      generateTimeoutMs: options.generateTimeoutMs,
      healthTimeoutMs: options.healthTimeoutMs,
      maxBodyBytes: options.maxBodyBytes
    };
    this.log = options.log ?? (() => undefined);
  }

  async start(): Promise<GatewayStatus> {
    if (this.server) {
      return this.getStatus();
    }

    const inFlight = new AbortController();
    const routeContext: GatewayRouteContext = { ...this.routeContext, signal: inFlight.signal };
    const server = http.createServer((request, response) => {
      const startedAt = performance.now();
      const method = (request.method ?? "GET").toUpperCase();
      const target = request.url ?? "/";
      void handleGatewayRequest(routeContext, request, response)
        .then((status) => {
          this.log(`${method} ${target} -> ${status} (${Math.round(performance.now() - startedAt)}ms)`);
        })
        .catch((error: unknown) => {
          this.log(`${method} ${target} failed: ${errorMessage(error)}`);
          writeJson(response, 500, {
            error: "internal_error",
            message: `Internal server error: ${errorMessage(error)}`
          });
        });
    });

    const port = await listenWithPortRetry(server, {
      host: this.options.host,
      port: this.options.port,
      range: this.options.range,
      retries: this.options.bindRetries,
      probe: this.options.probe,
      onRetry: (failedPort, nextPort) => {
        this.log(`port ${failedPort} is in use; retrying on ${nextPort}`);
      }
    });

    this.server = server;
    this.inFlight = inFlight;
    this.port = port;
    this.startedAt = nowIso();

    const drift = detectConfigDrift(this.options.persistedPort, port);
    this.degradedReasons = drift.ok ? [] : [drift.message];
    if (!drift.ok) {
      this.log(`degraded: ${drift.message}`);
    }
    this.log(`gateway listening on ${this.options.host}:${port} (model ${this.options.model})`);
    return this.getStatus();
  }

  async stop(options: GatewayStopOptions = {}): Promise<void> {
    const server = this.server;
    const inFlight = this.inFlight;
    this.server = null;
    this.inFlight = null;
    this.port = undefined;
    this.startedAt = undefined;
    this.degradedReasons = [];
    if (!server) {
      return;
    }
    const drainMs = options.drainMs ?? GATEWAY_DRAIN_MS;
    let forced = false;
    const drainTimer = setTimeout(() => {
      forced = true;
      inFlight?.abort();
      server.closeAllConnections();
    }, drainMs);
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeIdleConnections();
      });
    } finally {
      clearTimeout(drainTimer);
    }
    this.log(forced ? `gateway stopped (in-flight requests cut off after ${drainMs}ms)` : "gateway stopped");
  }

  getStatus(): GatewayStatus {
    if (!this.server || this.port === undefined) {
      return {
        state: "stopped",
        host: this.options.host,
        model: this.options.model,
        degradedReasons: []
      };
    }
    return {
      state: this.degradedReasons.length > 0 ? "degraded" : "running",
      host: this.options.host,
      model: this.options.model,
      url: `http://${displayHost(this.options.host)}:${this.port}`,
      port: this.port,
      startedAt: this.startedAt,
      degradedReasons: [...this.degradedReasons]
    };
  }
}

export function createGatewayService(options: GatewayServiceOptions): GatewayService {
  return new GatewayService(options);
}

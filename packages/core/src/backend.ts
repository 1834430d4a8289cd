import { z } from "zod";
import { GENERATE_TIMEOUT_MS, HEALTH_TIMEOUT_MS, PULL_TIMEOUT_MS } from "./constants.js";
import { FerryError } from "./errors.js";
import { describeFetchError, requestJsonWithTimeout, type JsonHttpResponse } from "./http.js";

export const generateResponseSchema = z
  .object({
    response: z.string().default(""),
    model: z.string().optional(),
    created_at: z.string().default(""),
    done: z.boolean().optional(),
    eval_count: z.number().optional(),
    eval_duration: z.number().optional()
  })
  .passthrough();

export type GenerateResponse = z.infer<typeof generateResponseSchema>;

const tagsResponseSchema = z.object({
  models: z
    .array(
      z
        .object({
          name: z.string(),
          size: z.number().optional(),
          modified_at: z.string().optional()
        })
        .passthrough()
    )
    .default([])
});

export interface BackendModel {
  name: string;
  size?: number;
  modifiedAt?: string;
}

const pullResponseSchema = z.object({ status: z.string().default("") }).passthrough();

export interface BackendProbeResult {
  ok: boolean;
  status?: number;
  latencyMs: number;
  message: string;
}

export interface BackendClientOptions {
  baseUrl: string;
  generateTimeoutMs?: number;
  healthTimeoutMs?: number;
}

/** Thin client for the inference engine's native HTTP API. */
export class BackendClient {
  readonly baseUrl: string;
  private readonly generateTimeoutMs: number;
  private readonly healthTimeoutMs: number;

  constructor(options: BackendClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.generateTimeoutMs = options.generateTimeoutMs ?? GENERATE_TIMEOUT_MS;
    this.healthTimeoutMs = Math.min(options.healthTimeoutMs ?? HEALTH_TIMEOUT_MS, HEALTH_TIMEOUT_MS);
  }

  private async request(
    method: "GET" | "POST" | "DELETE",
    pathname: string,
    timeoutMs: number,
    body?: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<JsonHttpResponse> {
    try {
      return await requestJsonWithTimeout({
        url: `${this.baseUrl}${pathname}`,
        method,
        body,
        timeoutMs,
        signal
      });
    } catch (error) {
      throw new FerryError(
        "backend_unreachable",
        `Backend ${method} ${pathname} failed: ${describeFetchError(error, timeoutMs)}`,
        { cause: error }
      );
    }
  }

  private expectOk(response: JsonHttpResponse, pathname: string): void {
    if (response.status !== 200) {
      throw new FerryError("backend_error", `Backend error: ${response.status}`, {
        status: response.status,
        cause: `${pathname}: ${response.text.slice(0, 200)}`
      });
    }
  }

  async generate(params: {
    model: string;
    prompt: string;
    timeoutMs?: number;
    signal?: AbortSignal;
  }): Promise<GenerateResponse & { latencyMs: number }> {
    const timeoutMs = params.timeoutMs ?? this.generateTimeoutMs;
    const response = await this.request(
      "POST",
      "/api/generate",
      timeoutMs,
      { model: params.model, prompt: params.prompt, stream: false },
      params.signal
    );
    this.expectOk(response, "/api/generate");
    if (response.json === null) {
      throw new Error("backend returned a non-JSON body");
    }
    const parsed = generateResponseSchema.safeParse(response.json);
    if (!parsed.success) {
      throw new Error(`unexpected generate payload: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return { ...parsed.data, latencyMs: response.latencyMs };
  }

  async probe(timeoutMs = this.healthTimeoutMs): Promise<BackendProbeResult> {
    let response: JsonHttpResponse;
    const startedAt = performance.now();
    try {
      response = await requestJsonWithTimeout({
        url: `${this.baseUrl}/api/tags`,
        method: "GET",
        timeoutMs
      });
    } catch (error) {
      return {
        ok: false,
        latencyMs: Math.round(performance.now() - startedAt),
        message: describeFetchError(error, timeoutMs)
      };
    }
    return {
      ok: response.status === 200,
      status: response.status,
      latencyMs: response.latencyMs,
      message: response.status === 200 ? "reachable" : `Backend returned HTTP ${response.status}`
    };
  }

  async listModels(): Promise<BackendModel[]> {
    const response = await this.request("GET", "/api/tags", this.healthTimeoutMs);
    this.expectOk(response, "/api/tags");
    const parsed = tagsResponseSchema.safeParse(response.json ?? {});
    if (!parsed.success) {
      throw new Error("unexpected model list payload");
    }
    return parsed.data.models.map((model) => ({
      name: model.name,
      size: model.size,
      modifiedAt: model.modified_at
    }));
  }

  async pullModel(name: string, timeoutMs = PULL_TIMEOUT_MS): Promise<string> {
    const response = await this.request("POST", "/api/pull", timeoutMs, { name, stream: false });
    this.expectOk(response, "/api/pull");
    const parsed = pullResponseSchema.safeParse(response.json ?? {});
    return parsed.success ? parsed.data.status : "";
  }

  async deleteModel(name: string): Promise<void> {
    const response = await this.request("DELETE", "/api/delete", this.healthTimeoutMs, { name });
    this.expectOk(response, "/api/delete");
  }
}

export function formatModelSize(bytes: number | undefined): string {
  if (bytes === undefined) {
    return "-";
  }
  const gib = bytes / 1024 ** 3;
  return gib >= 1 ? `${gib.toFixed(1)} GB` : `${Math.round(bytes / 1024 ** 2)} MB`;
}

import type { BackendClient, BackendProbeResult } from "../backend.js";
import { HEALTH_TIMEOUT_MS, INFERENCE_PROBE_PROMPT, INFERENCE_PROBE_TIMEOUT_MS } from "../constants.js";
import { FerryError } from "../errors.js";
import { describeFetchError, getJsonWithTimeout, postJsonWithTimeout, type JsonHttpResponse } from "../http.js";

export interface EndpointProbe {
  url: string;
  status: number;
  latencyMs: number;
  body: unknown;
}

export interface InferenceProbe {
  url: string;
  latencyMs: number;
  preview: string;
}

export const PREVIEW_CHARS = 100;

export function previewText(text: string, maxChars = PREVIEW_CHARS): string {
  const flattened = text.replace(/\s+/g, " ").trim();
  return flattened.length > maxChars ? `${flattened.slice(0, maxChars)}...` : flattened;
}

async function guarded(url: string, timeoutMs: number, request: () => Promise<JsonHttpResponse>) {
  try {
    return await request();
  } catch (error) {
    throw new FerryError("backend_unreachable", `${url} unreachable: ${describeFetchError(error, timeoutMs)}`, {
      cause: error
    });
  }
}

export async function checkBackend(backend: BackendClient): Promise<BackendProbeResult> {
  const probe = await backend.probe();
  if (!probe.ok) {
    throw new FerryError("backend_unreachable", `${backend.baseUrl}/api/tags: ${probe.message}`, {
      status: probe.status
    });
  }
  return probe;
}

export async function checkGatewayHealth(gatewayUrl: string, timeoutMs = HEALTH_TIMEOUT_MS): Promise<EndpointProbe> {
  const url = `${gatewayUrl}/health`;
  const response = await guarded(url, timeoutMs, () => getJsonWithTimeout({ url, timeoutMs }));
  if (response.status !== 200) {
    const reason =
      response.json && typeof response.json === "object" && "reason" in response.json
        ? String(response.json.reason)
        : response.text.slice(0, 200);
    throw new FerryError("backend_error", `${url} returned HTTP ${response.status}${reason ? `: ${reason}` : ""}`, {
      status: response.status
    });
  }
  return { url, status: response.status, latencyMs: response.latencyMs, body: response.json };
}

/** End-to-end request through the gateway's translation path. */
export async function checkInference(
  gatewayUrl: string,
  options: { prompt?: string; timeoutMs?: number } = {}
): Promise<InferenceProbe> {
  const url = `${gatewayUrl}/`;
  const timeoutMs = options.timeoutMs ?? INFERENCE_PROBE_TIMEOUT_MS;
  const response = await guarded(url, timeoutMs, () =>
    postJsonWithTimeout({ url, body: { prompt: options.prompt ?? INFERENCE_PROBE_PROMPT }, timeoutMs })
  );
  const body: object = response.json && typeof response.json === "object" ? response.json : {};
  if (response.status !== 200) {
    const message = "message" in body && typeof body.message === "string" ? body.message : `HTTP ${response.status}`;
    throw new FerryError("backend_error", `Inference through ${url} failed: ${message}`, {
      status: response.status
    });
  }
  const text = "response" in body && typeof body.response === "string" ? body.response : "";
  return { url, latencyMs: response.latencyMs, preview: previewText(text) };
}

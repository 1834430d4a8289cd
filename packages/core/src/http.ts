export interface JsonHttpResponse {
  status: number;
  text: string;
  json: unknown;
  latencyMs: number;
}

export type HttpMethod = "GET" | "POST" | "DELETE";

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

export function describeFetchError(error: unknown, timeoutMs: number): string {
  if (isTimeoutError(error)) {
    return `timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return "aborted";
  }
  if (error instanceof Error) {
    const cause = (error as Error & { cause?: unknown }).cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}

export async function requestJsonWithTimeout(params: {
  url: string;
  method: HttpMethod;
  body?: Record<string, unknown>;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<JsonHttpResponse> {
  // The caller's signal only cancels; the deadline stays a TimeoutError.
  const deadline = AbortSignal.timeout(params.timeoutMs);
  const signal = params.signal ? AbortSignal.any([deadline, params.signal]) : deadline;
  const startedAt = performance.now();

  const response = await fetch(params.url, {
    method: params.method,
    headers: {
      accept: "application/json",
      ...(params.body ? { "content-type": "application/json" } : {}),
      ...params.headers
    },
    body: params.body ? JSON.stringify(params.body) : undefined,
    signal
  });

  const text = await response.text();
  let json: unknown = null;
  if (text.length > 0) {
    try {
      json = JSON.parse(text);
    } catch {
      json = null;
    }
  }
  return {
    status: response.status,
    text,
    json,
    latencyMs: Math.round(performance.now() - startedAt)
  };
}

export async function postJsonWithTimeout(params: {
  url: string;
  body: Record<string, unknown>;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<JsonHttpResponse> {
  return await requestJsonWithTimeout({ ...params, method: "POST" });
}

export async function getJsonWithTimeout(params: {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<JsonHttpResponse> {
  return await requestJsonWithTimeout({ ...params, method: "GET" });
}

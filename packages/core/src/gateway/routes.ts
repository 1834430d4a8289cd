import http from "node:http";
import { z } from "zod";
import type { BackendClient } from "../backend.js";
import { errorMessage, isFerryError } from "../errors.js";
import { RequestBodyTooLargeError, readRequestBody, writeJson, writePreflight } from "./helpers.js";

export interface TranslationRequest {
  prompt: string;
}

export interface TranslationResponse {
  response: string;
  model: string;
  created_at: string;
  done: true;
}

const translationRequestSchema = z
  .object({
    prompt: z.string().default("")
  })
  .passthrough();

export interface GatewayRouteContext {
  backend: BackendClient;
  model: string;
  generateTimeoutMs?: number;
  healthTimeoutMs?: number;
  maxBodyBytes?: number;
  /** Aborted when the gateway stops, cancelling backend calls still in flight. */
  signal?: AbortSignal;
}

export function parseTranslationRequest(bodyText: string): TranslationRequest {
  let raw: unknown;
  try {
    raw = bodyText.trim().length > 0 ? JSON.parse(bodyText) : {};
  } catch (error) {
    throw new Error(`invalid JSON body (${errorMessage(error)})`);
  }
  const parsed = translationRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`invalid request body (${issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "schema"})`);
  }
  return { prompt: parsed.data.prompt };
}

async function handleGenerate(
  context: GatewayRouteContext,
  request: http.IncomingMessage,
  response: http.ServerResponse
): Promise<number> {
  let bodyText: string;
  try {
    bodyText = await readRequestBody(request, context.maxBodyBytes);
  } catch (error) {
    if (error instanceof RequestBodyTooLargeError) {
      writeJson(response, 413, { error: "payload_too_large", message: error.message });
      return 413;
    }
    throw error;
  }

  try {
    const { prompt } = parseTranslationRequest(bodyText);
    const generated = await context.backend.generate({
      model: context.model,
      prompt,
      timeoutMs: context.generateTimeoutMs,
      signal: context.signal
    });
    const payload: TranslationResponse = {
      response: generated.response,
      model: context.model,
      created_at: generated.created_at,
      done: true
    };
    writeJson(response, 200, { ...payload });
    return 200;
  } catch (error) {
    if (isFerryError(error, "backend_error")) {
      writeJson(response, 500, {
        error: "backend_error",
        message: error.message,
        backendStatus: error.details.status
      });
      return 500;
    }
    writeJson(response, 500, {
      error: "internal_error",
      message: `Internal server error: ${errorMessage(error)}`
    });
    return 500;
  }
}

async function handleHealth(context: GatewayRouteContext, response: http.ServerResponse): Promise<number> {
  const probe = await context.backend.probe(context.healthTimeoutMs);
  if (probe.ok) {
    writeJson(response, 200, { status: "healthy", model: context.model });
    return 200;
  }
  writeJson(response, 503, { status: "unavailable", model: context.model, reason: probe.message });
  return 503;
}

export function requestPathname(target: string | undefined): string {
  const raw = target ?? "/";
  const queryIndex = raw.indexOf("?");
  return queryIndex === -1 ? raw : raw.slice(0, queryIndex);
}

/** Routes one request and resolves with the status code that was written. */
export async function handleGatewayRequest(
  context: GatewayRouteContext,
  request: http.IncomingMessage,
  response: http.ServerResponse
): Promise<number> {
  const method = (request.method ?? "GET").toUpperCase();
  const pathname = requestPathname(request.url);

  if (method === "OPTIONS") {
    writePreflight(response);
    return 200;
  }
  if (method === "POST" && pathname === "/") {
    return await handleGenerate(context, request, response);
  }
  if (method === "GET" && pathname === "/health") {
    return await handleHealth(context, response);
  }

  writeJson(response, 404, { error: "not_found" });
  return 404;
}

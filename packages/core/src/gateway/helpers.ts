import http from "node:http";
import { GATEWAY_BODY_MAX_BYTES } from "../constants.js";

export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type"
} as const;

export class RequestBodyTooLargeError extends Error {
  constructor(public readonly maxBytes: number) {
    super(`Request body exceeds ${maxBytes} bytes`);
    this.name = "RequestBodyTooLargeError";
  }
}

/**
 * Buffers the request body. Past `maxBytes` the rest of the upload is drained
 * and discarded so the caller can still answer on the same connection.
 */
export function readRequestBody(
  request: http.IncomingMessage,
  maxBytes = GATEWAY_BODY_MAX_BYTES
): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let overflowed = false;
    request.on("data", (chunk: Buffer | string) => {
      if (overflowed) {
        return;
      }
      const normalized = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      totalBytes += normalized.length;
      if (totalBytes > maxBytes) {
        overflowed = true;
        chunks.length = 0;
        reject(new RequestBodyTooLargeError(maxBytes));
        return;
      }
      chunks.push(normalized);
    });
    request.on("error", reject);
    request.on("end", () => {
      if (!overflowed) {
        resolve(Buffer.concat(chunks).toString("utf8"));
      }
    });
  });
}

export function writeJson(response: http.ServerResponse, statusCode: number, payload: Record<string, unknown>): void {
  if (response.destroyed || response.writableEnded) {
    return;
  }
  if (response.headersSent) {
    response.end();
    return;
  }
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.setHeader("Access-Control-Allow-Origin", CORS_HEADERS["Access-Control-Allow-Origin"]);
  response.end(JSON.stringify(payload));
}

export function writePreflight(response: http.ServerResponse): void {
  response.statusCode = 200;
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    response.setHeader(name, value);
  }
  response.end();
}

export function nowIso(): string {
  return new Date().toISOString();
}

export type FerryErrorCode =
  | "invalid_port_range"
  | "port_range_exhausted"
  | "port_bind_exhausted"
  | "backend_unreachable"
  | "backend_error"
  | "start_failed"
  | "stop_failed"
  | "indeterminate"
  | "config_drift"
  | "config_invalid"
  | "benchmark_failed";

export class FerryError extends Error {
  constructor(
    public readonly code: FerryErrorCode,
    message: string,
    public readonly details: {
      status?: number;
      cause?: unknown;
    } = {}
  ) {
    super(message);
    this.name = "FerryError";
  }
}

export function isFerryError(value: unknown, code?: FerryErrorCode): value is FerryError {
  if (!(value instanceof FerryError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

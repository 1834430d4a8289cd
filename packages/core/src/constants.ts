export const DEFAULT_BACKEND_URL = "http://127.0.0.1:11434";
export const DEFAULT_MODEL = "llama3.2:1b";

export const DEFAULT_PORT_RANGE = { low: 11000, high: 12000 } as const;
export const DEFAULT_GATEWAY_PORT = 11435;
export const DEFAULT_BIND_RETRIES = 3;
export const DEFAULT_PORT_PROBE_TIMEOUT_MS = 500;

export const GENERATE_TIMEOUT_MS = 60_000;
export const HEALTH_TIMEOUT_MS = 5_000;
export const INFERENCE_PROBE_TIMEOUT_MS = 30_000;
export const BENCHMARK_TIMEOUT_MS = 60_000;
export const PULL_TIMEOUT_MS = 30 * 60 * 1000;

export const GATEWAY_BODY_MAX_BYTES = 1_000_000;
export const GATEWAY_DRAIN_MS = 1_000;

export const SUPERVISOR_SETTLE_MS = 5_000;
export const SUPERVISOR_STOP_GRACE_MS = 2_000;
export const SUPERVISOR_RESTART_DELAY_MS = 3_000;

export const LOG_KEEP_LINES = 1_000;
export const DISK_WARN_PERCENT = 85;
export const RAM_WARN_BYTES = 4 * 1024 ** 3;

export const CONFIG_KEYS = {
  model: "MODEL_NAME",
  port: "GATEWAY_PORT"
} as const;

export const WORKER_ENDPOINT_KEY = "GATEWAY_ENDPOINT";

export const BENCHMARK_PROMPT = "Write a short poem about artificial intelligence";
export const INFERENCE_PROBE_PROMPT = "Hello";

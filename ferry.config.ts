import { defineConfig } from "@ferry/core";

const composeDir = process.env.FERRY_WORKER_DIR?.trim();

export default defineConfig({
  backend: {
    baseUrl: process.env.FERRY_BACKEND_URL?.trim() || "http://127.0.0.1:11434",
    generateTimeoutMs: 60_000
  },
  gateway: {
    host: "0.0.0.0",
    portRange: { low: 11000, high: 12000 },
    bindRetries: 3
  },
  daemon: {
    initUnit: "ollama",
    useSudo: true,
    processPattern: "ollama serve",
    command: ["ollama", "serve"]
  },
  worker: composeDir ? { composeDir } : {},
  diagnostics: {
    diskPath: "/"
  }
});

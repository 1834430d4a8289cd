export * from "./constants.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./config-store.js";
export * from "./http.js";
export * from "./ports.js";
export * from "./backend.js";
export * from "./gateway.js";
export * from "./supervisor/system.js";
export * from "./supervisor/detectors.js";
export * from "./supervisor/units.js";
export * from "./supervisor/supervisor.js";
export * from "./diagnostics/resources.js";
export * from "./diagnostics/connectivity.js";
export * from "./diagnostics/benchmark.js";
export * from "./diagnostics/findings.js";
export * from "./diagnostics/aggregator.js";
export * from "./diagnostics/probes.js";
export * from "./diagnostics/remediation.js";

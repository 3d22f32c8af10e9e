import * as promClient from "prom-client";

export const register = new promClient.Registry();

const requestCounter = new promClient.Counter({
  name: "lexalign_requests_total",
  help: "Total number of HTTP requests by route and status",
  labelNames: ["route", "status"],
  registers: [register],
});

const requestDuration = new promClient.Histogram({
  name: "lexalign_request_duration_seconds",
  help: "HTTP request latency histogram",
  labelNames: ["route"],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10], // buckets in seconds
  registers: [register],
});

let defaultsCollected = false;

/**
 * Add the process metrics (memory, CPU, event loop) to the registry
 */
export function collectDefaultMetrics(): void {
  if (defaultsCollected) return;
  promClient.collectDefaultMetrics({ register });
  defaultsCollected = true;
}

export function recordRequest(
  route: string,
  status: number,
  durationMS: number,
): void {
  requestCounter.labels(route, String(status)).inc();
  requestDuration.labels(route).observe(durationMS / 1000); // Seconds
}

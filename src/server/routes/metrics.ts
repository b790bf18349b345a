import { Hono } from "hono";

import type { StackStatus } from "@/domains/services/types";

const DURATION_BUCKETS_MS = [100, 500, 1000] as const;
const MAX_DURATIONS = 1000;

export interface MetricsStore {
  incrementRequests: () => void;
  recordDuration: (durationMs: number) => void;
  render: (status: StackStatus) => string;
}

const escapeLabel = (value: string): string => value.replaceAll("\\", "\\\\").replaceAll('"', '\\"');

export const createMetricsStore = (): MetricsStore => {
  let httpRequestsTotal = 0;
  const durations: number[] = [];

  return {
    incrementRequests: () => {
      httpRequestsTotal++;
    },

    recordDuration: (durationMs) => {
      durations.push(durationMs);
      if (durations.length > MAX_DURATIONS) {
        durations.shift();
      }
    },

    render: (status) => {
      const stateLines = [...status.entries()].map(
        ([service, entry]) => `stack_service_state{service="${escapeLabel(service)}",state="${entry.state}"} 1`,
      );
      const healthyLines = [...status.entries()].map(
        ([service, entry]) => `stack_service_healthy{service="${escapeLabel(service)}"} ${entry.state === "HEALTHY" ? 1 : 0}`,
      );
      const bucketLines = [
        ...DURATION_BUCKETS_MS.map(
          (limit) =>
            `http_request_duration_seconds_bucket{le="${(limit / 1000).toFixed(1)}"} ${durations.filter((d) => d < limit).length}`,
        ),
        `http_request_duration_seconds_bucket{le="+Inf"} ${durations.length}`,
      ];

      return [
        "# HELP stack_service_state Last recorded health state of each service",
        "# TYPE stack_service_state gauge",
        ...stateLines,
        "",
        "# HELP stack_service_healthy Whether the service was healthy when last probed",
        "# TYPE stack_service_healthy gauge",
        ...healthyLines,
        "",
        "# HELP http_requests_total Total number of HTTP requests",
        "# TYPE http_requests_total counter",
        `http_requests_total ${httpRequestsTotal}`,
        "",
        "# HELP http_request_duration_seconds HTTP request duration in seconds",
        "# TYPE http_request_duration_seconds histogram",
        ...bucketLines,
      ].join("\n");
    },
  };
};

/**
 * Prometheus scrape endpoint. Reports the last recorded status; scraping never
 * probes the services.
 */
export const createMetricsRoute = (store: MetricsStore, snapshot: () => StackStatus): Hono => {
  const metrics = new Hono();

  metrics.get("/", (c) =>
    c.text(store.render(snapshot()), 200, {
      "Content-Type": "text/plain; version=0.0.4",
    }),
  );

  return metrics;
};

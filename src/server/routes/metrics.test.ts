import { describe, expect, it } from "vitest";

import type { ServiceStatus } from "@/domains/services/types";

import { createMetricsRoute, createMetricsStore } from "./metrics";

const snapshot = (): Map<string, ServiceStatus> =>
  new Map<string, ServiceStatus>([
    ["db", { state: "HEALTHY", checkedAt: null }],
    ["studio", { state: "STARTING", checkedAt: null }],
  ]);

describe("metrics route", () => {
  it("should return Prometheus-formatted metrics", async () => {
    const app = createMetricsRoute(createMetricsStore(), snapshot);

    const res = await app.fetch(new Request("http://localhost/"));
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/plain; version=0.0.4");
    expect(text.split("\n")).toContain('stack_service_state{service="db",state="HEALTHY"} 1');
  });
});

describe("createMetricsStore", () => {
  it("should render service gauges, the request counter and duration buckets", () => {
    const store = createMetricsStore();
    store.incrementRequests();
    store.incrementRequests();
    store.recordDuration(50);
    store.recordDuration(150);
    store.recordDuration(600);

    expect(store.render(snapshot())).toBe(
      [
        "# HELP stack_service_state Last recorded health state of each service",
        "# TYPE stack_service_state gauge",
        'stack_service_state{service="db",state="HEALTHY"} 1',
        'stack_service_state{service="studio",state="STARTING"} 1',
        "",
        "# HELP stack_service_healthy Whether the service was healthy when last probed",
        "# TYPE stack_service_healthy gauge",
        'stack_service_healthy{service="db"} 1',
        'stack_service_healthy{service="studio"} 0',
        "",
        "# HELP http_requests_total Total number of HTTP requests",
        "# TYPE http_requests_total counter",
        "http_requests_total 2",
        "",
        "# HELP http_request_duration_seconds HTTP request duration in seconds",
        "# TYPE http_request_duration_seconds histogram",
        'http_request_duration_seconds_bucket{le="0.1"} 1',
        'http_request_duration_seconds_bucket{le="0.5"} 2',
        'http_request_duration_seconds_bucket{le="1.0"} 3',
        'http_request_duration_seconds_bucket{le="+Inf"} 3',
      ].join("\n"),
    );
  });

  it("should keep only the last 1000 durations", () => {
    const store = createMetricsStore();
    for (let i = 0; i < 1500; i++) {
      store.recordDuration(i);
    }

    expect(store.render(new Map()).split("\n")).toContain('http_request_duration_seconds_bucket{le="+Inf"} 1000');
  });
});

import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { ServiceRegistry } from "@/domains/services";
import type { Logger } from "@/lib/logger";
import type { Monitor } from "@/worker/monitor";

import { createHealthRoute } from "./routes/health";
import { type MetricsStore, createMetricsRoute, createMetricsStore } from "./routes/metrics";
import { createStatusRoute } from "./routes/status";

export interface AppDeps {
  logger: Logger;
  monitor: Monitor;
  registry: ServiceRegistry;
  metrics?: MetricsStore;
}

export interface ServerDeps extends AppDeps {
  port: number;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: AppDeps): Hono => {
  const app = new Hono();
  const metrics = deps.metrics ?? createMetricsStore();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.info("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    metrics.incrementRequests();
    metrics.recordDuration(duration);
  });

  app.get("/", (c) => c.json({ message: "Stack status server", services: deps.registry.names() }));
  app.route("/health", createHealthRoute(deps.monitor, deps.registry));
  app.route("/status", createStatusRoute(deps.monitor, deps.registry));
  app.route("/metrics", createMetricsRoute(metrics, deps.monitor.snapshot));

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};

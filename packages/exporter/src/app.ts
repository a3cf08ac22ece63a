import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import type { ExporterConfig, IProbeEngine } from "@ping-exporter/shared";

import { logger } from "./logger.js";
import { ExporterError } from "./errors.js";
import { VERSION } from "./version.js";
import { PingProbeEngine } from "./probe/ping-engine.js";
import {
  DnsTargetResolver,
  EphemeralTargetRegistry,
  StaticTargetManager,
  type ITargetResolver,
} from "./targets/index.js";
import { MetricsBridge } from "./metrics/index.js";
import { metricsRoutes } from "./routes/metrics.js";
import { indexPageRoutes } from "./routes/index-page.js";

const isDev = process.env.NODE_ENV !== "production";

export interface BuildAppOptions {
  /** Logger for the server and its routes (default: the root logger) */
  loggerInstance?: FastifyBaseLogger;
  /** Override the probe engine (for testing) */
  engine?: IProbeEngine;
  /** Override the DNS resolver (for testing) */
  resolver?: ITargetResolver;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(config: ExporterConfig, opts?: BuildAppOptions) {
  const loggerInstance: FastifyBaseLogger = opts?.loggerInstance ?? logger;
  const app = Fastify({ loggerInstance });

  // Engine + target managers + bridge (decorated so routes can access them)
  const engine = opts?.engine ?? new PingProbeEngine(config.ping);
  const resolver = opts?.resolver ?? new DnsTargetResolver(config.dns.nameserver);
  const metricsBridge = new MetricsBridge(engine, {
    version: VERSION,
    deprecatedMetrics: config.metrics.deprecated,
    rttUnit: config.metrics.rttUnit,
  });
  const onRemoved = (identity: string) => metricsBridge.forget(identity);
  const staticTargets = new StaticTargetManager(config.targets, engine, resolver, {
    refreshMs: config.dns.refreshMs,
    onRemoved,
  });
  const ephemeralTargets = new EphemeralTargetRegistry(engine, resolver, {
    timeoutMs: config.targetTimeoutMs,
    isStatic: (host) => staticTargets.has(host),
    onRemoved,
  });
  app.decorate("engine", engine);
  app.decorate("staticTargets", staticTargets);
  app.decorate("ephemeralTargets", ephemeralTargets);
  app.decorate("metricsBridge", metricsBridge);

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || "querystring",
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    // Known errors (resolution failures, bad requests)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({
      error: isDev || error instanceof ExporterError ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { metricsPath: config.web.metricsPath });
  if (config.web.metricsPath !== "/") {
    await app.register(indexPageRoutes, { metricsPath: config.web.metricsPath });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Register static targets before the first scrape is served
  app.addHook("onReady", async () => {
    await staticTargets.start();
  });

  app.addHook("onClose", async () => {
    staticTargets.stop();
    ephemeralTargets.stop();
    engine.close();
  });

  return app;
}

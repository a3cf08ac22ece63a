import "fastify";
import type { IProbeEngine } from "@ping-exporter/shared";
import type { StaticTargetManager } from "../targets/static-target-manager.js";
import type { EphemeralTargetRegistry } from "../targets/ephemeral-target-registry.js";
import type { MetricsBridge } from "../metrics/metrics-bridge.js";

declare module "fastify" {
  interface FastifyInstance {
    engine: IProbeEngine;
    staticTargets: StaticTargetManager;
    ephemeralTargets: EphemeralTargetRegistry;
    metricsBridge: MetricsBridge;
  }
}

/**
 * Metrics Bridge — renders the engine's statistics in the Prometheus text
 * format, either for every identity (batch scrape) or for one identity
 * (on-demand scrape).
 *
 * Every render pulls a fresh snapshot and fills a throwaway registry from
 * it. Renders are serialized through a single queue shared by both modes,
 * so one scrape always sees one snapshot and two scrapes never interleave.
 * An empty batch pull is ignored in favour of the last non-empty one;
 * identities removed from the engine are dropped from that cache.
 */

import pLimit from "p-limit";
import { Gauge, Registry } from "prom-client";
import type { IProbeEngine, MetricsSnapshot, ProbeMetrics, RttUnit } from "@ping-exporter/shared";
import { logger as rootLogger, type BaseLogger } from "../logger.js";
import { parseIdentity } from "../probe/identity.js";
import { ScaledGauge } from "./rtt-scale.js";

const LABEL_NAMES = ["target", "ip", "ip_version"] as const;
type Label = (typeof LABEL_NAMES)[number];
type Labels = Record<Label, string>;

export interface MetricsBridgeOptions {
  version: string;
  /** Also expose `ping_rtt_<unit>{type=best|worst|mean|std_dev}` */
  deprecatedMetrics: boolean;
  rttUnit: RttUnit;
  logger?: BaseLogger;
}

/** Gauges of one render, all registered with the same registry */
interface RenderSet {
  registry: Registry;
  up: Gauge<"version">;
  rtt: ScaledGauge<Label | "type"> | null;
  best: ScaledGauge<Label>;
  worst: ScaledGauge<Label>;
  mean: ScaledGauge<Label>;
  stddev: ScaledGauge<Label>;
  loss: Gauge<Label>;
}

/** Packet loss ratio; 0 before anything was sent */
export function lossRatio(m: ProbeMetrics): number {
  return m.packetsSent > 0 ? m.packetsLost / m.packetsSent : 0;
}

export class MetricsBridge {
  private engine: IProbeEngine;
  private options: MetricsBridgeOptions;
  private log: BaseLogger;
  private lock = pLimit(1);

  /** Last non-empty batch snapshot */
  private cached: MetricsSnapshot = new Map();

  constructor(engine: IProbeEngine, options: MetricsBridgeOptions) {
    this.engine = engine;
    this.options = options;
    this.log = options.logger ?? rootLogger.child({ module: "metrics-bridge" });
  }

  /** Content-Type of the rendered text */
  get contentType(): string {
    return Registry.PROMETHEUS_CONTENT_TYPE;
  }

  /** Batch export over every known identity */
  renderAll(): Promise<string> {
    return this.lock(() => {
      const set = this.createSet();
      set.up.set({ version: this.options.version }, 1);
      for (const [identity, metrics] of this.snapshot()) {
        this.collect(set, identity, metrics);
      }
      return set.registry.metrics();
    });
  }

  /** Export restricted to a single identity */
  renderTarget(identity: string): Promise<string> {
    return this.lock(() => {
      const set = this.createSet();
      const metrics = this.engine.export().get(identity);
      if (!metrics) {
        this.log.error({ identity }, "no metrics found for target");
      } else {
        set.up.set({ version: this.options.version }, 1);
        this.collect(set, identity, metrics);
      }
      return set.registry.metrics();
    });
  }

  /** Drop a deregistered identity from the cached snapshot */
  forget(identity: string): void {
    this.cached.delete(identity);
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private snapshot(): MetricsSnapshot {
    const fresh = this.engine.export();
    if (fresh.size > 0) this.cached = fresh;
    return this.cached;
  }

  private createSet(): RenderSet {
    const registry = new Registry();
    const { rttUnit, deprecatedMetrics } = this.options;
    const scaled = (name: string, help: string) =>
      new ScaledGauge<Label>(registry, rttUnit, `ping_${name}`, help, LABEL_NAMES);

    return {
      registry,
      rtt: deprecatedMetrics
        ? new ScaledGauge<Label | "type">(registry, rttUnit, "ping_rtt_seconds", "Round trip time", [
            ...LABEL_NAMES,
            "type",
          ])
        : null,
      best: scaled("rtt_best_seconds", "Best round trip time"),
      worst: scaled("rtt_worst_seconds", "Worst round trip time"),
      mean: scaled("rtt_mean_seconds", "Mean round trip time"),
      stddev: scaled("rtt_std_deviation_seconds", "Standard deviation"),
      loss: new Gauge<Label>({
        name: "ping_loss_percent",
        help: "Packet loss in percent",
        labelNames: LABEL_NAMES,
        registers: [registry],
      }),
      up: new Gauge<"version">({
        name: "ping_up",
        help: "ping_exporter version",
        labelNames: ["version"],
        registers: [registry],
      }),
    };
  }

  private collect(set: RenderSet, identity: string, m: ProbeMetrics): void {
    const id = parseIdentity(identity);
    if (!id) {
      this.log.error({ identity }, "malformed probe identity");
      return;
    }
    const labels: Labels = { target: id.host, ip: id.address, ip_version: String(id.family) };

    // No successful round trip: nothing to summarize
    if (m.packetsSent > m.packetsLost) {
      if (set.rtt) {
        set.rtt.set({ ...labels, type: "best" }, m.best);
        set.rtt.set({ ...labels, type: "worst" }, m.worst);
        set.rtt.set({ ...labels, type: "mean" }, m.mean);
        set.rtt.set({ ...labels, type: "std_dev" }, m.stddev);
      }
      set.best.set(labels, m.best);
      set.worst.set(labels, m.worst);
      set.mean.set(labels, m.mean);
      set.stddev.set(labels, m.stddev);
    }

    set.loss.set(labels, lossRatio(m));
  }
}

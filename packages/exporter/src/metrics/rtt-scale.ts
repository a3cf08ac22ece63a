/**
 * Round trip time metrics in one or both units.
 *
 * The engine reports milliseconds. `s` exports `<name>_seconds`, `ms`
 * exports `<name>_ms` (deprecated), `both` exports the pair side by side
 * for migrations.
 */

import { Gauge, type Registry } from "prom-client";
import type { RttUnit } from "@ping-exporter/shared";

const RTT_UNITS: readonly RttUnit[] = ["s", "ms", "both"];

export function isRttUnit(value: string): value is RttUnit {
  return (RTT_UNITS as readonly string[]).includes(value);
}

export class ScaledGauge<L extends string> {
  private millis: Gauge<L> | null = null;
  private seconds: Gauge<L> | null = null;

  /** `name` must end in `_seconds`; the millis variant swaps that suffix for `_ms` */
  constructor(registry: Registry, unit: RttUnit, name: string, help: string, labelNames: readonly L[]) {
    if (unit === "ms" || unit === "both") {
      this.millis = new Gauge<L>({
        name: name.replace("_seconds", "_ms"),
        help: `${help} in millis (deprecated)`,
        labelNames,
        registers: [registry],
      });
    }
    if (unit === "s" || unit === "both") {
      this.seconds = new Gauge<L>({
        name,
        help: `${help} in seconds`,
        labelNames,
        registers: [registry],
      });
    }
  }

  /** Record a value given in milliseconds */
  set(labels: Record<L, string>, valueMs: number): void {
    this.millis?.set(labels, valueMs);
    this.seconds?.set(labels, valueMs / 1000);
  }
}

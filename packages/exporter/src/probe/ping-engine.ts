/**
 * Probe engine backed by the system `ping` binary.
 *
 * Each registered identity runs consecutive batches of `history` echo
 * requests; the summary of the last completed batch is what `export()`
 * reports. Statistics are computed by ping itself. Until the first batch
 * completes, an identity reports all zeros.
 *
 * IMPORTANT: This module must remain independent of the web framework and
 * of DNS. It only sees addresses keyed by identity (see IProbeEngine).
 */

import { execFile } from "node:child_process";
import type {
  IProbeEngine,
  MetricsSnapshot,
  PingSettings,
  ProbeMetrics,
  ResolvedAddress,
} from "@ping-exporter/shared";
import { logger as rootLogger, type BaseLogger } from "../logger.js";
import { ProbeTransportError, errorMessage } from "../errors.js";
import { addressFamily } from "./identity.js";
import { parsePingSummary } from "./ping-output.js";

const PING_BINARY = process.env.PING_BINARY || "ping";
const VERIFY_TIMEOUT_MS = 5_000;

/** Runs ping with `args` and resolves with its stdout */
export type PingRunner = (args: string[], signal: AbortSignal) => Promise<string>;

export const runSystemPing: PingRunner = (args, signal) =>
  new Promise((resolve, reject) => {
    execFile(PING_BINARY, args, { signal }, (err, stdout) => {
      // ping exits 1 when nothing answered but still prints its summary
      if (err && !stdout) reject(err);
      else resolve(stdout);
    });
  });

export interface PingProbeEngineOptions {
  /** Override the ping invocation (for testing) */
  runner?: PingRunner;
  logger?: BaseLogger;
}

interface Probe {
  target: ResolvedAddress;
  metrics: ProbeMetrics;
  timer: ReturnType<typeof setTimeout> | null;
  controller: AbortController;
}

function emptyMetrics(): ProbeMetrics {
  return { packetsSent: 0, packetsLost: 0, best: 0, worst: 0, mean: 0, stddev: 0 };
}

export class PingProbeEngine implements IProbeEngine {
  private settings: PingSettings;
  private runner: PingRunner;
  private log: BaseLogger;

  /** Probes keyed by identity */
  private probes = new Map<string, Probe>();

  constructor(settings: PingSettings, options?: PingProbeEngineOptions) {
    this.settings = settings;
    this.runner = options?.runner ?? runSystemPing;
    this.log = options?.logger ?? rootLogger.child({ module: "ping-engine" });
  }

  /** Ping localhost once; throws ProbeTransportError if ping is unusable */
  async verify(): Promise<void> {
    let stdout: string;
    try {
      stdout = await this.runner(
        ["-n", "-c", "1", "-W", "1", "127.0.0.1"],
        AbortSignal.timeout(VERIFY_TIMEOUT_MS),
      );
    } catch (err) {
      throw new ProbeTransportError(`cannot start monitoring: ${errorMessage(err)}`, 500, { cause: err });
    }
    if (!parsePingSummary(stdout)) {
      throw new ProbeTransportError("cannot start monitoring: unexpected ping output");
    }
  }

  register(identity: string, target: ResolvedAddress, delayMs: number): void {
    if (this.probes.has(identity)) return;
    if (addressFamily(target.address) !== target.family) {
      throw new Error(`invalid IPv${target.family} address: ${target.address}`);
    }

    const probe: Probe = {
      target: { ...target },
      metrics: emptyMetrics(),
      timer: null,
      controller: new AbortController(),
    };
    probe.timer = setTimeout(() => {
      void this.run(identity, probe);
    }, delayMs);
    this.probes.set(identity, probe);
  }

  deregister(identity: string): void {
    const probe = this.probes.get(identity);
    if (!probe) return;
    this.halt(probe);
    this.probes.delete(identity);
  }

  export(): MetricsSnapshot {
    const snapshot: MetricsSnapshot = new Map();
    for (const [identity, probe] of this.probes) {
      snapshot.set(identity, { ...probe.metrics });
    }
    return snapshot;
  }

  close(): void {
    for (const probe of this.probes.values()) {
      this.halt(probe);
    }
    this.probes.clear();
  }

  /** Registered identities */
  get identities(): string[] {
    return Array.from(this.probes.keys());
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Command line for one batch against `target` */
  pingArgs(target: ResolvedAddress): string[] {
    const { historySize, intervalMs, timeoutMs, payloadSize } = this.settings;
    return [
      "-n",
      ...(target.family === 6 ? ["-6"] : []),
      "-c", String(historySize),
      "-i", String(intervalMs / 1000),
      "-W", String(Math.max(1, Math.ceil(timeoutMs / 1000))),
      "-s", String(payloadSize),
      target.address,
    ];
  }

  private halt(probe: Probe): void {
    if (probe.timer) {
      clearTimeout(probe.timer);
      probe.timer = null;
    }
    probe.controller.abort();
  }

  /** Run one batch, record its summary, schedule the next one */
  private async run(identity: string, probe: Probe): Promise<void> {
    probe.timer = null;
    const { signal } = probe.controller;

    try {
      const stdout = await this.runner(this.pingArgs(probe.target), signal);
      if (signal.aborted) return;

      const metrics = parsePingSummary(stdout);
      if (metrics) {
        probe.metrics = metrics;
      } else {
        this.log.warn({ identity }, "ping produced no summary");
      }
    } catch (err) {
      if (signal.aborted) return;
      this.log.warn({ identity, err }, "ping batch failed");
    }

    probe.timer = setTimeout(() => {
      void this.run(identity, probe);
    }, this.settings.intervalMs);
  }
}

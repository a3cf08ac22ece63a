/**
 * Static Target Manager — keeps the engine's addresses for every configured
 * target in sync with DNS.
 *
 * Startup registers each target once (staggered by START_DELAY_STEP_MS per
 * index so a long target list does not burst). Afterwards a refresh loop
 * re-resolves every target; each target reconciles on its own, so a slow or
 * failing lookup only affects that target.
 *
 * IMPORTANT: Like the engine, this module is independent of the web
 * framework. It receives its dependencies via constructor injection.
 */

import type { IProbeEngine } from "@ping-exporter/shared";
import { logger as rootLogger, type BaseLogger } from "../logger.js";
import type { ITargetResolver } from "./resolver.js";
import { Target } from "./target.js";

const START_DELAY_STEP_MS = 10;

export interface StaticTargetManagerOptions {
  /** DNS refresh interval in milliseconds; 0 disables the refresh loop */
  refreshMs?: number;
  /** Called with every identity deregistered from the engine */
  onRemoved?: (identity: string) => void;
  logger?: BaseLogger;
}

export class StaticTargetManager {
  private targets: Target[];
  private hosts: Set<string>;
  private resolver: ITargetResolver;
  private refreshMs: number;
  private log: BaseLogger;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    hosts: string[],
    engine: IProbeEngine,
    resolver: ITargetResolver,
    options?: StaticTargetManagerOptions,
  ) {
    this.resolver = resolver;
    this.refreshMs = options?.refreshMs ?? 0;
    this.log = options?.logger ?? rootLogger.child({ module: "static-targets" });
    this.hosts = new Set(hosts);
    this.targets = hosts.map(
      (host, i) => new Target(host, engine, this.log, START_DELAY_STEP_MS * i, options?.onRemoved),
    );
  }

  /** Whether `host` is part of the static configuration */
  has(host: string): boolean {
    return this.hosts.has(host);
  }

  /** Whether the refresh loop is running */
  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Register every target once, then start the refresh loop.
   * Resolution failures are logged and the target is skipped.
   */
  async start(): Promise<void> {
    if (this.timer) return;

    await this.reconcileAll("could not add target");

    if (this.refreshMs > 0) {
      this.timer = setInterval(() => {
        void this.refresh();
      }, this.refreshMs);
    }
  }

  /** Stop the refresh loop. Registered addresses stay with the engine. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One refresh cycle over all targets; never rejects */
  async refresh(): Promise<void> {
    this.log.info("refreshing DNS");
    await this.reconcileAll("could not refresh dns");
  }

  private async reconcileAll(failure: string): Promise<void> {
    await Promise.all(
      this.targets.map((t) =>
        t.reconcile(this.resolver).catch((err: unknown) => {
          this.log.error({ host: t.host, err }, failure);
        }),
      ),
    );
  }
}

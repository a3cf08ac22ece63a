/**
 * Ephemeral Target Registry — hostnames probed only because a scrape asked
 * for them (`?target=<host>`).
 *
 * Every request re-arms the host's expiry timer to a full timeout window
 * (sliding expiration). When a timer fires, the entry is dropped and its
 * addresses are deregistered from the engine.
 *
 * Everything after the DNS lookup runs synchronously, so the lookup/replace
 * of an entry cannot interleave with another request.
 */

import type { IProbeEngine, ResolvedAddress } from "@ping-exporter/shared";
import { logger as rootLogger, type BaseLogger } from "../logger.js";
import type { ITargetResolver } from "./resolver.js";
import { Target } from "./target.js";
import { ResolutionError } from "../errors.js";
import { formatIdentity } from "../probe/identity.js";

/** On-demand targets must start probing as soon as possible */
const EPHEMERAL_DELAY_MS = 1;

interface EphemeralEntry {
  target: Target;
  /** The one address probed for this host, fixed at the first request */
  address: ResolvedAddress;
  timer: ReturnType<typeof setTimeout>;
}

export interface EphemeralTargetRegistryOptions {
  /** Idle time after which a host is dropped */
  timeoutMs: number;
  /** Hosts that belong to the static configuration and must never be tracked here */
  isStatic?: (host: string) => boolean;
  /** Called with every identity deregistered from the engine */
  onRemoved?: (identity: string) => void;
  logger?: BaseLogger;
}

export class EphemeralTargetRegistry {
  private entries = new Map<string, EphemeralEntry>();
  private engine: IProbeEngine;
  private resolver: ITargetResolver;
  private timeoutMs: number;
  private isStatic: (host: string) => boolean;
  private onRemoved: ((identity: string) => void) | undefined;
  private log: BaseLogger;

  constructor(engine: IProbeEngine, resolver: ITargetResolver, options: EphemeralTargetRegistryOptions) {
    this.engine = engine;
    this.resolver = resolver;
    this.timeoutMs = options.timeoutMs;
    this.isStatic = options.isStatic ?? (() => false);
    this.onRemoved = options.onRemoved;
    this.log = options.logger ?? rootLogger.child({ module: "ephemeral-targets" });
  }

  /**
   * Track `host` (or refresh it) and return the identity to render.
   *
   * Throws ResolutionError if the host does not resolve and
   * RegistrationError if the engine rejects its address.
   */
  async request(host: string): Promise<string> {
    const addrs = await this.resolver.resolve(host);
    const first = addrs[0];
    if (!first) throw new ResolutionError(host, "cannot resolve target");

    // Static hosts are already probed; just point at their identity
    if (this.isStatic(host)) return formatIdentity(host, first);

    let entry = this.entries.get(host);
    if (!entry) {
      this.log.info({ host }, "Adding target");
      const target = new Target(host, this.engine, this.log, EPHEMERAL_DELAY_MS, this.onRemoved);
      target.addIfNew(first);
      entry = { target, address: first, timer: this.arm(host, target) };
    } else {
      // DNS may reorder its answer; keep pointing at the address being probed
      clearTimeout(entry.timer);
      entry = { ...entry, timer: this.arm(host, entry.target) };
    }
    this.entries.set(host, entry);

    return entry.target.nameFor(entry.address);
  }

  /** Whether `host` currently has a live entry */
  has(host: string): boolean {
    return this.entries.has(host);
  }

  /** Number of live entries */
  get size(): number {
    return this.entries.size;
  }

  /** Drop every entry: clear the timers and deregister the addresses */
  stop(): void {
    for (const { target, timer } of this.entries.values()) {
      clearTimeout(timer);
      target.cleanUp();
    }
    this.entries.clear();
  }

  private arm(host: string, target: Target): ReturnType<typeof setTimeout> {
    return setTimeout(() => {
      // A refresh replaces the entry; only remove it if it is still ours
      if (this.entries.get(host)?.target !== target) return;
      this.log.info({ host }, "Removing timed out target");
      this.entries.delete(host);
      target.cleanUp();
    }, this.timeoutMs);
  }
}

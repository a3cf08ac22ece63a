/**
 * Target — one hostname and the addresses currently registered for it
 * with the probe engine.
 *
 * A target is owned by exactly one manager (static or ephemeral) and only
 * ever registers/deregisters its own identities.
 */

import pLimit from "p-limit";
import type { IProbeEngine, ResolvedAddress } from "@ping-exporter/shared";
import type { BaseLogger } from "../logger.js";
import type { ITargetResolver } from "./resolver.js";
import { formatIdentity } from "../probe/identity.js";
import { RegistrationError, errorMessage } from "../errors.js";

function sameAddress(a: ResolvedAddress, b: ResolvedAddress): boolean {
  return a.address === b.address && a.family === b.family;
}

function containsAddress(list: ResolvedAddress[], addr: ResolvedAddress): boolean {
  return list.some((a) => sameAddress(a, addr));
}

export class Target {
  readonly host: string;
  /** Delay before the engine starts probing a newly added address */
  readonly delayMs: number;

  private addresses: ResolvedAddress[] = [];
  private engine: IProbeEngine;
  private log: BaseLogger;
  private onRemoved: (identity: string) => void;

  /** Reconciliations of the same target never overlap */
  private serial = pLimit(1);

  constructor(
    host: string,
    engine: IProbeEngine,
    log: BaseLogger,
    delayMs = 0,
    onRemoved: (identity: string) => void = () => {},
  ) {
    this.host = host;
    this.engine = engine;
    this.log = log;
    this.delayMs = delayMs;
    this.onRemoved = onRemoved;
  }

  /** Identity string used as the engine key and metric labels */
  nameFor(addr: ResolvedAddress): string {
    return formatIdentity(this.host, addr);
  }

  /**
   * Re-resolve and align the engine with the result: register new
   * addresses, deregister the ones that disappeared, leave the rest alone.
   * Throws ResolutionError without touching the engine if the lookup fails.
   */
  reconcile(resolver: ITargetResolver): Promise<void> {
    return this.serial(async () => {
      const fresh = await resolver.resolve(this.host);

      for (const addr of fresh) {
        try {
          this.addIfNew(addr);
        } catch (err) {
          // left unregistered; the next reconciliation retries it
          this.log.error({ host: this.host, address: addr.address, err }, "failed to add target");
        }
      }

      this.cleanUp(fresh);
    });
  }

  /** Register `addr` unless it is already registered for this target */
  addIfNew(addr: ResolvedAddress): void {
    if (containsAddress(this.addresses, addr)) return;

    this.log.info({ host: this.host, address: addr.address }, "adding target for host");
    try {
      this.engine.register(this.nameFor(addr), addr, this.delayMs);
    } catch (err) {
      throw new RegistrationError(`failed to add target ${this.host} (${addr.address}): ${errorMessage(err)}`, {
        cause: err,
      });
    }
    this.addresses.push(addr);
  }

  /** Deregister every registered address not in `keep` */
  cleanUp(keep: ResolvedAddress[] = []): void {
    const kept: ResolvedAddress[] = [];
    for (const addr of this.addresses) {
      if (containsAddress(keep, addr)) {
        kept.push(addr);
        continue;
      }
      this.log.info({ host: this.host, address: addr.address }, "removing target for host");
      const identity = this.nameFor(addr);
      this.engine.deregister(identity);
      this.onRemoved(identity);
    }
    this.addresses = kept;
  }
}

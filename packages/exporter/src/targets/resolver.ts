/**
 * Target resolver — turns a hostname into the addresses to probe.
 *
 * Uses the system resolver (getaddrinfo, so /etc/hosts applies) unless a
 * nameserver is configured, in which case A and AAAA records are queried
 * from that server directly. Results are never cached here; the target
 * managers decide when to re-resolve.
 */

import { lookup, Resolver } from "node:dns/promises";
import type { ResolvedAddress } from "@ping-exporter/shared";
import { ResolutionError, errorMessage } from "../errors.js";
import { addressFamily } from "../probe/identity.js";

const DNS_PORT = 53;

export interface ITargetResolver {
  /** Ordered addresses for `host`; throws ResolutionError when there are none */
  resolve(host: string): Promise<ResolvedAddress[]>;
}

/**
 * Normalize a nameserver to `ip:port`, appending the DNS port when none
 * is given. IPv6 literals are bracketed.
 */
export function nameserverAddress(nameserver: string): string {
  if (addressFamily(nameserver) === 6) return `[${nameserver}]:${DNS_PORT}`;
  if (addressFamily(nameserver) === 4) return `${nameserver}:${DNS_PORT}`;
  return nameserver;
}

export class DnsTargetResolver implements ITargetResolver {
  private resolver: Resolver | null = null;

  constructor(nameserver = "") {
    if (nameserver) {
      this.resolver = new Resolver();
      this.resolver.setServers([nameserverAddress(nameserver)]);
    }
  }

  async resolve(host: string): Promise<ResolvedAddress[]> {
    const literal = addressFamily(host);
    if (literal) return [{ address: host, family: literal }];

    let addresses: ResolvedAddress[];
    try {
      addresses = this.resolver
        ? await this.queryNameserver(this.resolver, host)
        : await this.querySystem(host);
    } catch (err) {
      throw new ResolutionError(host, `error resolving target ${host}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (addresses.length === 0) {
      throw new ResolutionError(host, `cannot resolve target ${host}`);
    }
    return addresses;
  }

  private async querySystem(host: string): Promise<ResolvedAddress[]> {
    const results = await lookup(host, { all: true, verbatim: true });
    const addresses: ResolvedAddress[] = [];
    for (const r of results) {
      if (r.family === 4 || r.family === 6) {
        addresses.push({ address: r.address, family: r.family });
      }
    }
    return addresses;
  }

  /** A then AAAA; fails only when both queries fail */
  private async queryNameserver(resolver: Resolver, host: string): Promise<ResolvedAddress[]> {
    const [v4, v6] = await Promise.allSettled([
      resolver.resolve4(host),
      resolver.resolve6(host),
    ]);

    if (v4.status === "rejected" && v6.status === "rejected") {
      throw v4.reason;
    }

    return [
      ...(v4.status === "fulfilled" ? v4.value : []).map((address) => ({ address, family: 4 as const })),
      ...(v6.status === "fulfilled" ? v6.value : []).map((address) => ({ address, family: 6 as const })),
    ];
  }
}

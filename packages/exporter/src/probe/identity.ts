import { isIP } from "node:net";
import type { AddressFamily, ProbeIdentity, ResolvedAddress } from "@ping-exporter/shared";

/** Family of an IP literal, or null if `address` is not one */
export function addressFamily(address: string): AddressFamily | null {
  const v = isIP(address);
  return v === 4 || v === 6 ? v : null;
}

/** Serialize an identity: `"<host> <address> <family>"` */
export function formatIdentity(host: string, addr: ResolvedAddress): string {
  return `${host} ${addr.address} ${addr.family}`;
}

/**
 * Split an identity string back into its parts. The first two
 * space-separated tokens are host and address; the remainder is the family.
 * Returns null for keys that do not have all three parts.
 */
export function parseIdentity(identity: string): ProbeIdentity | null {
  const first = identity.indexOf(" ");
  if (first <= 0) return null;
  const second = identity.indexOf(" ", first + 1);
  if (second <= first + 1) return null;

  const host = identity.slice(0, first);
  const address = identity.slice(first + 1, second);
  const rest = identity.slice(second + 1);
  if (rest !== "4" && rest !== "6") return null;

  return { host, address, family: rest === "4" ? 4 : 6 };
}

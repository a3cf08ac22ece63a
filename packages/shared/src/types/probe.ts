/**
 * Probe engine interface — the contract between the target managers,
 * the metrics bridge and whatever actually sends echo requests.
 *
 * IMPORTANT: This interface must remain independent of the web framework
 * and of DNS resolution. The engine only ever sees concrete addresses,
 * keyed by their probe identity.
 */

/** IP address family of a probed address */
export type AddressFamily = 4 | 6;

/** A single address a hostname resolved to */
export interface ResolvedAddress {
  address: string;
  family: AddressFamily;
}

/**
 * Composite key of one monitored address.
 * Serialized as `"<host> <address> <family>"` (see `formatIdentity`).
 */
export interface ProbeIdentity extends ResolvedAddress {
  host: string;
}

/** Statistics over the engine's probe history for one identity */
export interface ProbeMetrics {
  packetsSent: number;
  packetsLost: number;
  /** Round trip times, in milliseconds */
  best: number;
  worst: number;
  mean: number;
  stddev: number;
}

/** Point-in-time copy of every identity's statistics, keyed by identity string */
export type MetricsSnapshot = Map<string, ProbeMetrics>;

/** The probe engine's public interface */
export interface IProbeEngine {
  /**
   * Start probing an address under the given identity after `delayMs`.
   * Registering an identity that is already registered is a no-op.
   * Throws if the address cannot be probed.
   */
  register(identity: string, target: ResolvedAddress, delayMs: number): void;

  /** Stop probing an identity and drop its statistics (no-op if unknown) */
  deregister(identity: string): void;

  /** Copy of the current statistics; never shared with the engine's state */
  export(): MetricsSnapshot;

  /** Stop every probe */
  close(): void;
}

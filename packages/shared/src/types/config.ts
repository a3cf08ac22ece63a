/**
 * Resolved exporter configuration — the merge of the optional config file
 * and the command-line flags.
 */

/** Unit scale for exported round trip times */
export type RttUnit = "s" | "ms" | "both";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export interface PingSettings {
  intervalMs: number;
  timeoutMs: number;
  /** ICMP payload size in bytes (0–65500) */
  payloadSize: number;
  /** Number of results remembered per address */
  historySize: number;
}

export interface DnsSettings {
  /** Re-resolution interval for static targets; 0 disables it */
  refreshMs: number;
  /** Nameserver IP to resolve against; empty means the system resolver */
  nameserver: string;
}

export interface ListenAddress {
  host: string;
  port: number;
}

export interface ExporterConfig {
  targets: string[];
  ping: PingSettings;
  dns: DnsSettings;
  /** Idle time after which an on-demand target is dropped */
  targetTimeoutMs: number;
  metrics: {
    /** Also expose `ping_rtt_<unit>{type=...}` */
    deprecated: boolean;
    rttUnit: RttUnit;
  };
  web: {
    listen: ListenAddress;
    metricsPath: string;
  };
  logLevel: LogLevel;
}

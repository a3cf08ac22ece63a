export type {
  AddressFamily,
  ResolvedAddress,
  ProbeIdentity,
  ProbeMetrics,
  MetricsSnapshot,
  IProbeEngine,
} from "./types/probe.js";
export type {
  RttUnit,
  LogLevel,
  PingSettings,
  DnsSettings,
  ListenAddress,
  ExporterConfig,
} from "./types/config.js";

/**
 * Command-line flags. Positional arguments are targets.
 *
 * Flags are defaults: they only fill the fields a config file leaves empty
 * (see `resolveConfig`).
 */

import { parseArgs } from "node:util";
import { UsageError, errorMessage } from "../errors.js";

export interface CliFlags {
  listenAddress: string;
  metricsPath: string;
  configPath: string;
  pingInterval: string;
  pingTimeout: string;
  pingSize: string;
  historySize: string;
  dnsRefresh: string;
  dnsNameserver: string;
  logLevel: string;
  targetsTimeout: string;
  deprecatedMetrics: string;
  rttUnit: string;
  version: boolean;
  targets: string[];
}

export const DEFAULT_FLAGS: CliFlags = {
  listenAddress: ":9427",
  metricsPath: "/metrics",
  configPath: "",
  pingInterval: "5s",
  pingTimeout: "4s",
  pingSize: "56",
  historySize: "10",
  dnsRefresh: "1m",
  dnsNameserver: "",
  logLevel: "info",
  targetsTimeout: "10",
  deprecatedMetrics: "enable",
  rttUnit: "ms",
  version: false,
  targets: [],
};

const OPTIONS = {
  "web.listen-address": { type: "string" },
  "web.telemetry-path": { type: "string" },
  "config.path": { type: "string" },
  "ping.interval": { type: "string" },
  "ping.timeout": { type: "string" },
  "ping.size": { type: "string" },
  "ping.history-size": { type: "string" },
  "dns.refresh": { type: "string" },
  "dns.nameserver": { type: "string" },
  "log.level": { type: "string" },
  "targets.timeout": { type: "string" },
  "metrics.deprecated": { type: "string" },
  "metrics.rttunit": { type: "string" },
  version: { type: "boolean" },
} as const;

export const USAGE = `usage: ping-exporter [<flags>] [<targets>...]

Flags:
  --web.listen-address=":9427"  Address on which to expose metrics and web interface
  --web.telemetry-path="/metrics"
                                Path under which to expose metrics
  --config.path=""              Path to config file (JSON)
  --ping.interval=5s            Interval for ICMP echo requests
  --ping.timeout=4s             Timeout for ICMP echo request
  --ping.size=56                Payload size for ICMP echo requests
  --ping.history-size=10        Number of results to remember per target
  --dns.refresh=1m              Interval for refreshing DNS records and updating targets accordingly (0 if disabled)
  --dns.nameserver=""           DNS server used to resolve hostname of targets
  --log.level="info"            Only log messages with the given severity or above. Valid levels: [debug, info, warn, error, fatal]
  --targets.timeout=10          Timeout in seconds to remove not queried targets
  --metrics.deprecated="enable" Enable or disable deprecated metrics (ping_rtt_ms{type=best|worst|mean|std_dev}). Valid choices: [enable, disable]
  --metrics.rttunit="ms"        Export ping results as either millis (default), or seconds (best practice), or both (for migrations). Valid choices: [ms, s, both]
  --version                     Print version information
`;

function parse(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

export function parseFlags(argv: string[]): CliFlags {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    throw new UsageError(errorMessage(err), { cause: err });
  }

  const v = parsed.values;
  const d = DEFAULT_FLAGS;
  return {
    listenAddress: v["web.listen-address"] ?? d.listenAddress,
    metricsPath: v["web.telemetry-path"] ?? d.metricsPath,
    configPath: v["config.path"] ?? d.configPath,
    pingInterval: v["ping.interval"] ?? d.pingInterval,
    pingTimeout: v["ping.timeout"] ?? d.pingTimeout,
    pingSize: v["ping.size"] ?? d.pingSize,
    historySize: v["ping.history-size"] ?? d.historySize,
    dnsRefresh: v["dns.refresh"] ?? d.dnsRefresh,
    dnsNameserver: v["dns.nameserver"] ?? d.dnsNameserver,
    logLevel: v["log.level"] ?? d.logLevel,
    targetsTimeout: v["targets.timeout"] ?? d.targetsTimeout,
    deprecatedMetrics: v["metrics.deprecated"] ?? d.deprecatedMetrics,
    rttUnit: v["metrics.rttunit"] ?? d.rttUnit,
    version: v.version ?? d.version,
    targets: parsed.positionals,
  };
}

/**
 * Builds the ExporterConfig from the optional config file and the flags.
 *
 * File values win; a flag only fills a field the file leaves empty or
 * zero. Every invalid value is a UsageError (fatal at startup).
 */

import { readFile } from "node:fs/promises";
import { Value } from "@sinclair/typebox/value";
import type { ExporterConfig, ListenAddress, LogLevel } from "@ping-exporter/shared";
import { UsageError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { isRttUnit } from "../metrics/rtt-scale.js";
import { addressFamily } from "../probe/identity.js";
import { ConfigFile } from "./config.schemas.js";
import { parseDuration } from "./duration.js";
import type { CliFlags } from "./flags.js";

const MAX_PAYLOAD_SIZE = 65500;
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function duration(name: string, text: string): number {
  const ms = parseDuration(text);
  if (ms === null) throw new UsageError(`${name}: invalid duration "${text}"`);
  return ms;
}

function integer(name: string, text: string): number {
  if (!/^\d+$/.test(text)) throw new UsageError(`${name}: expected a non-negative integer, got "${text}"`);
  return parseInt(text, 10);
}

/**
 * Parse `[host]:port`. An empty host listens on all interfaces.
 */
export function parseListenAddress(text: string): ListenAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d{1,5})$/.exec(text);
  const port = match ? parseInt(match[3], 10) : NaN;
  if (!match || port > 65535) {
    throw new UsageError(`web.listen-address: invalid address "${text}"`);
  }
  const host = match[1] ?? match[2];
  return { host: host || "0.0.0.0", port };
}

/** Metrics path with a leading slash; empty falls back to /metrics */
export function normalizeMetricsPath(path: string): string {
  if (path === "") {
    logger.warn("web.telemetry-path is empty, correcting to `/metrics`");
    return "/metrics";
  }
  return path.startsWith("/") ? path : `/${path}`;
}

/** Parse and validate the JSON config file contents */
export function parseConfigFile(text: string): ConfigFile {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new UsageError(`could not load config.path: ${errorMessage(err)}`, { cause: err });
  }

  if (!Value.Check(ConfigFile, data)) {
    const first = Value.Errors(ConfigFile, data).First();
    const where = first?.path || "/";
    throw new UsageError(`could not load config.path: ${where}: ${first?.message ?? "invalid value"}`);
  }
  return data;
}

/** Merge file and flags into the final configuration */
export function resolveConfig(flags: CliFlags, file: ConfigFile = {}): ExporterConfig {
  let deprecated: boolean;
  switch (flags.deprecatedMetrics) {
    case "enable":
      deprecated = true;
      break;
    case "disable":
      deprecated = false;
      break;
    default:
      throw new UsageError("metrics.deprecated must be `enable` or `disable`");
  }

  const rttUnit = flags.rttUnit;
  if (!isRttUnit(rttUnit)) {
    throw new UsageError("metrics.rttunit must be `ms` for millis, or `s` for seconds, or `both`");
  }

  const logLevel = flags.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new UsageError(`log.level must be one of: ${LOG_LEVELS.join(", ")}`);
  }

  const ping: NonNullable<ConfigFile["ping"]> = file.ping ?? {};
  const dns: NonNullable<ConfigFile["dns"]> = file.dns ?? {};

  const historySize = ping["history-size"] || integer("ping.history-size", flags.historySize);
  if (historySize < 1) {
    throw new UsageError("ping.history-size must be greater than 0");
  }

  const payloadSize = ping["payload-size"] || integer("ping.size", flags.pingSize);
  if (payloadSize > MAX_PAYLOAD_SIZE) {
    throw new UsageError(`ping.size must be between 0 and ${MAX_PAYLOAD_SIZE}`);
  }

  const nameserver = dns.nameserver || flags.dnsNameserver;
  if (nameserver && addressFamily(nameserver) === null) {
    throw new UsageError(`dns.nameserver must be an IP address, got "${nameserver}"`);
  }

  const targetsTimeout = integer("targets.timeout", flags.targetsTimeout);
  if (targetsTimeout < 1) {
    throw new UsageError("targets.timeout must be greater than 0");
  }

  return {
    targets: file.targets?.length ? file.targets : flags.targets,
    ping: {
      intervalMs:
        (ping.interval && duration("ping.interval", ping.interval)) ||
        duration("ping.interval", flags.pingInterval),
      timeoutMs:
        (ping.timeout && duration("ping.timeout", ping.timeout)) ||
        duration("ping.timeout", flags.pingTimeout),
      payloadSize,
      historySize,
    },
    dns: {
      refreshMs:
        (dns.refresh && duration("dns.refresh", dns.refresh)) ||
        duration("dns.refresh", flags.dnsRefresh),
      nameserver,
    },
    targetTimeoutMs: targetsTimeout * 1000,
    metrics: { deprecated, rttUnit },
    web: {
      listen: parseListenAddress(flags.listenAddress),
      metricsPath: normalizeMetricsPath(flags.metricsPath),
    },
    logLevel,
  };
}

/** Read the config file named by `--config.path` (if any) and merge it with the flags */
export async function loadConfig(flags: CliFlags): Promise<ExporterConfig> {
  if (!flags.configPath) return resolveConfig(flags);

  let text: string;
  try {
    text = await readFile(flags.configPath, "utf8");
  } catch (err) {
    throw new UsageError(`could not load config.path: ${errorMessage(err)}`, { cause: err });
  }
  return resolveConfig(flags, parseConfigFile(text));
}

#!/usr/bin/env node
import type { ExporterConfig } from "@ping-exporter/shared";
import { buildApp } from "./app.js";
import { loadConfig, parseFlags, USAGE } from "./config/index.js";
import { ProbeTransportError, UsageError } from "./errors.js";
import { logger } from "./logger.js";
import { PingProbeEngine } from "./probe/ping-engine.js";
import { VERSION } from "./version.js";

const EXIT_USAGE = 1;
const EXIT_TRANSPORT = 2;

function fatalUsage(err: UsageError): never {
  console.error(`ping-exporter: error: ${err.message}\n`);
  console.error(USAGE);
  process.exit(EXIT_USAGE);
}

async function configure(argv: string[]): Promise<ExporterConfig> {
  try {
    const flags = parseFlags(argv);
    if (flags.version) {
      console.log("ping-exporter");
      console.log(`Version: ${VERSION}`);
      process.exit(0);
    }
    const config = await loadConfig(flags);
    logger.level = config.logLevel;
    return config;
  } catch (err) {
    if (err instanceof UsageError) fatalUsage(err);
    throw err;
  }
}

const config = await configure(process.argv.slice(2));

logger.info({ rttUnit: config.metrics.rttUnit }, "rtt units");

const engine = new PingProbeEngine(config.ping);
try {
  await engine.verify();
} catch (err) {
  logger.error({ err }, err instanceof ProbeTransportError ? err.message : "cannot start monitoring");
  process.exit(EXIT_TRANSPORT);
}

const app = await buildApp(config, { engine });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}

// Start
const { host, port } = config.web.listen;

try {
  app.log.info(`Starting ping exporter (Version: ${VERSION})`);
  await app.listen({ port, host });
  app.log.info(`Listening for ${config.web.metricsPath} on ${host}:${port}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

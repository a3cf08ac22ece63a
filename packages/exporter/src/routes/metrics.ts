/**
 * Metrics route — the Prometheus scrape endpoint.
 *
 *   GET <path>                 batch export of every registered target
 *   GET <path>?target=<host>   probe <host> on demand and export only it
 */

import type { FastifyPluginAsync } from "fastify";
import { MetricsQuery } from "./metrics.schemas.js";

export interface MetricsRoutesOptions {
  metricsPath: string;
}

export const metricsRoutes: FastifyPluginAsync<MetricsRoutesOptions> = async (app, opts) => {
  app.get<{ Querystring: MetricsQuery }>(
    opts.metricsPath,
    { schema: { querystring: MetricsQuery } },
    async (request, reply) => {
      const { target } = request.query;

      if (!target) {
        const body = await app.metricsBridge.renderAll();
        return reply.type(app.metricsBridge.contentType).send(body);
      }

      // Throws ResolutionError (400) / RegistrationError (500)
      const identity = await app.ephemeralTargets.request(target);
      const body = await app.metricsBridge.renderTarget(identity);
      return reply.type(app.metricsBridge.contentType).send(body);
    },
  );
};

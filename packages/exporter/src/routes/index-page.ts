import type { FastifyPluginAsync } from "fastify";
import { VERSION } from "../version.js";

export interface IndexPageOptions {
  metricsPath: string;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function indexHtml(metricsPath: string): string {
  return `<!doctype html>
<html>
<head>
	<meta charset="UTF-8">
	<title>ping Exporter (Version ${VERSION})</title>
</head>
<body>
	<h1>ping Exporter</h1>
	<p><a href="${escapeHtml(metricsPath)}">Metrics</a></p>
</body>
</html>
`;
}

export const indexPageRoutes: FastifyPluginAsync<IndexPageOptions> = async (app, opts) => {
  const html = indexHtml(opts.metricsPath);

  app.get("/", async (_request, reply) => {
    return reply.type("text/html; charset=utf-8").send(html);
  });
};

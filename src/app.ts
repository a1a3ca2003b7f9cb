import { Hono, type Context } from "hono";
import { z } from "zod";
import { logger, errorMessage } from "./logger";
import { formatAlertMessage } from "./alerts";
import { extractServicePrefix } from "./attribution";
import { classifyLogFilename, filterRecentLogs } from "./logs";
import {
  analyzeServer,
  createCollaborators,
  loadRegistry,
  type ServerCollaborators,
} from "./pipeline";
import { isQueryWindow } from "./windows";
import {
  findServer,
  getEnabledServers,
  type AppConfig,
  type ServerDefinition,
} from "./config";
import type { QueryWindow } from "./types";

const MAX_BATCH = 5000;
const DEFAULT_RECENT_HOURS = 24;

const logEntrySchema = z.object({
  name: z.string(),
  lastModified: z.coerce.date(),
  isDir: z.boolean().default(false),
  size: z.number().nonnegative().default(0),
});

const classifyBodySchema = z
  .object({
    filenames: z.array(z.string()).max(MAX_BATCH).optional(),
    entries: z.array(logEntrySchema).max(MAX_BATCH).optional(),
    since: z.coerce.date().optional(),
  })
  .refine((body) => body.filenames !== undefined || body.entries !== undefined, {
    message: "filenames or entries required",
  });

const servicesBodySchema = z.object({
  services: z.array(z.string()).max(MAX_BATCH),
});

async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (error) {
    logger.warn(`Request to ${c.req.path} with invalid JSON: ${errorMessage(error)}`);
    return undefined;
  }
}

export function createApp(
  config: AppConfig,
  collaboratorsFor: (server: ServerDefinition) => ServerCollaborators = (
    server,
  ) => createCollaborators(server, config),
): Hono {
  const app = new Hono();

  function analyze(server: ServerDefinition, window: QueryWindow) {
    return analyzeServer(collaboratorsFor(server), {
      serverKey: server.key,
      serverName: server.name,
      window,
      recentRunsLimit: config.env.recentRunsLimit,
    });
  }

  app.get("/health", (c) => {
    return c.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: "1.0.0",
      servers: getEnabledServers(config).length,
    });
  });

  app.get("/status", (c) => {
    return c.json({
      timestamp: new Date().toISOString(),
      environment: config.env.nodeEnv,
      queryWindow: config.env.queryWindow,
      evaluationCron: config.env.evaluationCron,
      enabledServers: getEnabledServers(config).map((s) => s.key),
      logRules: {
        serviceKeywords: config.logRules.serviceKeywords.length,
        severityKeywords: config.logRules.severityKeywords.length,
      },
    });
  });

  app.get("/api/servers", (c) => {
    const servers = getEnabledServers(config).map((s) => ({
      key: s.key,
      name: s.name,
      ingestPrefixes: s.ingestPrefixes,
    }));
    return c.json({ count: servers.length, servers });
  });

  app.get("/api/servers/:key/report", async (c) => {
    const server = findServer(config, c.req.param("key"));
    if (!server) return c.json({ error: "Server not found" }, 404);

    const window = c.req.query("window") ?? config.env.queryWindow;
    if (!isQueryWindow(window)) {
      return c.json({ error: `Unknown window: ${window}` }, 400);
    }

    return c.json(await analyze(server, window));
  });

  app.get("/api/servers/:key/statistics", async (c) => {
    const server = findServer(config, c.req.param("key"));
    if (!server) return c.json({ error: "Server not found" }, 404);

    const window = c.req.query("window") ?? config.env.queryWindow;
    if (!isQueryWindow(window)) {
      return c.json({ error: `Unknown window: ${window}` }, 400);
    }

    const report = await analyze(server, window);
    return c.json({
      server: report.serverKey,
      window: report.window,
      createdAfter: report.createdAfter,
      summary: report.summary,
      statistics: report.statistics,
    });
  });

  app.get("/api/servers/:key/alerts", async (c) => {
    const server = findServer(config, c.req.param("key"));
    if (!server) return c.json({ error: "Server not found" }, 404);

    const report = await analyze(server, config.env.queryWindow);
    return c.json({
      server: report.serverKey,
      queueAlert: report.queueAlert,
      failureAlert: report.failureAlert,
      message: formatAlertMessage(report.serverName, report.queueAlert),
    });
  });

  app.post("/api/servers/:key/logs/classify", async (c) => {
    const server = findServer(config, c.req.param("key"));
    if (!server) return c.json({ error: "Server not found" }, 404);

    const body = await readJsonBody(c);
    if (body === undefined) return c.json({ error: "Body must be JSON" }, 400);

    const parsed = classifyBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        { error: "Expected { filenames: string[] } or { entries: LogEntry[], since? }" },
        400,
      );
    }

    const { filenames = [], entries = [], since } = parsed.data;
    const cutoff =
      since ?? new Date(Date.now() - DEFAULT_RECENT_HOURS * 60 * 60 * 1000);
    const paths = [
      ...filenames,
      ...filterRecentLogs(entries, cutoff).map((entry) => entry.name),
    ];

    const registry = await loadRegistry(collaboratorsFor(server).documents);
    const files = paths.map((name) =>
      classifyLogFilename(name, registry.knownSources, config.logRules),
    );
    return c.json({ server: server.key, count: files.length, files });
  });

  app.post("/api/servers/:key/services/resolve", async (c) => {
    const server = findServer(config, c.req.param("key"));
    if (!server) return c.json({ error: "Server not found" }, 404);

    const body = await readJsonBody(c);
    if (body === undefined) return c.json({ error: "Body must be JSON" }, 400);

    const parsed = servicesBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "Expected { services: string[] }" }, 400);
    }

    const services = parsed.data.services.map((service) => {
      const prefix = extractServicePrefix(service);
      return {
        service,
        prefix,
        configured: prefix !== null && server.ingestPrefixes.includes(prefix),
      };
    });
    return c.json({ server: server.key, services });
  });

  return app;
}

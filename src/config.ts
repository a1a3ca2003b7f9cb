import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { logger } from "./logger";
import type { LogRules } from "./logs";
import type { QueryWindow } from "./types";
import { isQueryWindow } from "./windows";

const serverDefinitionSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  graphqlUrl: z.string().url(),
  catalogDocument: z.string().min(1).optional(),
  tenantDocument: z.string().min(1).optional(),
  ingestPrefixes: z.array(z.string()).default([]),
});

const serversConfigSchema = z.object({
  description: z.string().optional(),
  servers: z.array(serverDefinitionSchema),
});

const logRulesSchema = z.object({
  description: z.string().optional(),
  serviceKeywords: z.array(z.string()),
  severityKeywords: z.array(z.string()),
});

export type ServerDefinition = z.infer<typeof serverDefinitionSchema>;
export type ServersConfig = z.infer<typeof serversConfigSchema>;

export interface EnvConfig {
  timezone: string;
  nodeEnv: string;
  port: number;
  queryWindow: QueryWindow;
  recentRunsLimit: number;
  queryTimeoutMs: number;
  serverConcurrency: number;
  evaluationCron: string;
}

export interface AppConfig {
  configDir: string;
  env: EnvConfig;
  servers: ServersConfig;
  logRules: LogRules;
}

export function resolveConfigDir(): string {
  return process.env.CONFIG_DIR ?? join(__dirname, "../config");
}

export function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

export function stripJsonComments(raw: string): string {
  // Strip comments while preserving string contents (avoid corrupting URLs).
  return raw.replace(
    /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
    (match, comment) => (comment ? "" : match),
  );
}

function loadJsonConfig<S extends z.ZodTypeAny>(
  configDir: string,
  filename: string,
  schema: S,
): z.infer<S> {
  const filepath = join(configDir, filename);

  if (!existsSync(filepath)) {
    throw new Error(`Config file not found: ${filepath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(readFileSync(filepath, "utf-8")));
  } catch (error) {
    throw new Error(`Failed to parse config file ${filename}: ${error}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${filename}: ${issues}`);
  }
  return result.data;
}

export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
): EnvConfig {
  const window = env.QUERY_WINDOW ?? "";

  return {
    timezone: env.TZ ?? "UTC",
    nodeEnv: env.NODE_ENV ?? "development",
    port: parseEnvInt(env.PORT, 3000, 1, 65535),
    queryWindow: isQueryWindow(window) ? window : "last_week",
    recentRunsLimit: parseEnvInt(env.RECENT_RUNS_LIMIT, 200, 1, 1000),
    queryTimeoutMs: parseEnvInt(env.QUERY_TIMEOUT_MS, 15000, 1000, 120000),
    serverConcurrency: parseEnvInt(env.SERVER_CONCURRENCY, 2, 1, 16),
    evaluationCron: env.EVALUATION_CRON ?? "*/15 * * * *",
  };
}

export function loadConfig(configDir: string = resolveConfigDir()): AppConfig {
  logger.info("Loading configuration...");

  const env = loadEnvConfig();
  const servers = loadJsonConfig(configDir, "servers.json", serversConfigSchema);
  const logRules = loadJsonConfig(configDir, "log-rules.json", logRulesSchema);

  const keys = new Set<string>();
  for (const server of servers.servers) {
    if (keys.has(server.key)) {
      throw new Error(`Duplicate server key in servers.json: ${server.key}`);
    }
    keys.add(server.key);
  }

  const enabled = servers.servers.filter((s) => s.enabled);
  if (enabled.length === 0) {
    logger.warn("No enabled servers configured — nothing will be monitored");
  }
  for (const server of enabled) {
    if (!server.catalogDocument && !server.tenantDocument) {
      logger.warn(
        `${server.key}: no catalog or tenant document — attribution will use raw pipeline names`,
      );
    }
  }

  logger.info(`Config loaded successfully:`);
  logger.info(
    `  - ${enabled.length} enabled servers: ${enabled.map((s) => s.key).join(", ") || "none"}`,
  );
  logger.info(`  - ${logRules.serviceKeywords.length} log service keywords`);
  logger.info(`  - Query window: ${env.queryWindow}`);
  logger.info(`  - Evaluation schedule: ${env.evaluationCron}`);
  logger.info(`  - Environment: ${env.nodeEnv}`);

  return {
    configDir,
    env,
    servers,
    logRules: {
      serviceKeywords: logRules.serviceKeywords,
      severityKeywords: logRules.severityKeywords,
    },
  };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

export function getEnabledServers(config: AppConfig): ServerDefinition[] {
  return config.servers.servers.filter((s) => s.enabled);
}

export function findServer(
  config: AppConfig,
  key: string,
): ServerDefinition | undefined {
  return getEnabledServers(config).find((s) => s.key === key);
}

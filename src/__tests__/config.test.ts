import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  findServer,
  getEnabledServers,
  loadConfig,
  loadEnvConfig,
  parseEnvInt,
  stripJsonComments,
} from "../config";

const LOG_RULES = JSON.stringify({ serviceKeywords: ["summon"], severityKeywords: ["error"] });

describe("parseEnvInt", () => {
  test("falls back and clamps", () => {
    expect(parseEnvInt(undefined, 7)).toBe(7);
    expect(parseEnvInt("abc", 7)).toBe(7);
    expect(parseEnvInt("42", 7)).toBe(42);
    expect(parseEnvInt("0", 7, 1, 10)).toBe(1);
    expect(parseEnvInt("99", 7, 1, 10)).toBe(10);
  });
});

describe("stripJsonComments", () => {
  test("removes comments but not URLs inside strings", () => {
    const raw = "{\n  // server\n  \"url\": \"http://localhost:3000/graphql\" /* inline */\n}";

    expect(JSON.parse(stripJsonComments(raw))).toEqual({ url: "http://localhost:3000/graphql" });
  });
});

describe("loadEnvConfig", () => {
  test("defaults", () => {
    expect(loadEnvConfig({})).toEqual({
      timezone: "UTC",
      nodeEnv: "development",
      port: 3000,
      queryWindow: "last_week",
      recentRunsLimit: 200,
      queryTimeoutMs: 15000,
      serverConcurrency: 2,
      evaluationCron: "*/15 * * * *",
    });
  });

  test("reads and validates overrides", () => {
    const env = loadEnvConfig({
      PORT: "8080",
      QUERY_WINDOW: "today",
      QUERY_TIMEOUT_MS: "10",
      SERVER_CONCURRENCY: "4",
      EVALUATION_CRON: "0 * * * *",
    });

    expect(env.port).toBe(8080);
    expect(env.queryWindow).toBe("today");
    expect(env.queryTimeoutMs).toBe(1000);
    expect(env.serverConcurrency).toBe(4);
    expect(env.evaluationCron).toBe("0 * * * *");
  });

  test("ignores an unknown window", () => {
    expect(loadEnvConfig({ QUERY_WINDOW: "forever" }).queryWindow).toBe("last_week");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "harvest-watch-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("loads the shipped configuration", () => {
    const config = loadConfig(join(__dirname, "../../config"));

    expect(config.servers.servers.map((s) => s.key)).toEqual(["production", "staging"]);
    expect(getEnabledServers(config).map((s) => s.key)).toEqual(["production"]);
    expect(findServer(config, "staging")).toBeUndefined();
    expect(config.logRules.severityKeywords).toContain("error");
  });

  test("applies schema defaults", () => {
    writeFileSync(
      join(dir, "servers.json"),
      JSON.stringify({ servers: [{ key: "a", name: "A", graphqlUrl: "http://localhost:1/graphql" }] }),
    );
    writeFileSync(join(dir, "log-rules.json"), LOG_RULES);

    const [server] = loadConfig(dir).servers.servers;

    expect(server.enabled).toBe(true);
    expect(server.ingestPrefixes).toEqual([]);
  });

  test("rejects duplicate server keys", () => {
    const server = { key: "a", name: "A", graphqlUrl: "http://localhost:1/graphql" };
    writeFileSync(join(dir, "servers.json"), JSON.stringify({ servers: [server, server] }));
    writeFileSync(join(dir, "log-rules.json"), LOG_RULES);

    expect(() => loadConfig(dir)).toThrow("Duplicate server key in servers.json: a");
  });

  test("rejects invalid and missing files", () => {
    writeFileSync(join(dir, "servers.json"), JSON.stringify({ servers: [{ key: "a" }] }));
    writeFileSync(join(dir, "log-rules.json"), LOG_RULES);

    expect(() => loadConfig(dir)).toThrow("Invalid config file servers.json");

    rmSync(join(dir, "log-rules.json"));
    writeFileSync(join(dir, "servers.json"), JSON.stringify({ servers: [] }));

    expect(() => loadConfig(dir)).toThrow("Config file not found");
  });
});

import { logger, errorMessage } from "./logger";
import { evaluateFailureAlert, evaluateQueueAlert } from "./alerts";
import { attributeRecord, suggestKnownSources } from "./attribution";
import { UNKNOWN_CATEGORY } from "./classifier";
import { mergeRecordBatches } from "./normalizer";
import {
  buildKnownSources,
  countActiveSources,
  extractCatalogSources,
  extractTenantSources,
} from "./registry";
import { aggregate, summarizeServer } from "./statistics";
import { QUEUE_DEPTH_WINDOW_SECONDS, windowStart } from "./windows";
import { GraphqlRunClient, type RunQueryClient } from "./connectors/runs";
import {
  ConfiguredDocumentSource,
  type RegistryDocumentSource,
} from "./connectors/documents";
import { getEnabledServers, type AppConfig, type ServerDefinition } from "./config";
import type {
  ActiveSourceCount,
  CatalogSource,
  JobRecord,
  QueryWindow,
  ServerReport,
  TenantSource,
  UnattributedPipeline,
} from "./types";

export interface ServerCollaborators {
  runs: RunQueryClient;
  documents: RegistryDocumentSource;
}

export interface AnalyzeOptions {
  serverKey: string;
  serverName: string;
  window: QueryWindow;
  recentRunsLimit: number;
  now?: Date;
}

export interface RegistrySnapshot {
  catalog: CatalogSource[];
  tenants: TenantSource[];
  knownSources: string[];
  activeSources: ActiveSourceCount;
}

// Collaborator calls

export async function loadRegistry(
  documents: RegistryDocumentSource,
): Promise<RegistrySnapshot> {
  const [catalogDoc, tenantDoc] = await Promise.all([
    documents.loadCatalog(),
    documents.loadTenants(),
  ]);

  const catalog = extractCatalogSources(catalogDoc);
  const tenants = extractTenantSources(tenantDoc);

  return {
    catalog,
    tenants,
    knownSources: buildKnownSources(catalog, tenants),
    activeSources: countActiveSources(catalog, tenants),
  };
}

export async function collectRecords(
  runs: RunQueryClient,
  createdAfter: number,
  recentRunsLimit: number,
): Promise<JobRecord[]> {
  const [allRuns, success, failure, started, queued] = await Promise.all([
    runs.fetchRecentRuns(recentRunsLimit),
    runs.fetchRunsByStatus("SUCCESS", createdAfter),
    runs.fetchRunsByStatus("FAILURE", createdAfter),
    runs.fetchRunsByStatus("STARTED", createdAfter),
    runs.fetchRunsByStatus("QUEUED", createdAfter),
  ]);

  return mergeRecordBatches({
    allRuns,
    byStatus: {
      SUCCESS: success,
      FAILURE: failure,
      STARTED: started,
      QUEUED: queued,
    },
  });
}

export async function fetchQueueDepth(
  runs: RunQueryClient,
  now: Date,
): Promise<number> {
  const since = Math.floor(now.getTime() / 1000) - QUEUE_DEPTH_WINDOW_SECONDS;
  const queued = await runs.fetchRunsByStatus("QUEUED", since);
  return queued.length;
}

// Report assembly

export function findUnattributed(
  records: readonly JobRecord[],
  knownSources: readonly string[],
): UnattributedPipeline[] {
  const counts = new Map<string, number>();

  for (const record of records) {
    if (attributeRecord(record, knownSources).source !== UNKNOWN_CATEGORY) {
      continue;
    }
    counts.set(record.pipelineName, (counts.get(record.pipelineName) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([pipelineName, runCount]) => ({
      pipelineName,
      runCount,
      suggestions: suggestKnownSources(pipelineName, knownSources),
    }));
}

export function buildReport(
  options: AnalyzeOptions,
  registry: RegistrySnapshot,
  records: readonly JobRecord[],
  queuedCount: number,
): ServerReport {
  const now = options.now ?? new Date();
  const statistics = [...aggregate(records, registry.knownSources).values()];
  const summary = summarizeServer(statistics);

  return {
    serverKey: options.serverKey,
    serverName: options.serverName,
    window: options.window,
    createdAfter: windowStart(options.window, now),
    generatedAt: now.toISOString(),
    knownSources: registry.knownSources,
    activeSources: registry.activeSources,
    recordCount: records.length,
    statistics,
    summary,
    queueAlert: evaluateQueueAlert(queuedCount, registry.activeSources.count),
    failureAlert: evaluateFailureAlert(summary.failedJobs),
    unattributed: findUnattributed(records, registry.knownSources),
  };
}

export function emptyReport(options: AnalyzeOptions): ServerReport {
  return buildReport(
    options,
    {
      catalog: [],
      tenants: [],
      knownSources: [],
      activeSources: { count: 0, origin: "none" },
    },
    [],
    0,
  );
}

/**
 * One server, one fresh snapshot. Never throws: a failure is logged and an
 * empty report is returned so other servers keep going.
 */
export async function analyzeServer(
  collaborators: ServerCollaborators,
  options: AnalyzeOptions,
): Promise<ServerReport> {
  const now = options.now ?? new Date();
  const createdAfter = windowStart(options.window, now);

  try {
    const [registry, records, queuedCount] = await Promise.all([
      loadRegistry(collaborators.documents),
      collectRecords(collaborators.runs, createdAfter, options.recentRunsLimit),
      fetchQueueDepth(collaborators.runs, now),
    ]);

    logger.info(
      `${options.serverKey}: ${records.length} unique runs, ${registry.knownSources.length} known sources, ${queuedCount} queued (1h)`,
    );

    return buildReport({ ...options, now }, registry, records, queuedCount);
  } catch (error) {
    logger.error(
      `Error getting statistics for ${options.serverKey}: ${errorMessage(error)}`,
    );
    return emptyReport({ ...options, now });
  }
}

// All servers

export function createCollaborators(
  server: ServerDefinition,
  config: AppConfig,
): ServerCollaborators {
  return {
    runs: new GraphqlRunClient(
      server.key,
      server.graphqlUrl,
      config.env.queryTimeoutMs,
    ),
    documents: new ConfiguredDocumentSource(
      server.catalogDocument,
      server.tenantDocument,
      config.configDir,
      config.env.queryTimeoutMs,
    ),
  };
}

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await processor(items[index]);
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => worker(),
  );
  await Promise.all(workers);
  return results;
}

export async function analyzeAllServers(
  config: AppConfig,
  options: {
    window?: QueryWindow;
    collaboratorsFor?: (server: ServerDefinition) => ServerCollaborators;
  } = {},
): Promise<ServerReport[]> {
  const window = options.window ?? config.env.queryWindow;
  const collaboratorsFor =
    options.collaboratorsFor ?? ((server) => createCollaborators(server, config));

  return runWithConcurrency(
    getEnabledServers(config),
    config.env.serverConcurrency,
    (server) =>
      analyzeServer(collaboratorsFor(server), {
        serverKey: server.key,
        serverName: server.name,
        window,
        recentRunsLimit: config.env.recentRunsLimit,
      }),
  );
}

/**
 * Job-execution GraphQL client.
 * Every failure (transport, HTTP, GraphQL error type, unexpected shape)
 * degrades to an empty page and a logged warning.
 */

import { z } from "zod";
import { logger } from "../logger";
import { parseJobRecords, type StatusBatchKey } from "../normalizer";
import type { JobRecord } from "../types";
import { fetchJson } from "./base";

export interface RunQueryClient {
  /** Unfiltered recent runs, including tags and assets. */
  fetchRecentRuns(limit: number): Promise<JobRecord[]>;
  fetchRunsByStatus(
    status: StatusBatchKey,
    createdAfter?: number,
  ): Promise<JobRecord[]>;
}

const RUN_FIELDS = `
  runId
  jobName
  pipelineName
  status
  startTime
  endTime
  creationTime
  tags {
    key
    value
  }
  assets {
    key {
      path
    }
  }
`;

export const RECENT_RUNS_QUERY = `
query RecentRuns($limit: Int) {
  runsOrError(limit: $limit) {
    __typename
    ... on Runs {
      results {${RUN_FIELDS}}
    }
    ... on Error {
      message
    }
  }
}`;

export const FILTERED_RUNS_QUERY = `
query FilteredRuns($filter: RunsFilter, $cursor: String, $limit: Int) {
  runsOrError(filter: $filter, cursor: $cursor, limit: $limit) {
    __typename
    ... on Runs {
      results {${RUN_FIELDS}}
    }
    ... on Error {
      message
    }
  }
}`;

export const STATUS_PAGE_LIMIT = 100;
// Caps one status query at 5000 runs
export const MAX_STATUS_PAGES = 50;

const graphqlResponseSchema = z.object({
  data: z
    .object({
      runsOrError: z.object({
        __typename: z.string(),
        results: z.array(z.unknown()).optional(),
        message: z.string().optional(),
      }),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export function extractRunResults(payload: unknown, label: string): unknown[] {
  const parsed = graphqlResponseSchema.safeParse(payload);
  if (!parsed.success) {
    logger.warn(`${label}: unexpected response shape — treating as empty`);
    return [];
  }

  const { data, errors } = parsed.data;
  if (errors && errors.length > 0) {
    logger.warn(`${label}: GraphQL errors — ${errors.map((e) => e.message).join("; ")}`);
  }

  const runsOrError = data?.runsOrError;
  if (!runsOrError) return [];

  if (runsOrError.__typename !== "Runs") {
    logger.warn(
      `${label}: ${runsOrError.__typename}${runsOrError.message ? ` — ${runsOrError.message}` : ""}`,
    );
    return [];
  }

  return runsOrError.results ?? [];
}

export class GraphqlRunClient implements RunQueryClient {
  constructor(
    private readonly serverKey: string,
    private readonly url: string,
    private readonly timeoutMs: number,
  ) {}

  async fetchRecentRuns(limit: number): Promise<JobRecord[]> {
    return this.query("recent runs", RECENT_RUNS_QUERY, { limit });
  }

  /** Follows the run-id cursor until a short page comes back. */
  async fetchRunsByStatus(
    status: StatusBatchKey,
    createdAfter?: number,
  ): Promise<JobRecord[]> {
    const filter: Record<string, unknown> = { statuses: [status] };
    if (createdAfter !== undefined) filter.createdAfter = createdAfter;

    const records: JobRecord[] = [];
    let cursor: string | undefined;

    for (let page = 1; page <= MAX_STATUS_PAGES; page++) {
      const variables: Record<string, unknown> = {
        filter,
        limit: STATUS_PAGE_LIMIT,
      };
      if (cursor !== undefined) variables.cursor = cursor;

      const result = await this.queryPage(
        `${status} runs (page ${page})`,
        FILTERED_RUNS_QUERY,
        variables,
      );
      records.push(...result.records);

      const last = result.records[result.records.length - 1];
      if (result.pageSize < STATUS_PAGE_LIMIT || !last || last.runId === cursor) {
        return records;
      }
      cursor = last.runId;
    }

    logger.warn(
      `${this.serverKey} ${status} runs: stopped after ${MAX_STATUS_PAGES} pages, count is a lower bound`,
    );
    return records;
  }

  private async query(
    label: string,
    query: string,
    variables: Record<string, unknown>,
  ): Promise<JobRecord[]> {
    return (await this.queryPage(label, query, variables)).records;
  }

  private async queryPage(
    label: string,
    query: string,
    variables: Record<string, unknown>,
  ): Promise<{ records: JobRecord[]; pageSize: number }> {
    const result = await fetchJson({
      url: this.url,
      method: "POST",
      timeoutMs: this.timeoutMs,
      body: { query, variables },
    });

    const context = `${this.serverKey} ${label}`;
    if (!result.success) {
      logger.warn(`${context}: query failed — ${result.error}`);
      return { records: [], pageSize: 0 };
    }

    const results = extractRunResults(result.data, context);
    const records = parseJobRecords(results);
    logger.debug(`${context}: ${records.length} records in ${result.responseTimeMs}ms`);
    return { records, pageSize: results.length };
  }
}

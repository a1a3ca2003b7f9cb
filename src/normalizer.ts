import { z } from "zod";
import { logger } from "./logger";
import type { JobRecord, RunStatus, RunTag } from "./types";
import { RUN_STATUSES } from "./types";

// Feed parsing

// Each field falls back on its own; only a missing run id drops an item

const timestampSchema = z.unknown().transform((value) => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string" || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
});

const textSchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .nullish()
  .catch(null);

const listSchema = z.array(z.unknown()).catch([]);

const tagSchema = z.object({
  key: z.string(),
  value: z.union([z.string(), z.number(), z.boolean()]).transform(String),
});

const assetSchema = z.object({
  key: z.object({ path: z.array(z.string()) }),
});

const rawRunSchema = z.object({
  runId: textSchema,
  pipelineName: textSchema,
  jobName: textSchema,
  status: textSchema,
  startTime: timestampSchema,
  endTime: timestampSchema,
  creationTime: timestampSchema,
  tags: listSchema,
  assets: listSchema,
});

export function normalizeStatus(status: string | null | undefined): RunStatus {
  const upper = (status ?? "").trim().toUpperCase();
  return RUN_STATUSES.find((s) => s === upper) ?? "UNKNOWN";
}

function parseTags(rawTags: unknown[]): RunTag[] {
  const tags: RunTag[] = [];
  for (const raw of rawTags) {
    const parsed = tagSchema.safeParse(raw);
    if (parsed.success) tags.push(parsed.data);
  }
  return tags;
}

function parseAssets(rawAssets: unknown[]): string[][] {
  const assets: string[][] = [];
  for (const raw of rawAssets) {
    const parsed = assetSchema.safeParse(raw);
    if (parsed.success) assets.push(parsed.data.key.path);
  }
  return assets;
}

/**
 * Tolerant parser for run items returned by the job-execution API.
 * Items that are not objects or carry no run id are dropped.
 */
export function parseJobRecords(raw: unknown): JobRecord[] {
  if (!Array.isArray(raw)) {
    if (raw !== null && raw !== undefined) {
      logger.warn("Run feed is not a list — treating as empty page");
    }
    return [];
  }

  const records: JobRecord[] = [];
  let dropped = 0;

  for (const item of raw) {
    const parsed = rawRunSchema.safeParse(item);
    const runId = parsed.success ? parsed.data.runId : undefined;
    if (!parsed.success || !runId) {
      dropped++;
      continue;
    }

    const run = parsed.data;
    records.push({
      runId,
      pipelineName: run.pipelineName ?? run.jobName ?? "",
      status: normalizeStatus(run.status),
      startTime: run.startTime,
      endTime: run.endTime,
      creationTime: run.creationTime,
      tags: parseTags(run.tags),
      assets: parseAssets(run.assets),
    });
  }

  if (dropped > 0) {
    logger.debug(`Dropped ${dropped} malformed run item(s) from feed`);
  }

  return records;
}

// Merging

/** Order in which status-filtered batches follow the all-runs batch. */
export const STATUS_BATCH_ORDER = [
  "SUCCESS",
  "FAILURE",
  "STARTED",
  "QUEUED",
] as const;

export type StatusBatchKey = (typeof STATUS_BATCH_ORDER)[number];

export interface RecordBatches {
  /** Unfiltered recent runs; the only batch carrying tags and assets. */
  allRuns: readonly JobRecord[];
  byStatus: Partial<Record<StatusBatchKey, readonly JobRecord[]>>;
}

/**
 * Deduplicates by run id. The first occurrence in batch order is kept and
 * later duplicates are discarded; records without a run id are dropped.
 */
export function mergeRecords(
  batches: ReadonlyArray<readonly JobRecord[]>,
): JobRecord[] {
  const seen = new Set<string>();
  const unique: JobRecord[] = [];

  for (const batch of batches) {
    for (const record of batch) {
      if (!record.runId || seen.has(record.runId)) continue;
      seen.add(record.runId);
      unique.push(record);
    }
  }

  return unique;
}

/**
 * Concatenates all-runs first, then SUCCESS, FAILURE, STARTED, QUEUED.
 * The richer all-runs record wins whenever it is present.
 */
export function mergeRecordBatches(batches: RecordBatches): JobRecord[] {
  const ordered: Array<readonly JobRecord[]> = [batches.allRuns];
  for (const status of STATUS_BATCH_ORDER) {
    ordered.push(batches.byStatus[status] ?? []);
  }
  return mergeRecords(ordered);
}

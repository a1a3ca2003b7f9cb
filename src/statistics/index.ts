import { attributeRecord } from "../attribution";
import type {
  FailedRun,
  JobRecord,
  RankedSource,
  ServerSummary,
  SourceStatistics,
} from "../types";

const MAX_RECENT_FAILURES = 5;
const TOP_SOURCE_COUNT = 3;

interface SourceAccumulator {
  sourceName: string;
  totalJobs: number;
  successJobs: number;
  failedJobs: number;
  runningJobs: number;
  queuedJobs: number;
  otherJobs: number;
  durations: number[];
  pipelineNames: Set<string>;
  tenants: Set<string>;
  partitions: Set<string>;
  failures: FailedRun[];
}

function createAccumulator(sourceName: string): SourceAccumulator {
  return {
    sourceName,
    totalJobs: 0,
    successJobs: 0,
    failedJobs: 0,
    runningJobs: 0,
    queuedJobs: 0,
    otherJobs: 0,
    durations: [],
    pipelineNames: new Set(),
    tenants: new Set(),
    partitions: new Set(),
    failures: [],
  };
}

/** Seconds between start and end, or null unless both exist and end > start. */
export function jobDuration(record: JobRecord): number | null {
  const { startTime, endTime } = record;
  if (startTime === null || endTime === null) return null;
  return endTime > startTime ? endTime - startTime : null;
}

// Aggregate

export function aggregate(
  records: readonly JobRecord[],
  knownSources: readonly string[],
): Map<string, SourceStatistics> {
  const accumulators = new Map<string, SourceAccumulator>();

  for (const record of records) {
    const attribution = attributeRecord(record, knownSources);

    let acc = accumulators.get(attribution.source);
    if (!acc) {
      acc = createAccumulator(attribution.source);
      accumulators.set(attribution.source, acc);
    }

    acc.totalJobs++;
    if (record.pipelineName) acc.pipelineNames.add(record.pipelineName);
    if (attribution.tenant) acc.tenants.add(attribution.tenant);
    if (attribution.partition) acc.partitions.add(attribution.partition);

    const duration = jobDuration(record);
    if (duration !== null) acc.durations.push(duration);

    switch (record.status) {
      case "SUCCESS":
        acc.successJobs++;
        break;
      case "FAILURE":
        acc.failedJobs++;
        acc.failures.push({
          runId: record.runId,
          pipelineName: record.pipelineName,
          startTime: record.startTime,
          endTime: record.endTime,
          duration,
        });
        break;
      case "STARTED":
        acc.runningJobs++;
        break;
      case "QUEUED":
        acc.queuedJobs++;
        break;
      default:
        acc.otherJobs++;
    }
  }

  const result = new Map<string, SourceStatistics>();
  for (const name of [...accumulators.keys()].sort()) {
    const acc = accumulators.get(name);
    if (acc) result.set(name, finalize(acc));
  }
  return result;
}

function finalize(acc: SourceAccumulator): SourceStatistics {
  const durations = [...acc.durations].sort((a, b) => a - b);
  const distribution = describeDurations(durations);

  return {
    sourceName: acc.sourceName,
    totalJobs: acc.totalJobs,
    successJobs: acc.successJobs,
    failedJobs: acc.failedJobs,
    runningJobs: acc.runningJobs,
    queuedJobs: acc.queuedJobs,
    otherJobs: acc.otherJobs,
    durations,
    successRate: percentage(acc.successJobs, acc.totalJobs),
    failureRate: percentage(acc.failedJobs, acc.totalJobs),
    ...distribution,
    pipelineNames: [...acc.pipelineNames].sort(),
    tenants: [...acc.tenants].sort(),
    partitions: [...acc.partitions].sort(),
    recentFailures: [...acc.failures]
      .sort(compareFailures)
      .slice(0, MAX_RECENT_FAILURES),
  };
}

// Derived values

export function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

export interface DurationDistribution {
  avgDuration: number | null;
  minDuration: number | null;
  maxDuration: number | null;
  medianDuration: number | null;
  durationRange: number | null;
  variability: number | null;
}

/**
 * Expects an ascending sample. The median is the lower-middle element for
 * even-length samples.
 */
export function describeDurations(
  sorted: readonly number[],
): DurationDistribution {
  if (sorted.length === 0) {
    return {
      avgDuration: null,
      minDuration: null,
      maxDuration: null,
      medianDuration: null,
      durationRange: null,
      variability: null,
    };
  }

  const sum = sorted.reduce((total, d) => total + d, 0);
  const avg = sum / sorted.length;
  const min = sorted[0];
  const max = sorted[sorted.length - 1];

  return {
    avgDuration: avg,
    minDuration: min,
    maxDuration: max,
    medianDuration: sorted[(sorted.length - 1) >> 1],
    durationRange: sorted.length > 1 ? max - min : null,
    variability: avg > 0 ? Math.round(((max - min) / avg) * 100) / 100 : null,
  };
}

function compareFailures(a: FailedRun, b: FailedRun): number {
  const aStart = a.startTime ?? Number.NEGATIVE_INFINITY;
  const bStart = b.startTime ?? Number.NEGATIVE_INFINITY;
  if (aStart !== bStart) return bStart > aStart ? 1 : -1;
  return a.runId.localeCompare(b.runId);
}

// Server roll-up

export function summarizeServer(
  statistics: readonly SourceStatistics[],
): ServerSummary {
  let totalJobs = 0;
  let successJobs = 0;
  let failedJobs = 0;
  let runningJobs = 0;
  let queuedJobs = 0;
  let activeSources = 0;

  for (const stats of statistics) {
    totalJobs += stats.totalJobs;
    successJobs += stats.successJobs;
    failedJobs += stats.failedJobs;
    runningJobs += stats.runningJobs;
    queuedJobs += stats.queuedJobs;
    if (stats.totalJobs > 0) activeSources++;
  }

  const topSources: RankedSource[] = statistics
    .filter((s) => s.totalJobs > 0)
    .sort(
      (a, b) =>
        b.successRate - a.successRate ||
        b.totalJobs - a.totalJobs ||
        a.sourceName.localeCompare(b.sourceName),
    )
    .slice(0, TOP_SOURCE_COUNT)
    .map((s) => ({
      sourceName: s.sourceName,
      successRate: s.successRate,
      totalJobs: s.totalJobs,
    }));

  return {
    sourceCount: statistics.length,
    activeSources,
    totalJobs,
    successJobs,
    failedJobs,
    runningJobs,
    queuedJobs,
    successRate: percentage(successJobs, totalJobs),
    topSources,
  };
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null) return "N/A";
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  if (seconds < 3600) return `${(seconds / 60).toFixed(1)}m`;
  return `${(seconds / 3600).toFixed(1)}h`;
}

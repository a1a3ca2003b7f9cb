/**
 * Log filename classification.
 * Each dimension (source, service, date, timestamp, type) runs its own
 * first-match-wins chain; dimensions are independent of one another.
 */

import {
  classify,
  literalRule,
  patternRule,
  type ClassifierRule,
  type ConfidenceTier,
} from "../classifier";

export interface LogRules {
  serviceKeywords: string[];
  severityKeywords: string[];
}

export interface LogEntry {
  name: string;
  lastModified: Date;
  isDir: boolean;
  size: number;
}

export interface LogFileClassification {
  path: string;
  filename: string;
  source: string;
  sourceTier: ConfidenceTier;
  service: string;
  date: string;
  timestamp: string;
  type: string;
}

const SOURCE_CHAIN: readonly ClassifierRule[] = [
  literalRule("known-source"),
  patternRule("leading-name", /^([a-z0-9]+)[_.-]/),
];

const DATE_CHAIN: readonly ClassifierRule[] = [
  patternRule("iso-date", /(\d{4}-\d{2}-\d{2})/),
  patternRule("compact-date", /(?<!\d)(\d{8})(?!\d)/),
];

const TIMESTAMP_CHAIN: readonly ClassifierRule[] = [
  patternRule(
    "iso-timestamp",
    /(\d{4}-\d{2}-\d{2}[t_ ]\d{2}[:-]?\d{2}[:-]?\d{2})/i,
  ),
  patternRule("unix-seconds", /(?<!\d)(\d{10})(?!\d)/),
];

export function basename(path: string): string {
  const trimmed = path.replace(/\/+$/, "");
  const slash = trimmed.lastIndexOf("/");
  return slash >= 0 ? trimmed.slice(slash + 1) : trimmed;
}

export function classifyLogFilename(
  path: string,
  knownSources: readonly string[],
  rules: LogRules,
): LogFileClassification {
  const filename = basename(path);
  const lower = filename.toLowerCase();

  const source = classify(lower, SOURCE_CHAIN, knownSources);
  const service = classify(lower, [
    literalRule("service-keyword", rules.serviceKeywords),
  ]);
  const type = classify(lower, [
    literalRule("severity-keyword", rules.severityKeywords),
  ]);

  return {
    path,
    filename,
    source: source.category,
    sourceTier: source.tier,
    service: service.category,
    date: classify(filename, DATE_CHAIN).category,
    timestamp: classify(filename, TIMESTAMP_CHAIN).category,
    type: type.category,
  };
}

/** Files modified after `since`, oldest first. */
export function filterRecentLogs(
  entries: readonly LogEntry[],
  since: Date,
): LogEntry[] {
  return entries
    .filter((e) => !e.isDir && e.lastModified.getTime() > since.getTime())
    .sort((a, b) => a.lastModified.getTime() - b.lastModified.getTime());
}

/**
 * Source attribution: maps a run record to the source it belongs to.
 * 1. Tags (authoritative, operator supplied)
 * 2. Pipeline name through the classifier rule chain
 * 3. "unknown"
 */

import Fuse from "fuse.js";
import {
  classify,
  patternRule,
  UNKNOWN_CATEGORY,
  type ClassifierRule,
  type ConfidenceTier,
} from "../classifier";
import { normalizeSourceName } from "../registry";
import type { JobRecord, RunTag } from "../types";

const NAME = "([a-z0-9_]+)";

export const PIPELINE_RULE_CHAIN: readonly ClassifierRule[] = [
  patternRule("summon-and-release", new RegExp(`^${NAME}_summon_and_release`)),
  patternRule("pipeline-suffix", new RegExp(`^${NAME}_pipeline`)),
  patternRule("job-suffix", new RegExp(`^${NAME}_job`)),
  patternRule("ingest-suffix", new RegExp(`^${NAME}_ingest`)),
  patternRule("gleaner-prefix", new RegExp(`gleaner_${NAME}`)),
  patternRule("leading-name", new RegExp(`^${NAME}[_-]`)),
];

export interface TagInfo {
  source?: string;
  tenant?: string;
  partition?: string;
}

export type AttributionTier = ConfidenceTier | "tag";

export interface Attribution {
  source: string;
  tier: AttributionTier;
  tenant: string | null;
  partition: string | null;
}

/** First matching tag per family wins; tag-set order is significant. */
export function extractTagInfo(tags: readonly RunTag[]): TagInfo {
  const info: TagInfo = {};

  for (const tag of tags) {
    const key = tag.key.toLowerCase();
    const value = tag.value.trim();
    if (!value) continue;

    if (key.includes("source") || key.includes("provider")) {
      if (!info.source) info.source = value;
    } else if (key.includes("tenant")) {
      if (!info.tenant) info.tenant = value;
    } else if (key.includes("partition")) {
      if (!info.partition) info.partition = value;
    }
  }

  return info;
}

export function attributePipelineName(
  pipelineName: string,
  knownSources: readonly string[],
): { source: string; tier: ConfidenceTier } {
  if (!pipelineName.trim()) {
    return { source: UNKNOWN_CATEGORY, tier: "none" };
  }

  const result = classify(
    pipelineName.toLowerCase(),
    PIPELINE_RULE_CHAIN,
    knownSources,
  );
  return { source: result.category, tier: result.tier };
}

export function attributeRecord(
  record: JobRecord,
  knownSources: readonly string[],
): Attribution {
  const tagInfo = extractTagInfo(record.tags);
  const tenant = tagInfo.tenant ?? null;
  const partition = tagInfo.partition ?? null;

  if (tagInfo.source) {
    const source = normalizeSourceName(tagInfo.source);
    return { source, tier: "tag", tenant, partition };
  }

  const { source, tier } = attributePipelineName(
    record.pipelineName,
    knownSources,
  );
  return { source, tier, tenant, partition };
}

export function attribute(
  record: JobRecord,
  knownSources: readonly string[],
): string {
  return attributeRecord(record, knownSources).source;
}

// Operator hints

/**
 * Ranks known sources by similarity to a pipeline name. Used only to help
 * an operator tag runs that fell into the unknown bucket.
 */
export function suggestKnownSources(
  pipelineName: string,
  knownSources: readonly string[],
  limit = 3,
): string[] {
  if (!pipelineName.trim() || knownSources.length === 0) return [];

  const fuse = new Fuse([...knownSources], {
    threshold: 0.6,
    ignoreLocation: true,
    includeScore: true,
  });

  const needle = pipelineName
    .toLowerCase()
    .replace(/_(summon_and_release|pipeline|job|ingest)\b.*$/, "");

  return fuse
    .search(needle)
    .slice(0, limit)
    .map((result) => result.item);
}

const SERVICE_PREFIX = "sch_";
const SERVICE_SUFFIX = "_magic_gleaner";

/** Recovers `<prefix>` from scheduler service names `sch_<prefix>_magic_gleaner`. */
export function extractServicePrefix(serviceName: string): string | null {
  if (
    !serviceName.startsWith(SERVICE_PREFIX) ||
    !serviceName.endsWith(SERVICE_SUFFIX)
  ) {
    return null;
  }

  const prefix = serviceName.slice(
    SERVICE_PREFIX.length,
    serviceName.length - SERVICE_SUFFIX.length,
  );
  return prefix.length > 0 ? prefix : null;
}

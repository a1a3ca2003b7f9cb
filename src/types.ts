export type RunStatus = "QUEUED" | "STARTED" | "SUCCESS" | "FAILURE" | "UNKNOWN";

export const RUN_STATUSES: readonly RunStatus[] = [
  "QUEUED",
  "STARTED",
  "SUCCESS",
  "FAILURE",
  "UNKNOWN",
];

export type QueryWindow =
  | "today"
  | "yesterday"
  | "last_week"
  | "last_month"
  | "last_quarter";

export interface RunTag {
  key: string;
  value: string;
}

export interface JobRecord {
  runId: string;
  pipelineName: string;
  status: RunStatus;
  startTime: number | null; // Unix seconds
  endTime: number | null;
  creationTime: number | null;
  tags: RunTag[];
  assets: string[][];
}

export interface CatalogSource {
  name: string;
  url: string;
  description: string;
  active: boolean;
  type: string;
}

export interface TenantSource {
  name: string;
  tenant: string;
  active: true;
}

export type ActiveSourceOrigin = "tenant" | "catalog" | "none";

export interface ActiveSourceCount {
  count: number;
  origin: ActiveSourceOrigin;
}

export interface FailedRun {
  runId: string;
  pipelineName: string;
  startTime: number | null;
  endTime: number | null;
  duration: number | null;
}

export interface SourceStatistics {
  readonly sourceName: string;
  readonly totalJobs: number;
  readonly successJobs: number;
  readonly failedJobs: number;
  readonly runningJobs: number;
  readonly queuedJobs: number;
  readonly otherJobs: number;
  readonly durations: readonly number[];
  readonly successRate: number;
  readonly failureRate: number;
  readonly avgDuration: number | null;
  readonly minDuration: number | null;
  readonly maxDuration: number | null;
  readonly medianDuration: number | null;
  readonly durationRange: number | null;
  readonly variability: number | null;
  readonly pipelineNames: readonly string[];
  readonly tenants: readonly string[];
  readonly partitions: readonly string[];
  readonly recentFailures: readonly FailedRun[];
}

export type AlertSeverity = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";

export interface AlertState {
  readonly queuedCount: number;
  readonly activeSourceCount: number;
  readonly ratio: number;
  readonly hasAlert: boolean;
  readonly severity: AlertSeverity | null;
}

export type FailureLevel = "alert" | "warning" | "ok";

export interface FailureAlert {
  readonly failedCount: number;
  readonly level: FailureLevel;
}

export interface RankedSource {
  sourceName: string;
  successRate: number;
  totalJobs: number;
}

export interface ServerSummary {
  sourceCount: number;
  activeSources: number;
  totalJobs: number;
  successJobs: number;
  failedJobs: number;
  runningJobs: number;
  queuedJobs: number;
  successRate: number;
  topSources: RankedSource[];
}

export interface UnattributedPipeline {
  pipelineName: string;
  runCount: number;
  suggestions: string[];
}

export interface ServerReport {
  serverKey: string;
  serverName: string;
  window: QueryWindow;
  createdAfter: number;
  generatedAt: string;
  knownSources: string[];
  activeSources: ActiveSourceCount;
  recordCount: number;
  statistics: SourceStatistics[];
  summary: ServerSummary;
  queueAlert: AlertState;
  failureAlert: FailureAlert;
  unattributed: UnattributedPipeline[];
}

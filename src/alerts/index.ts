/**
 * Queue and failure alerts.
 * Every evaluation is independent: no debouncing, hysteresis or memory of
 * earlier verdicts.
 */

import type {
  AlertSeverity,
  AlertState,
  FailureAlert,
  FailureLevel,
} from "../types";

export interface SeverityThreshold {
  severity: AlertSeverity;
  minRatio: number;
}

// Highest first; lower bounds are inclusive
export const QUEUE_SEVERITY_THRESHOLDS: readonly SeverityThreshold[] = [
  { severity: "CRITICAL", minRatio: 3.0 },
  { severity: "HIGH", minRatio: 2.0 },
  { severity: "MEDIUM", minRatio: 1.5 },
];

export const FAILURE_ALERT_THRESHOLD = 3;
export const FAILURE_WARNING_THRESHOLD = 1;

export function determineSeverity(ratio: number): AlertSeverity {
  for (const threshold of QUEUE_SEVERITY_THRESHOLDS) {
    if (ratio >= threshold.minRatio) {
      return threshold.severity;
    }
  }
  return "LOW";
}

export function evaluateQueueAlert(
  queuedCount: number,
  activeSourceCount: number,
): AlertState {
  const ratio = queuedCount / Math.max(activeSourceCount, 1);
  // With no active sources the ratio means nothing, so never alert
  const hasAlert = queuedCount > activeSourceCount && activeSourceCount > 0;

  return {
    queuedCount,
    activeSourceCount,
    ratio,
    hasAlert,
    severity: hasAlert ? determineSeverity(ratio) : null,
  };
}

export function evaluateFailureAlert(failedCount: number): FailureAlert {
  let level: FailureLevel = "ok";
  if (failedCount >= FAILURE_ALERT_THRESHOLD) {
    level = "alert";
  } else if (failedCount >= FAILURE_WARNING_THRESHOLD) {
    level = "warning";
  }
  return { failedCount, level };
}

const SEVERITY_EMOJI: Record<AlertSeverity, string> = {
  CRITICAL: "🚨",
  HIGH: "🔴",
  MEDIUM: "🟠",
  LOW: "🟡",
};

export function formatAlertMessage(
  serverName: string,
  state: AlertState,
): string {
  const ratio = state.ratio.toFixed(2);

  if (!state.hasAlert || !state.severity) {
    return `✅ ${serverName}: queue ok — ${state.queuedCount} queued / ${state.activeSourceCount} active sources (ratio ${ratio})`;
  }

  return `${SEVERITY_EMOJI[state.severity]} ${state.severity} queue backlog on ${serverName} — ${state.queuedCount} queued / ${state.activeSourceCount} active sources (ratio ${ratio})`;
}

export function formatFailureMessage(
  serverName: string,
  failure: FailureAlert,
  windowLabel: string,
): string | null {
  if (failure.level === "alert") {
    return `🚨 ALERT: ${failure.failedCount} failed jobs in ${windowLabel} on ${serverName}`;
  }
  if (failure.level === "warning") {
    return `⚠️ ${failure.failedCount} failed job(s) in ${windowLabel} on ${serverName}`;
  }
  return null;
}

import cron from "node-cron";
import { logger, errorMessage } from "../logger";
import { formatAlertMessage, formatFailureMessage } from "../alerts";
import { analyzeAllServers, type ServerCollaborators } from "../pipeline";
import { windowLabel } from "../windows";
import type { AppConfig, ServerDefinition } from "../config";
import type { ServerReport } from "../types";

let _evaluationRunning = false;

/** Logs the verdicts of one evaluation pass and returns the alert count. */
export function reportAlerts(reports: readonly ServerReport[]): number {
  let alerts = 0;

  for (const report of reports) {
    const queueMessage = formatAlertMessage(report.serverName, report.queueAlert);
    if (!report.queueAlert.hasAlert) {
      logger.info(queueMessage);
    } else if (
      report.queueAlert.severity === "CRITICAL" ||
      report.queueAlert.severity === "HIGH"
    ) {
      alerts++;
      logger.error(queueMessage);
    } else {
      alerts++;
      logger.warn(queueMessage);
    }

    const failureMessage = formatFailureMessage(
      report.serverName,
      report.failureAlert,
      windowLabel(report.window).toLowerCase(),
    );
    if (failureMessage) {
      alerts++;
      if (report.failureAlert.level === "alert") {
        logger.error(failureMessage);
      } else {
        logger.warn(failureMessage);
      }
    }

    if (report.unattributed.length > 0) {
      logger.debug(
        `${report.serverKey}: ${report.unattributed.length} pipeline(s) attributed to 'unknown'`,
      );
    }
  }

  return alerts;
}

export async function runEvaluation(
  config: AppConfig,
  collaboratorsFor?: (server: ServerDefinition) => ServerCollaborators,
): Promise<ServerReport[] | null> {
  if (_evaluationRunning) {
    logger.warn("[LOCK] Evaluation already running — skipping this tick");
    return null;
  }
  _evaluationRunning = true;
  try {
    const reports = await analyzeAllServers(config, { collaboratorsFor });
    const alerts = reportAlerts(reports);
    logger.info(
      `[CRON] Evaluation complete: ${reports.length} servers, ${alerts} alert(s)`,
    );
    return reports;
  } finally {
    _evaluationRunning = false;
  }
}

export function startScheduler(config: AppConfig): cron.ScheduledTask {
  const expression = config.env.evaluationCron;
  if (!cron.validate(expression)) {
    throw new Error(`Invalid EVALUATION_CRON expression: ${expression}`);
  }

  logger.info("Starting scheduler...");

  const task = cron.schedule(
    expression,
    async () => {
      logger.info("[CRON] Starting evaluation...");
      try {
        await runEvaluation(config);
      } catch (error) {
        logger.error(`[CRON] Evaluation failed: ${errorMessage(error)}`);
      }
    },
    { timezone: config.env.timezone || "UTC" },
  );

  logger.info(`  ✓ Evaluation: ${expression}`);
  return task;
}

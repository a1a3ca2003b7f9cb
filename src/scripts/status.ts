/**
 * One-shot evaluation: per-server source statistics and alert verdicts.
 * Usage: npm run status -- [window]
 */

import { logger, errorMessage } from "../logger";
import { getConfig } from "../config";
import { analyzeAllServers } from "../pipeline";
import { reportAlerts } from "../scheduler";
import { formatDuration } from "../statistics";
import { isQueryWindow, windowLabel } from "../windows";

async function main(): Promise<void> {
  const config = getConfig();
  const requested = process.argv[2] ?? config.env.queryWindow;
  if (!isQueryWindow(requested)) {
    logger.error(`Unknown window '${requested}'`);
    process.exitCode = 1;
    return;
  }

  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Source Statistics — ${windowLabel(requested)}`);
  logger.info("═══════════════════════════════════════════════════");

  const reports = await analyzeAllServers(config, { window: requested });

  for (const report of reports) {
    const { summary } = report;
    logger.info(`\n🖥️  ${report.serverName}`);
    logger.info(
      `   Sources: ${summary.sourceCount} (${summary.activeSources} with jobs), known: ${report.knownSources.length}`,
    );
    logger.info(
      `   Jobs: ${summary.totalJobs} — ✅ ${summary.successJobs} ❌ ${summary.failedJobs} 🔄 ${summary.runningJobs} ⏳ ${summary.queuedJobs} (${summary.successRate.toFixed(1)}% success)`,
    );

    for (const stats of report.statistics) {
      logger.info(
        `   • ${stats.sourceName}: ${stats.totalJobs} jobs, ${stats.successRate.toFixed(1)}% success, avg ${formatDuration(stats.avgDuration)}, median ${formatDuration(stats.medianDuration)}`,
      );
    }

    for (const hint of report.unattributed) {
      const suggestions =
        hint.suggestions.length > 0 ? hint.suggestions.join(", ") : "none";
      logger.info(
        `   ? ${hint.pipelineName} (${hint.runCount} runs) — closest known: ${suggestions}`,
      );
    }
  }

  logger.info("");
  reportAlerts(reports);
  logger.info("═══════════════════════════════════════════════════");
}

main().catch((error) => {
  logger.error(`Status failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});

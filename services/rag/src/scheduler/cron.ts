import cron from "node-cron";
import { errorMessage, type Logger } from "@docent/common";
import { ConfigurationError } from "../errors.js";
import type { VectorIndex } from "../indexing/index.js";
import type { LocalFileClient } from "../local/index.js";
import { ingestLocalFiles, type IngestLocalResult } from "../pipeline/index.js";

export interface SchedulerConfig {
  cronSchedule: string;
  pruneMissing?: boolean;
  logger?: Logger;
  onComplete?: (result: IngestLocalResult) => void;
}

/** Re-ingest the document directory on a cron schedule. Overlapping runs are skipped. */
export function startSyncScheduler(
  localFiles: LocalFileClient,
  index: VectorIndex,
  config: SchedulerConfig,
): cron.ScheduledTask {
  const { logger } = config;
  let syncInProgress = false;

  if (!cron.validate(config.cronSchedule)) {
    throw new ConfigurationError(`Invalid cron schedule: ${config.cronSchedule}`);
  }

  logger?.info("Starting sync scheduler", { cronSchedule: config.cronSchedule });

  return cron.schedule(config.cronSchedule, async () => {
    if (syncInProgress) {
      logger?.warn("Sync already in progress, skipping scheduled run");
      return;
    }

    syncInProgress = true;
    logger?.info("Starting scheduled sync");

    try {
      const result = await ingestLocalFiles(localFiles, index, {
        pruneMissing: config.pruneMissing,
        logger,
      });
      logger?.info("Scheduled sync complete", {
        filesLoaded: result.filesLoaded,
        chunksUpserted: result.chunksUpserted,
        staleChunksRemoved: result.staleChunksRemoved,
      });
      config.onComplete?.(result);
    } catch (error) {
      logger?.error("Scheduled sync failed", { error: errorMessage(error) });
    } finally {
      syncInProgress = false;
    }
  });
}

import { createApp, createRecordStore } from "./src/app";
import { config } from "./src/config";
import { parseArgs } from "./src/core/args";
import { countByStatus } from "./src/core/articleRecord";
import type { OnceRunOptions, ScheduleRunOptions } from "./src/core/runOptions";
import { logger } from "./src/log/logger";
import { createJobController, registerSchedule } from "./src/scheduler/jobs";

const toPipelineOptions = (options: OnceRunOptions | ScheduleRunOptions) => ({
  retryFailed: options.retryFailed,
  limit: options.limit,
  concurrency: options.concurrency,
  queries: options.queries,
});

const runStatusMode = async (): Promise<void> => {
  const store = createRecordStore(config);
  const [records, watermark] = await Promise.all([store.all(), store.watermark()]);

  console.log(`Records: ${records.length}`);
  for (const [status, count] of Object.entries(countByStatus(records))) {
    console.log(`  ${status}: ${count}`);
  }
  console.log(`Watermark: ${watermark ? JSON.stringify(watermark.cursors) : "(none)"}`);
};

const runOnceMode = async (options: OnceRunOptions): Promise<void> => {
  const { pipeline } = createApp(config);
  const controller = new AbortController();
  const onSignal = (): void => {
    logger.warn("interrupt received, finishing in-flight articles");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const summary = await pipeline.run({ ...toPipelineOptions(options), signal: controller.signal });
    console.log(
      `fetched=${summary.fetched} resumed=${summary.resumed} enriched=${summary.enriched} failedEnrichment=${summary.failedEnrichment} narrated=${summary.narrated} failedNarration=${summary.failedNarration} watermarkAdvanced=${summary.watermarkAdvanced}`,
    );
    if (summary.incompleteQueries.length > 0) {
      console.warn(`Incomplete fetch for: ${summary.incompleteQueries.join(", ")}`);
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
};

const runScheduleMode = async (options: ScheduleRunOptions): Promise<void> => {
  const { pipeline } = createApp(config);
  const jobController = createJobController((_source, signal) =>
    pipeline.run({ ...toPipelineOptions(options), signal }),
  );

  const task = registerSchedule(jobController, {
    schedule: config.schedule,
    timezone: config.scheduleTimezone,
  });
  jobController.trigger("startup");

  const shutdown = (): void => {
    logger.warn("shutting down scheduler");
    task.stop();
    jobController
      .abort()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  logger.info({ schedule: config.schedule, timezone: config.scheduleTimezone }, "scheduler started");
};

const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));

  if (options.mode === "status") {
    await runStatusMode();
    return;
  }

  if (options.mode === "schedule") {
    await runScheduleMode(options);
    return;
  }

  await runOnceMode(options);
};

main().catch((error) => {
  logger.error({ err: error }, "pipeline failed");
  process.exit(1);
});

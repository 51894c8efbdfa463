import * as cron from "node-cron";
import { getLogger } from "../log/logger";
import type { RunSummary } from "../pipeline/orchestrator";

const log = getLogger("jobs");

export type TriggerSource = "manual" | "cron" | "startup";

export type TriggerResult =
  | { started: true; completion: Promise<void> }
  | {
      started: false;
      reason: "already_running";
      runningSince: string | null;
    };

export type RunJob = (source: TriggerSource, signal: AbortSignal) => Promise<RunSummary>;

export const createJobController = (runJob: RunJob) => {
  let isRunning = false;
  let startedAtIso: string | null = null;
  let abortController: AbortController | null = null;
  let completion: Promise<void> = Promise.resolve();

  const execute = async (source: TriggerSource, startedAtMs: number, signal: AbortSignal): Promise<void> => {
    try {
      const summary = await runJob(source, signal);
      log.info({ source, ...summary }, "pipeline job completed");
    } catch (error) {
      log.error({ source, durationMs: Date.now() - startedAtMs, err: error }, "pipeline job failed");
    } finally {
      isRunning = false;
      startedAtIso = null;
      abortController = null;
      log.debug({ source }, "pipeline job lock released");
    }
  };

  const trigger = (source: TriggerSource): TriggerResult => {
    if (isRunning) {
      return {
        started: false,
        reason: "already_running",
        runningSince: startedAtIso,
      };
    }

    isRunning = true;
    const startedAtMs = Date.now();
    startedAtIso = new Date(startedAtMs).toISOString();
    abortController = new AbortController();

    log.debug({ source, startedAt: startedAtIso }, "pipeline job lock acquired");

    completion = execute(source, startedAtMs, abortController.signal);
    return { started: true, completion };
  };

  return {
    trigger,
    /** Asks the running job to stop dispatching work and resolves once it has finished. */
    abort: (): Promise<void> => {
      abortController?.abort();
      return completion;
    },
    getRuntimeState: () => ({
      isRunning,
      startedAtIso,
    }),
  };
};

export type JobController = ReturnType<typeof createJobController>;

export const registerSchedule = (
  jobController: JobController,
  options: { schedule: string; timezone: string },
): cron.ScheduledTask => {
  if (!cron.validate(options.schedule)) {
    throw new Error(`Invalid cron expression: ${options.schedule}`);
  }

  return cron.schedule(
    options.schedule,
    () => {
      const result = jobController.trigger("cron");
      if (!result.started) {
        log.warn({ runningSince: result.runningSince }, "scheduled run skipped: already running");
      }
    },
    {
      timezone: options.timezone,
    },
  );
};

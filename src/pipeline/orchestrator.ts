import {
  type ArticleRecord,
  compareIds,
  needsEnrichment,
  needsNarration,
  needsProcessing,
  toFetchedRecord,
} from "../core/articleRecord";
import { RunLockedError } from "../core/errors";
import type { Enricher } from "../enrich/service";
import { getLogger } from "../log/logger";
import type { Narrator } from "../narrate/service";
import { fetchNewArticles } from "../source/fetcher";
import { type ArticleSource, toSearchQuery } from "../source/types";
import { acquireRunLock, releaseRunLock } from "../store/lock";
import type { RecordStore } from "../store/recordStore";
import { runWithConcurrency } from "./workerPool";

const log = getLogger("pipeline");

export type PipelineState = "IDLE" | "FETCHING" | "PROCESSING" | "ADVANCING_WATERMARK";

export type PipelineSettings = {
  queries: string[];
  articlesPerQuery: number;
  searchPadding: number;
  searchPageSize: number;
  maxSearchPages: number;
  fetchPageSize: number;
  minAbstractLength: number;
  concurrency: number;
  targetLanguage: string;
};

export type PipelineDeps = {
  store: RecordStore;
  source: ArticleSource;
  enricher: Enricher;
  narrator: Narrator;
  lockPath: string;
  settings: PipelineSettings;
  now?: () => Date;
};

export type PipelineRunOptions = {
  retryFailed?: boolean;
  limit?: number;
  concurrency?: number;
  queries?: string[];
  signal?: AbortSignal;
};

export type RunSummary = {
  fetched: number;
  resumed: number;
  skipped: number;
  enriched: number;
  failedEnrichment: number;
  narrated: number;
  failedNarration: number;
  incompleteQueries: string[];
  watermarkAdvanced: boolean;
  aborted: boolean;
  durationMs: number;
};

type Tally = Pick<RunSummary, "enriched" | "failedEnrichment" | "narrated" | "failedNarration">;

export const createPipeline = (deps: PipelineDeps) => {
  const now = deps.now ?? (() => new Date());
  let state: PipelineState = "IDLE";

  const setState = (next: PipelineState): void => {
    log.debug({ from: state, to: next }, "pipeline state");
    state = next;
  };

  const processRecord = async (
    record: ArticleRecord,
    retryFailed: boolean,
    tally: Tally,
    signal?: AbortSignal,
  ): Promise<void> => {
    let current = record;

    if (needsEnrichment(current, retryFailed)) {
      log.debug({ id: current.id, stage: "ENRICHING" }, "record stage");
      const enriched = await deps.enricher.enrich(current, signal);
      if (!enriched) {
        return;
      }
      current = enriched;
      log.debug({ id: current.id, stage: "PERSISTING", status: current.status }, "record stage");
      await deps.store.upsert(current);
      if (current.status === "ENRICHED") {
        tally.enriched += 1;
      } else {
        tally.failedEnrichment += 1;
      }
    }

    if (needsNarration(current, retryFailed)) {
      log.debug({ id: current.id, stage: "NARRATING" }, "record stage");
      const narrated = await deps.narrator.narrate(current, signal);
      if (!narrated) {
        return;
      }
      current = narrated;
      log.debug({ id: current.id, stage: "PERSISTING", status: current.status }, "record stage");
      await deps.store.upsert(current);
      if (current.narration_error === undefined) {
        tally.narrated += 1;
      } else {
        tally.failedNarration += 1;
      }
    }
  };

  const execute = async (options: PipelineRunOptions): Promise<RunSummary> => {
    const startedAtMs = Date.now();
    const { settings } = deps;
    const retryFailed = options.retryFailed ?? false;
    const queries = (options.queries ?? settings.queries).map(toSearchQuery);

    setState("FETCHING");
    const watermark = await deps.store.watermark();
    const cursors: Record<string, string> = { ...watermark?.cursors };
    const frontiers = new Map<string, string>();
    const incompleteQueries: string[] = [];
    const claimed = new Set<string>();
    const fetchedRecords: ArticleRecord[] = [];
    let skipped = 0;

    for (const query of queries) {
      if (options.signal?.aborted) {
        break;
      }

      const outcome = await fetchNewArticles(
        { source: deps.source, store: deps.store },
        {
          query,
          cursor: cursors[query.label] ?? null,
          limit: options.limit ?? settings.articlesPerQuery,
          searchPadding: settings.searchPadding,
          searchPageSize: settings.searchPageSize,
          maxSearchPages: settings.maxSearchPages,
          pageSize: settings.fetchPageSize,
          minAbstractLength: settings.minAbstractLength,
          claimed,
          signal: options.signal,
        },
      );

      const fetchedAt = now().toISOString();
      fetchedRecords.push(...outcome.articles.map((article) => toFetchedRecord(article, settings.targetLanguage, fetchedAt)));
      skipped += outcome.skipped.length;
      if (outcome.frontier !== null) {
        frontiers.set(query.label, outcome.frontier);
      }
      if (!outcome.complete) {
        incompleteQueries.push(query.label);
      }
    }

    for (const record of fetchedRecords) {
      await deps.store.upsert(record);
    }

    const pending = (await deps.store.all()).filter((record) => needsProcessing(record, retryFailed));
    const resumed = pending.length - fetchedRecords.length;
    if (resumed > 0) {
      log.info({ resumed, retryFailed }, "resuming records left unfinished by earlier runs");
    }

    setState("PROCESSING");
    const tally: Tally = { enriched: 0, failedEnrichment: 0, narrated: 0, failedNarration: 0 };
    const pool = await runWithConcurrency(
      pending,
      options.concurrency ?? settings.concurrency,
      (record) => processRecord(record, retryFailed, tally, options.signal),
      options.signal,
    );

    let watermarkAdvanced = false;
    if (pool.aborted) {
      log.warn({ completed: pool.completed, pending: pending.length }, "run aborted, watermark left unchanged");
    } else {
      setState("ADVANCING_WATERMARK");
      for (const [label, frontier] of frontiers) {
        const current = cursors[label];
        if (current === undefined || compareIds(frontier, current) > 0) {
          cursors[label] = frontier;
          watermarkAdvanced = true;
        }
      }

      if (watermarkAdvanced) {
        await deps.store.setWatermark({ cursors, updated_at: now().toISOString() });
      }
    }

    return {
      fetched: fetchedRecords.length,
      resumed,
      skipped,
      ...tally,
      incompleteQueries,
      watermarkAdvanced,
      aborted: pool.aborted,
      durationMs: Date.now() - startedAtMs,
    };
  };

  const run = async (options: PipelineRunOptions = {}): Promise<RunSummary> => {
    const lock = await acquireRunLock(deps.lockPath);
    if (!lock.acquired) {
      throw new RunLockedError(lock.lockPath, lock.ownerPid);
    }

    try {
      const summary = await execute(options);
      log.info(summary, "pipeline run finished");
      return summary;
    } finally {
      setState("IDLE");
      await releaseRunLock(deps.lockPath);
    }
  };

  return {
    run,
    getState: (): PipelineState => state,
  };
};

export type Pipeline = ReturnType<typeof createPipeline>;

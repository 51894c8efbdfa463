import type { ArticleRecord } from "../core/articleRecord";
import { buildEnrichmentPrompt, parseGeneration } from "../core/enrichment";
import { toErrorMessage } from "../core/errors";
import { type RetryPolicy, type Sleep, withRetry } from "../core/retry";
import { getLogger } from "../log/logger";
import { isRetryableServiceError, type StructuredGenerator } from "./generator";

const log = getLogger("enricher");

export type EnricherDeps = {
  generator: StructuredGenerator;
  retry: RetryPolicy;
  targetLanguageName: string;
  now?: () => Date;
  sleep?: Sleep;
};

export interface Enricher {
  /**
   * Never rejects for generation problems; exhausted retries yield FAILED_ENRICHMENT.
   * Resolves null when `signal` aborts before an outcome, leaving the record as it was.
   */
  enrich(record: ArticleRecord, signal?: AbortSignal): Promise<ArticleRecord | null>;
}

export const createEnricher = (deps: EnricherDeps): Enricher => {
  const now = deps.now ?? (() => new Date());

  return {
    async enrich(record, signal) {
      const request = buildEnrichmentPrompt({
        title: record.title_original,
        abstract: record.summary_original,
        targetLanguageName: deps.targetLanguageName,
      });

      const outcome = await withRetry(async () => parseGeneration(await deps.generator.generate(request)), deps.retry, {
        shouldRetry: isRetryableServiceError,
        sleep: deps.sleep,
        signal,
        onRetry: (error, attempt, delayMs) =>
          log.warn({ id: record.id, attempt, delayMs, err: error }, "enrichment attempt failed, retrying"),
      });

      if (!outcome.ok && outcome.aborted) {
        log.info({ id: record.id, attempts: outcome.attempts }, "enrichment interrupted");
        return null;
      }

      const enrichedAt = now().toISOString();
      const enrichmentAttempts = record.enrichment_attempts + outcome.attempts;

      if (outcome.ok) {
        log.info({ id: record.id, attempts: outcome.attempts }, "article enriched");
        return {
          ...record,
          title_translated: outcome.value.titleTranslated,
          summary_translated: outcome.value.summaryTranslated,
          applications: outcome.value.applications,
          pitch: outcome.value.pitch,
          status: "ENRICHED",
          enriched_at: enrichedAt,
          enrichment_attempts: enrichmentAttempts,
          enrichment_error: undefined,
        };
      }

      const message = toErrorMessage(outcome.error);
      log.error({ id: record.id, attempts: outcome.attempts, err: outcome.error }, "enrichment failed, keeping original text");
      return {
        ...record,
        title_translated: undefined,
        summary_translated: undefined,
        applications: [],
        pitch: undefined,
        status: "FAILED_ENRICHMENT",
        enriched_at: enrichedAt,
        enrichment_attempts: enrichmentAttempts,
        enrichment_error: message,
      };
    },
  };
};

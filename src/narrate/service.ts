import type { ArticleRecord } from "../core/articleRecord";
import { toErrorMessage } from "../core/errors";
import { type RetryPolicy, type Sleep, withRetry } from "../core/retry";
import { isRetryableServiceError } from "../enrich/generator";
import { getLogger } from "../log/logger";
import type { AudioStore } from "./audioStore";
import { buildNarrationScript } from "./script";
import type { SpeechSynthesizer } from "./synthesizer";

const log = getLogger("narrator");

export type NarratorDeps = {
  synthesizer: SpeechSynthesizer;
  audioStore: AudioStore;
  retry: RetryPolicy;
  targetLanguage: string;
  sourceLanguage: string;
  maxNarrationChars: number;
  now?: () => Date;
  sleep?: Sleep;
};

export interface Narrator {
  /**
   * Never rejects for synthesis problems; failures end in FAILED_NARRATION.
   * Resolves null when `signal` aborts before an outcome.
   */
  narrate(record: ArticleRecord, signal?: AbortSignal): Promise<ArticleRecord | null>;
}

export const createNarrator = (deps: NarratorDeps): Narrator => {
  const now = deps.now ?? (() => new Date());

  return {
    async narrate(record, signal) {
      const failed = (reason: string): ArticleRecord => {
        log.error({ id: record.id, reason }, "narration failed, record stays text-only");
        return {
          ...record,
          audio_ref: undefined,
          status: record.status === "FAILED_ENRICHMENT" ? "FAILED_ENRICHMENT" : "FAILED_NARRATION",
          narrated_at: now().toISOString(),
          narration_error: reason,
        };
      };

      const script = buildNarrationScript(record, {
        targetLanguage: deps.targetLanguage,
        sourceLanguage: deps.sourceLanguage,
      });

      if (!script.text) {
        return failed("narration text is empty");
      }
      if (script.text.length > deps.maxNarrationChars) {
        return failed(`narration text has ${script.text.length} characters, limit is ${deps.maxNarrationChars}`);
      }

      const outcome = await withRetry(
        async () => {
          const audio = await deps.synthesizer.synthesize(script);
          if (audio.byteLength === 0) {
            throw new Error("synthesizer returned empty audio");
          }
          return audio;
        },
        deps.retry,
        {
          shouldRetry: isRetryableServiceError,
          sleep: deps.sleep,
          signal,
          onRetry: (error, attempt, delayMs) =>
            log.warn({ id: record.id, attempt, delayMs, err: error }, "synthesis attempt failed, retrying"),
        },
      );

      if (!outcome.ok && outcome.aborted) {
        log.info({ id: record.id, attempts: outcome.attempts }, "narration interrupted");
        return null;
      }
      if (!outcome.ok) {
        return failed(toErrorMessage(outcome.error));
      }

      let audioRef: string;
      try {
        audioRef = await deps.audioStore.save(record.id, outcome.value);
      } catch (error) {
        return failed(`audio could not be stored: ${toErrorMessage(error)}`);
      }

      log.info({ id: record.id, audioRef, bytes: outcome.value.byteLength }, "article narrated");
      return {
        ...record,
        audio_ref: audioRef,
        status: record.status === "FAILED_ENRICHMENT" ? "FAILED_ENRICHMENT" : "NARRATED",
        narrated_at: now().toISOString(),
        narration_error: undefined,
      };
    },
  };
};

import { join } from "node:path";
import { createOpenAI } from "@ai-sdk/openai";
import type { Config } from "./config";
import { AUDIO_DIR, LOCK_FILE } from "./config/constants";
import { createAiGenerator } from "./enrich/generator";
import { createEnricher } from "./enrich/service";
import { createFileAudioStore } from "./narrate/audioStore";
import { createNarrator } from "./narrate/service";
import { createAiSynthesizer } from "./narrate/synthesizer";
import { createPipeline, type Pipeline } from "./pipeline/orchestrator";
import { createPubmedSource } from "./source/pubmed";
import { createJsonlRecordStore, type RecordStore } from "./store/recordStore";

const ensurePipelineEnv = (config: Config): string => {
  if (!config.openaiKey) {
    throw new Error("OPENAI_API_KEY is required to run the pipeline");
  }
  return config.openaiKey;
};

export const createRecordStore = (config: Config): RecordStore => createJsonlRecordStore({ dataDir: config.dataDir });

export const createApp = (config: Config): { store: RecordStore; pipeline: Pipeline } => {
  const openai = createOpenAI({ apiKey: ensurePipelineEnv(config) });
  const store = createRecordStore(config);

  const source = createPubmedSource({
    baseUrl: config.eutilsBaseUrl,
    apiKey: config.ncbiApiKey,
    timeoutMs: config.requestTimeoutMs,
    requestDelayMs: config.requestDelayMs,
    retry: config.retry,
  });

  const enricher = createEnricher({
    generator: createAiGenerator({ model: openai(config.aiModel), timeoutMs: config.requestTimeoutMs }),
    retry: config.retry,
    targetLanguageName: config.targetLanguageName,
  });

  const narrator = createNarrator({
    synthesizer: createAiSynthesizer({
      model: openai.speech(config.ttsModel),
      voice: config.ttsVoice,
      timeoutMs: config.requestTimeoutMs,
    }),
    audioStore: createFileAudioStore({ dataDir: config.dataDir, audioDir: AUDIO_DIR }),
    retry: config.retry,
    targetLanguage: config.targetLanguage,
    sourceLanguage: config.sourceLanguage,
    maxNarrationChars: config.maxNarrationChars,
  });

  const pipeline = createPipeline({
    store,
    source,
    enricher,
    narrator,
    lockPath: join(config.dataDir, LOCK_FILE),
    settings: {
      queries: config.queries,
      articlesPerQuery: config.articlesPerQuery,
      searchPadding: config.searchPadding,
      searchPageSize: config.searchPageSize,
      maxSearchPages: config.maxSearchPages,
      fetchPageSize: config.fetchPageSize,
      minAbstractLength: config.minAbstractLength,
      concurrency: config.concurrency,
      targetLanguage: config.targetLanguage,
    },
  });

  return { store, pipeline };
};

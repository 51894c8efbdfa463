import type { ArticleRecord, SourceArticle } from "../core/articleRecord";
import type { RetryPolicy } from "../core/retry";
import type { GenerationOutput } from "../core/enrichment";
import type { GenerationRequest, StructuredGenerator } from "../enrich/generator";
import type { AudioStore } from "../narrate/audioStore";
import type { SpeechSynthesizer, SynthesisRequest } from "../narrate/synthesizer";
import type { ArticleSource, SearchQuery } from "../source/types";
import type { RecordStore } from "../store/recordStore";

export const NO_DELAY_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

export const ABSTRACT =
  "BACKGROUND: A placeholder abstract long enough to pass the minimum length filter.\nRESULTS: Placeholder results.";

export const createClock = (startIso = "2026-01-01T00:00:00.000Z"): (() => Date) => {
  const start = Date.parse(startIso);
  let tick = 0;
  return () => new Date(start + tick++ * 1000);
};

export const makeArticle = (id: string, overrides: Partial<SourceArticle> = {}): SourceArticle => ({
  id,
  url: `https://pubmed.ncbi.nlm.nih.gov/${id}/`,
  query: "cancer treatment",
  title: `Study ${id}`,
  abstract: ABSTRACT,
  authors: ["Ada Example"],
  journal: "Journal of Placeholders",
  ...overrides,
});

export const makeRecord = (id: string, overrides: Partial<ArticleRecord> = {}): ArticleRecord => ({
  id,
  url: `https://pubmed.ncbi.nlm.nih.gov/${id}/`,
  query: "cancer treatment",
  source: "PubMed",
  title_original: `Study ${id}`,
  summary_original: ABSTRACT,
  authors: ["Ada Example"],
  applications: [],
  target_language: "zh-TW",
  status: "FETCHED",
  fetched_at: "2026-01-01T00:00:00.000Z",
  enrichment_attempts: 0,
  ...overrides,
});

export const makeEnrichedRecord = (id: string, overrides: Partial<ArticleRecord> = {}): ArticleRecord =>
  makeRecord(id, {
    title_translated: `研究 ${id}`,
    summary_translated: "摘要",
    applications: ["應用一", "應用二", "應用三"],
    pitch: "投資亮點",
    status: "ENRICHED",
    enriched_at: "2026-01-01T00:00:01.000Z",
    enrichment_attempts: 1,
    ...overrides,
  });

export const validGeneration = (overrides: Partial<GenerationOutput> = {}): GenerationOutput => ({
  title_translated: "翻譯標題",
  summary_translated: "翻譯摘要",
  applications: ["應用一", "應用二", "應用三"],
  pitch: "投資亮點",
  ...overrides,
});

export type FakeGenerator = StructuredGenerator & { requests: GenerationRequest[] };

/** Replays `responses` in order (an Error is thrown), then repeats the last one. */
export const createFakeGenerator = (responses: unknown[] = [validGeneration()]): FakeGenerator => {
  const requests: GenerationRequest[] = [];
  return {
    requests,
    async generate(request) {
      const response = responses[Math.min(requests.length, responses.length - 1)];
      requests.push(request);
      if (response instanceof Error) {
        throw response;
      }
      return response;
    },
  };
};

export type FakeSynthesizer = SpeechSynthesizer & { requests: SynthesisRequest[] };

export const createFakeSynthesizer = (options: { fail?: boolean; audio?: Uint8Array } = {}): FakeSynthesizer => {
  const requests: SynthesisRequest[] = [];
  return {
    requests,
    async synthesize(request) {
      requests.push(request);
      if (options.fail) {
        throw new Error("speech service unavailable");
      }
      return options.audio ?? new Uint8Array([1, 2, 3]);
    },
  };
};

export const createMemoryAudioStore = (): AudioStore & { saved: Map<string, Uint8Array> } => {
  const saved = new Map<string, Uint8Array>();
  return {
    saved,
    async save(id, audio) {
      saved.set(id, audio);
      return `audios/${id}.mp3`;
    },
  };
};

export type FakeSource = ArticleSource & {
  searches: SearchQuery[];
  offsets: number[];
  pages: string[][];
};

/**
 * `idsByQuery` lists ids newest first, the way esearch returns them.
 * `failOnPage` makes the n-th detail request (1-based, counted per source) throw.
 */
export const createFakeSource = (options: {
  idsByQuery: Record<string, string[]>;
  failOnPage?: number;
  failSearch?: boolean;
  articles?: Record<string, SourceArticle>;
  /** Ids efetch leaves out of its response. */
  omit?: string[];
}): FakeSource => {
  const searches: SearchQuery[] = [];
  const offsets: number[] = [];
  const pages: string[][] = [];
  return {
    searches,
    offsets,
    pages,
    async search(query, windowSize, offset) {
      searches.push(query);
      offsets.push(offset);
      if (options.failSearch) {
        throw new Error("esearch unavailable");
      }
      return (options.idsByQuery[query.label] ?? []).slice(offset, offset + windowSize);
    },
    async fetchDetails(ids, query) {
      pages.push([...ids]);
      if (options.failOnPage === pages.length) {
        throw new Error("efetch unavailable");
      }
      return ids
        .filter((id) => !options.omit?.includes(id))
        .map((id) => options.articles?.[id] ?? makeArticle(id, { query: query.label }));
    },
  };
};

export const createMemoryStore = (initial: ArticleRecord[] = []): RecordStore & { upserts: ArticleRecord[] } => {
  const records = new Map(initial.map((record) => [record.id, record]));
  const upserts: ArticleRecord[] = [];
  let mark: Awaited<ReturnType<RecordStore["watermark"]>> = null;
  return {
    upserts,
    async exists(id) {
      return records.has(id);
    },
    async get(id) {
      return records.get(id) ?? null;
    },
    async upsert(record) {
      upserts.push(record);
      records.set(record.id, record);
    },
    async all() {
      return Array.from(records.values()).sort((a, b) => a.fetched_at.localeCompare(b.fetched_at));
    },
    async watermark() {
      return mark;
    },
    async setWatermark(watermark) {
      mark = watermark;
    },
  };
};

export const ARTICLE_STATUSES = [
  "FETCHED",
  "ENRICHED",
  "NARRATED",
  "FAILED_ENRICHMENT",
  "FAILED_NARRATION",
] as const;

export type ArticleStatus = (typeof ARTICLE_STATUSES)[number];

export type SourceArticle = {
  id: string;
  url: string;
  query: string;
  title: string;
  abstract: string;
  authors: string[];
  journal?: string;
  publishedDate?: string;
  doi?: string;
};

export type ArticleRecord = {
  id: string;
  url: string;
  query: string;
  source: "PubMed";
  title_original: string;
  summary_original: string;
  authors: string[];
  journal?: string;
  published_date?: string;
  doi?: string;
  title_translated?: string;
  summary_translated?: string;
  applications: string[];
  pitch?: string;
  target_language: string;
  audio_ref?: string;
  status: ArticleStatus;
  fetched_at: string;
  enriched_at?: string;
  narrated_at?: string;
  enrichment_attempts: number;
  enrichment_error?: string;
  narration_error?: string;
};

export type Watermark = {
  cursors: Record<string, string>;
  updated_at: string;
};

export const toFetchedRecord = (
  article: SourceArticle,
  targetLanguage: string,
  fetchedAt: string,
): ArticleRecord => ({
  id: article.id,
  url: article.url,
  query: article.query,
  source: "PubMed",
  title_original: article.title,
  summary_original: article.abstract,
  authors: article.authors,
  journal: article.journal,
  published_date: article.publishedDate,
  doi: article.doi,
  applications: [],
  target_language: targetLanguage,
  status: "FETCHED",
  fetched_at: fetchedAt,
  enrichment_attempts: 0,
});

export const needsEnrichment = (record: ArticleRecord, retryFailed: boolean): boolean =>
  record.status === "FETCHED" || (retryFailed && record.status === "FAILED_ENRICHMENT");

export const needsNarration = (record: ArticleRecord, retryFailed: boolean): boolean => {
  if (record.status === "ENRICHED") {
    return true;
  }

  if (record.status === "FAILED_ENRICHMENT") {
    return record.narrated_at === undefined;
  }

  return retryFailed && record.status === "FAILED_NARRATION";
};

export const needsProcessing = (record: ArticleRecord, retryFailed: boolean): boolean =>
  needsEnrichment(record, retryFailed) || needsNarration(record, retryFailed);

/**
 * PubMed ids are decimal strings, so numeric order is publication order.
 * Anything else falls back to plain string order.
 */
export const compareIds = (a: string, b: string): number => {
  const isNumeric = /^\d+$/;
  if (isNumeric.test(a) && isNumeric.test(b)) {
    const diff = BigInt(a) - BigInt(b);
    return diff === 0n ? 0 : diff > 0n ? 1 : -1;
  }

  return a < b ? -1 : a > b ? 1 : 0;
};

export const countByStatus = (records: readonly ArticleRecord[]): Record<ArticleStatus, number> => {
  const counts: Record<ArticleStatus, number> = {
    FETCHED: 0,
    ENRICHED: 0,
    NARRATED: 0,
    FAILED_ENRICHMENT: 0,
    FAILED_NARRATION: 0,
  };
  for (const record of records) {
    counts[record.status] += 1;
  }

  return counts;
};

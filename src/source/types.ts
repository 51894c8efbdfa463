import { LATEST_QUERY, LATEST_QUERY_LABEL, LATEST_QUERY_TERM } from "../config/constants";
import type { SourceArticle } from "../core/articleRecord";

export type SearchQuery = {
  /** Stable name used in records and as the watermark cursor key. */
  label: string;
  term: string;
};

export interface ArticleSource {
  /** Candidate ids for a query, newest first: at most `windowSize` of them, starting `offset` ids in. */
  search(query: SearchQuery, windowSize: number, offset: number, signal?: AbortSignal): Promise<string[]>;
  /** Details for one page of ids. Throws when the page cannot be retrieved. */
  fetchDetails(ids: readonly string[], query: SearchQuery, signal?: AbortSignal): Promise<SourceArticle[]>;
}

export const toSearchQuery = (value: string): SearchQuery => {
  const trimmed = value.trim();
  if (trimmed.toLowerCase() === LATEST_QUERY) {
    return { label: LATEST_QUERY_LABEL, term: LATEST_QUERY_TERM };
  }

  return { label: trimmed, term: trimmed };
};

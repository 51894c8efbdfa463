import { compareIds, type SourceArticle } from "../core/articleRecord";
import { toErrorMessage } from "../core/errors";
import { getLogger } from "../log/logger";
import type { RecordStore } from "../store/recordStore";
import type { ArticleSource, SearchQuery } from "./types";

const log = getLogger("fetcher");

export type SkippedArticle = {
  id: string;
  reason: "abstract_too_short";
};

export type FetchOutcome = {
  articles: SourceArticle[];
  /** False when the search could not reach the cursor, or a detail page failed or came back short. */
  complete: boolean;
  /** Highest id up to which every candidate is stored, retrieved or deliberately skipped. */
  frontier: string | null;
  skipped: SkippedArticle[];
  error?: string;
};

export type FetchRequest = {
  query: SearchQuery;
  cursor: string | null;
  limit: number;
  searchPadding: number;
  /** Window size for the esearch pages after the first one. */
  searchPageSize: number;
  maxSearchPages: number;
  pageSize: number;
  minAbstractLength: number;
  /** Ids already taken by an earlier query in the same run. Selected ids are added to it. */
  claimed: Set<string>;
  signal?: AbortSignal;
};

type SearchResult = {
  ids: string[];
  /** True once every id newer than the cursor has been seen. */
  reachedCursor: boolean;
};

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const pages: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    pages.push(items.slice(index, index + size));
  }
  return pages;
};

const oldestId = (ids: readonly string[]): string | undefined =>
  ids.reduce<string | undefined>(
    (oldest, id) => (oldest === undefined || compareIds(id, oldest) < 0 ? id : oldest),
    undefined,
  );

/**
 * Pages esearch back from the newest result until the window drops to or below the cursor.
 * Without a cursor only the newest window is read.
 */
const searchBackToCursor = async (source: ArticleSource, request: FetchRequest): Promise<SearchResult> => {
  const { query, cursor } = request;
  const seen = new Set<string>();
  let offset = 0;

  for (let page = 0; page < request.maxSearchPages; page += 1) {
    const windowSize = page === 0 ? request.limit + request.searchPadding : Math.max(request.searchPageSize, 1);
    const window = await source.search(query, windowSize, offset, request.signal);
    for (const id of window) {
      seen.add(id);
    }

    const oldest = oldestId(window);
    if (cursor === null || window.length < windowSize || oldest === undefined || compareIds(oldest, cursor) <= 0) {
      return { ids: Array.from(seen), reachedCursor: true };
    }
    offset += window.length;
  }

  return { ids: Array.from(seen), reachedCursor: false };
};

export const fetchNewArticles = async (
  deps: { source: ArticleSource; store: RecordStore },
  request: FetchRequest,
): Promise<FetchOutcome> => {
  const { query, cursor } = request;

  let searched: SearchResult;
  try {
    searched = await searchBackToCursor(deps.source, request);
  } catch (error) {
    log.error({ query: query.label, err: error }, "search failed");
    return { articles: [], complete: false, frontier: null, skipped: [], error: toErrorMessage(error) };
  }

  let error: string | undefined;
  if (!searched.reachedCursor) {
    error = `search did not reach cursor ${cursor} within ${request.maxSearchPages} pages`;
    log.warn({ query: query.label, cursor, seen: searched.ids.length }, "backlog deeper than the search limit, cursor held");
  }

  const candidates = searched.ids.filter((id) => cursor === null || compareIds(id, cursor) > 0).sort(compareIds);

  const considered: string[] = [];
  const selected: string[] = [];
  for (const id of candidates) {
    const known = request.claimed.has(id) || (await deps.store.exists(id));
    if (!known) {
      if (selected.length >= request.limit) {
        break;
      }
      selected.push(id);
      request.claimed.add(id);
    }
    considered.push(id);
  }

  const articles: SourceArticle[] = [];
  const skipped: SkippedArticle[] = [];
  let failedFrom: string | null = null;

  for (const page of chunk(selected, request.pageSize)) {
    let details: SourceArticle[];
    try {
      details = await deps.source.fetchDetails(page, query, request.signal);
    } catch (pageError) {
      failedFrom = page[0] ?? null;
      error = toErrorMessage(pageError);
      log.error({ query: query.label, page, err: pageError }, "detail page failed, keeping what was retrieved");
      break;
    }

    const byId = new Map(details.map((article) => [article.id, article]));
    const missing = page.find((id) => !byId.has(id));

    for (const id of page) {
      const article = byId.get(id);
      if (!article) {
        break;
      }
      if (article.abstract.trim().length < request.minAbstractLength) {
        skipped.push({ id, reason: "abstract_too_short" });
      } else {
        articles.push(article);
      }
    }

    if (missing !== undefined) {
      failedFrom = missing;
      error = `efetch response is missing ${missing}`;
      log.warn({ query: query.label, missing, page }, "detail page came back short, keeping what was retrieved");
      break;
    }
  }

  // Ids from the first unretrieved one onwards go back for a later query or run.
  const boundary = failedFrom;
  if (boundary !== null) {
    for (const id of selected) {
      if (compareIds(id, boundary) >= 0) {
        request.claimed.delete(id);
      }
    }
  }

  const settled = boundary === null ? considered : considered.filter((id) => compareIds(id, boundary) < 0);
  const frontier = searched.reachedCursor ? (settled.at(-1) ?? null) : null;
  const complete = searched.reachedCursor && failedFrom === null;

  if (skipped.length > 0) {
    log.warn({ query: query.label, skipped }, "skipped articles without a usable abstract");
  }
  log.info(
    {
      query: query.label,
      candidates: candidates.length,
      fetched: articles.length,
      skipped: skipped.length,
      complete,
      frontier,
    },
    "fetch completed",
  );

  return { articles, complete, frontier, skipped, error };
};

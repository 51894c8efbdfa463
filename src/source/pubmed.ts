import { load } from "cheerio";
import { z } from "zod";
import { PUBMED_ARTICLE_BASE_URL } from "../config/constants";
import type { SourceArticle } from "../core/articleRecord";
import { HttpStatusError } from "../core/errors";
import { type RetryPolicy, type Sleep, sleep as defaultSleep, withRetry } from "../core/retry";
import { cleanBlock, cleanInline, cleanTitle } from "../core/text";
import { getLogger } from "../log/logger";
import type { ArticleSource, SearchQuery } from "./types";

const log = getLogger("pubmed");

const UNTITLED = "(untitled)";

const esearchSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()).default([]),
    ERROR: z.string().optional(),
  }),
});

export type PubmedSourceOptions = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  requestDelayMs: number;
  retry: RetryPolicy;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
};

const isRetryableHttpError = (error: unknown): boolean =>
  !(error instanceof HttpStatusError) || error.status === 429 || error.status >= 500;

const formatPubDate = (parts: (string | undefined)[]): string | undefined => {
  const present = parts.map((part) => part?.trim()).filter((part): part is string => Boolean(part));
  return present.length > 0 ? present.join(" ") : undefined;
};

/**
 * Parses an `efetch` (rettype=abstract, retmode=xml) response into source articles.
 * Structured abstracts keep their section labels as `LABEL: text` lines.
 */
export const parseEfetchXml = (xml: string, query: SearchQuery): SourceArticle[] => {
  const $ = load(xml, { xml: true });

  return $("PubmedArticle")
    .toArray()
    .flatMap((element) => {
      const article = $(element);
      const id = article.find("MedlineCitation > PMID").first().text().trim();
      if (!id) {
        return [];
      }

      const title = cleanTitle(article.find("ArticleTitle").first().text()) || UNTITLED;

      const abstract = article
        .find("Abstract > AbstractText")
        .toArray()
        .map((part) => {
          const node = $(part);
          const text = cleanBlock(node.text());
          const label = node.attr("Label")?.trim();
          return text && label ? `${label}: ${text}` : text;
        })
        .filter((text) => text.length > 0)
        .join("\n");

      const authors = article
        .find("AuthorList > Author")
        .toArray()
        .map((author) => {
          const node = $(author);
          const collective = cleanInline(node.find("CollectiveName").text());
          if (collective) {
            return collective;
          }
          return cleanInline(`${node.find("ForeName").text()} ${node.find("LastName").text()}`);
        })
        .filter((name) => name.length > 0);

      const journal = cleanInline(article.find("Journal > Title").first().text()) || undefined;

      const pubDate = article.find("JournalIssue > PubDate").first();
      const publishedDate =
        formatPubDate([pubDate.find("Year").text(), pubDate.find("Month").text(), pubDate.find("Day").text()]) ??
        formatPubDate([pubDate.find("MedlineDate").text()]);

      const doi =
        article.find('ELocationID[EIdType="doi"]').first().text().trim() ||
        article.find('ArticleIdList > ArticleId[IdType="doi"]').first().text().trim() ||
        undefined;

      return [
        {
          id,
          url: `${PUBMED_ARTICLE_BASE_URL}${id}/`,
          query: query.label,
          title,
          abstract,
          authors,
          journal,
          publishedDate,
          doi,
        },
      ];
    });
};

export const createPubmedSource = (options: PubmedSourceOptions): ArticleSource => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const wait = options.sleep ?? defaultSleep;
  let lastRequestAtMs = 0;

  // NCBI allows 3 requests/s without an API key.
  const throttle = async (signal?: AbortSignal): Promise<void> => {
    const remainingMs = lastRequestAtMs + options.requestDelayMs - Date.now();
    if (remainingMs > 0) {
      await wait(remainingMs, signal);
    }
    lastRequestAtMs = Date.now();
  };

  const buildUrl = (endpoint: string, params: Record<string, string>): string => {
    const url = new URL(endpoint, options.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    if (options.apiKey) {
      url.searchParams.set("api_key", options.apiKey);
    }
    return url.toString();
  };

  const requestText = async (
    endpoint: string,
    params: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<string> => {
    const url = buildUrl(endpoint, params);

    const outcome = await withRetry(
      async () => {
        await throttle(signal);
        const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) });
        if (!response.ok) {
          throw new HttpStatusError(endpoint, response.status);
        }
        return response.text();
      },
      options.retry,
      {
        shouldRetry: isRetryableHttpError,
        sleep: wait,
        signal,
        onRetry: (error, attempt, delayMs) =>
          log.warn({ endpoint, attempt, delayMs, err: error }, "E-utilities request failed, retrying"),
      },
    );

    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  };

  return {
    async search(query, windowSize, offset, signal) {
      const body = await requestText(
        "esearch.fcgi",
        {
          db: "pubmed",
          term: query.term,
          retmode: "json",
          retstart: String(offset),
          retmax: String(windowSize),
          sort: "date",
        },
        signal,
      );

      const parsed = esearchSchema.parse(JSON.parse(body));
      if (parsed.esearchresult.ERROR) {
        throw new Error(`esearch rejected term "${query.term}": ${parsed.esearchresult.ERROR}`);
      }

      log.debug({ query: query.label, offset, count: parsed.esearchresult.idlist.length }, "esearch completed");
      return parsed.esearchresult.idlist;
    },

    async fetchDetails(ids, query, signal) {
      if (ids.length === 0) {
        return [];
      }

      const xml = await requestText(
        "efetch.fcgi",
        {
          db: "pubmed",
          id: ids.join(","),
          retmode: "xml",
          rettype: "abstract",
        },
        signal,
      );

      const articles = parseEfetchXml(xml, query);
      log.debug({ query: query.label, requested: ids.length, parsed: articles.length }, "efetch completed");
      return articles;
    },
  };
};

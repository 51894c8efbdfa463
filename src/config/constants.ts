export const EUTILS_BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/";
export const PUBMED_ARTICLE_BASE_URL = "https://pubmed.ncbi.nlm.nih.gov/";

// Query value that asks PubMed for the newest citations regardless of topic.
export const LATEST_QUERY = "latest";
export const LATEST_QUERY_TERM = "pubmed[sb]";
export const LATEST_QUERY_LABEL = "Latest PubMed Articles";

export const DEFAULT_QUERIES = [
  "artificial intelligence",
  "machine learning",
  "deep learning",
  "cancer treatment",
  "diabetes management",
  LATEST_QUERY,
];

export const DATA_DIR = "data";
export const RECORDS_FILE = "news.jsonl";
export const WATERMARK_FILE = "watermark.json";
export const AUDIO_DIR = "audios";
export const LOCK_FILE = "pipeline.lock";

export const DEFAULT_ARTICLES_PER_QUERY = 1;
export const DEFAULT_SEARCH_PADDING = 15;
export const DEFAULT_SEARCH_PAGE_SIZE = 200;
// esearch stops paging at 10,000 results
export const DEFAULT_MAX_SEARCH_PAGES = 50;

// An unparseable lock older than this was left by a writer that died mid-write
export const LOCK_STALE_GRACE_MS = 30_000;
export const DEFAULT_FETCH_PAGE_SIZE = 20;
export const DEFAULT_MIN_ABSTRACT_LENGTH = 50;
export const DEFAULT_REQUEST_DELAY_MS = 400;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_CONCURRENCY = 3;
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1_000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 8_000;
export const DEFAULT_MAX_NARRATION_CHARS = 4_096;
export const MAX_APPLICATIONS = 3;

export type NarrationLabels = {
  applicationsHeading: string;
  ordinals: string[];
};

export const ENGLISH_NARRATION_LABELS: NarrationLabels = {
  applicationsHeading: "Possible applications of this research:",
  ordinals: ["First, ", "Second, ", "Third, "],
};

export const NARRATION_LABELS: Record<string, NarrationLabels> = {
  "zh-TW": {
    applicationsHeading: "這項研究的應用場景：",
    ordinals: ["第一，", "第二，", "第三，"],
  },
  "zh-CN": {
    applicationsHeading: "这项研究的应用场景：",
    ordinals: ["第一，", "第二，", "第三，"],
  },
  ja: {
    applicationsHeading: "この研究の応用例：",
    ordinals: ["一つ目、", "二つ目、", "三つ目、"],
  },
  en: ENGLISH_NARRATION_LABELS,
};

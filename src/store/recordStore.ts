import { appendFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { RECORDS_FILE, WATERMARK_FILE } from "../config/constants";
import { ARTICLE_STATUSES, type ArticleRecord, type Watermark } from "../core/articleRecord";
import { PersistenceError, toErrorMessage } from "../core/errors";
import { getLogger } from "../log/logger";

const log = getLogger("store");

const ENRICHED_STATUSES = new Set(["ENRICHED", "NARRATED", "FAILED_NARRATION"]);

export const articleRecordSchema = z
  .object({
    id: z.string().min(1),
    url: z.string(),
    query: z.string(),
    source: z.literal("PubMed"),
    title_original: z.string(),
    summary_original: z.string(),
    authors: z.array(z.string()).default([]),
    journal: z.string().optional(),
    published_date: z.string().optional(),
    doi: z.string().optional(),
    title_translated: z.string().optional(),
    summary_translated: z.string().optional(),
    applications: z.array(z.string()).default([]),
    pitch: z.string().optional(),
    target_language: z.string(),
    audio_ref: z.string().optional(),
    status: z.enum(ARTICLE_STATUSES),
    fetched_at: z.string(),
    enriched_at: z.string().optional(),
    narrated_at: z.string().optional(),
    enrichment_attempts: z.number().int().min(0).default(0),
    enrichment_error: z.string().optional(),
    narration_error: z.string().optional(),
  })
  .superRefine((record, ctx) => {
    if (!ENRICHED_STATUSES.has(record.status)) {
      return;
    }

    if (!record.title_translated?.trim() || !record.summary_translated?.trim()) {
      ctx.addIssue({ code: "custom", message: `${record.status} record requires translated title and summary` });
    }

    if (record.applications.length === 0) {
      ctx.addIssue({ code: "custom", message: `${record.status} record requires applications` });
    }
  }) satisfies z.ZodType<ArticleRecord>;

const watermarkSchema = z.object({
  cursors: z.record(z.string(), z.string()),
  updated_at: z.string(),
}) satisfies z.ZodType<Watermark>;

export interface RecordStore {
  exists(id: string): Promise<boolean>;
  get(id: string): Promise<ArticleRecord | null>;
  upsert(record: ArticleRecord): Promise<void>;
  all(): Promise<ArticleRecord[]>;
  watermark(): Promise<Watermark | null>;
  setWatermark(watermark: Watermark): Promise<void>;
}

export type JsonlRecordStoreOptions = {
  dataDir: string;
  recordsFile?: string;
  watermarkFile?: string;
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const toLine = (record: ArticleRecord): string => `${JSON.stringify(record)}\n`;

const tryParseRecord = (line: string): ArticleRecord | null => {
  try {
    const result = articleRecordSchema.safeParse(JSON.parse(line));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
};

const writeAtomically = async (filePath: string, content: string): Promise<void> => {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tempPath, content, "utf-8");
  await rename(tempPath, filePath);
};

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "(record)"}: ${issue.message}`).join("; ");

/**
 * Line-delimited record store. New ids are appended as a single line; replacing an
 * existing id rewrites the dataset through a temp file and rename, so the file never
 * holds two lines for one id. Writes are serialized per store instance; separate
 * processes are kept apart by the run lock.
 */
export const createJsonlRecordStore = (options: JsonlRecordStoreOptions): RecordStore => {
  const recordsPath = join(options.dataDir, options.recordsFile ?? RECORDS_FILE);
  const watermarkPath = join(options.dataDir, options.watermarkFile ?? WATERMARK_FILE);

  const records = new Map<string, ArticleRecord>();
  let loading: Promise<void> | null = null;
  let needsRewrite = false;
  let writeQueue: Promise<void> = Promise.resolve();

  const parseLines = (content: string): void => {
    const lines = content.split("\n");
    const trailing = lines.pop() ?? "";

    lines.forEach((line, index) => {
      if (line.trim() === "") {
        return;
      }

      const lineNumber = index + 1;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        throw new PersistenceError(`${recordsPath}:${lineNumber} is not valid JSON`, { cause: error });
      }

      const result = articleRecordSchema.safeParse(parsed);
      if (!result.success) {
        throw new PersistenceError(`${recordsPath}:${lineNumber} is not a valid record: ${describeIssues(result.error)}`);
      }

      if (records.has(result.data.id)) {
        needsRewrite = true;
      }
      records.set(result.data.id, result.data);
    });

    if (trailing.trim() === "") {
      return;
    }

    // An unterminated last line is what an interrupted append leaves behind.
    needsRewrite = true;
    const recovered = tryParseRecord(trailing);
    if (recovered) {
      records.set(recovered.id, recovered);
      return;
    }
    log.warn({ path: recordsPath, bytes: trailing.length }, "dropping truncated trailing record");
  };

  const load = async (): Promise<void> => {
    let content: string;
    try {
      content = await readFile(recordsPath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new PersistenceError(`Failed to read ${recordsPath}: ${toErrorMessage(error)}`, { cause: error });
    }

    parseLines(content);
    log.debug({ path: recordsPath, count: records.size }, "record store loaded");
  };

  const ensureLoaded = (): Promise<void> => {
    if (!loading) {
      loading = load().catch((error: unknown) => {
        loading = null;
        records.clear();
        throw error;
      });
    }
    return loading;
  };

  const enqueue = (task: () => Promise<void>): Promise<void> => {
    const next = writeQueue.then(task);
    writeQueue = next.catch(() => undefined);
    return next;
  };

  const validate = (record: ArticleRecord): ArticleRecord => {
    const result = articleRecordSchema.safeParse(record);
    if (!result.success) {
      throw new PersistenceError(`Refusing to persist record ${record.id}: ${describeIssues(result.error)}`);
    }
    return result.data;
  };

  const rewriteAll = async (nextRecords: Map<string, ArticleRecord>): Promise<void> => {
    const content = Array.from(nextRecords.values()).map(toLine).join("");
    await writeAtomically(recordsPath, content);
  };

  return {
    async exists(id) {
      await ensureLoaded();
      return records.has(id);
    },

    async get(id) {
      await ensureLoaded();
      return records.get(id) ?? null;
    },

    async upsert(record) {
      await ensureLoaded();
      const valid = validate(record);

      await enqueue(async () => {
        try {
          await mkdir(dirname(recordsPath), { recursive: true });

          if (records.has(valid.id) || needsRewrite) {
            const nextRecords = new Map(records);
            nextRecords.set(valid.id, valid);
            await rewriteAll(nextRecords);
            needsRewrite = false;
          } else {
            await appendFile(recordsPath, toLine(valid), "utf-8");
          }
        } catch (error) {
          throw new PersistenceError(`Failed to persist record ${valid.id}: ${toErrorMessage(error)}`, {
            cause: error,
          });
        }

        records.set(valid.id, valid);
      });
    },

    async all() {
      await ensureLoaded();
      return Array.from(records.values()).sort((a, b) => a.fetched_at.localeCompare(b.fetched_at));
    },

    async watermark() {
      let content: string;
      try {
        content = await readFile(watermarkPath, "utf-8");
      } catch (error) {
        if (isMissingFile(error)) {
          return null;
        }
        throw new PersistenceError(`Failed to read ${watermarkPath}: ${toErrorMessage(error)}`, { cause: error });
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new PersistenceError(`${watermarkPath} is not valid JSON`, { cause: error });
      }

      const result = watermarkSchema.safeParse(parsed);
      if (!result.success) {
        throw new PersistenceError(`${watermarkPath} is not a valid watermark: ${describeIssues(result.error)}`);
      }
      return result.data;
    },

    async setWatermark(watermark) {
      const valid = watermarkSchema.parse(watermark);

      await enqueue(async () => {
        try {
          await mkdir(dirname(watermarkPath), { recursive: true });
          await writeAtomically(watermarkPath, `${JSON.stringify(valid, null, 2)}\n`);
        } catch (error) {
          throw new PersistenceError(`Failed to persist watermark: ${toErrorMessage(error)}`, { cause: error });
        }
      });
    },
  };
};

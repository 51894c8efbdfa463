import "dotenv/config";
import { z } from "zod";
import {
	DATA_DIR,
	DEFAULT_ARTICLES_PER_QUERY,
	DEFAULT_CONCURRENCY,
	DEFAULT_FETCH_PAGE_SIZE,
	DEFAULT_MAX_NARRATION_CHARS,
	DEFAULT_MIN_ABSTRACT_LENGTH,
	DEFAULT_QUERIES,
	DEFAULT_REQUEST_DELAY_MS,
	DEFAULT_REQUEST_TIMEOUT_MS,
	DEFAULT_RETRY_ATTEMPTS,
	DEFAULT_RETRY_BASE_DELAY_MS,
	DEFAULT_RETRY_MAX_DELAY_MS,
	DEFAULT_MAX_SEARCH_PAGES,
	DEFAULT_SEARCH_PADDING,
	DEFAULT_SEARCH_PAGE_SIZE,
	EUTILS_BASE_URL,
} from "./config/constants";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const configSchema = z.object({
	env: z.enum(["development", "production", "test"]).default("development"),
	logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

	// storage
	dataDir: z.string().min(1).default(DATA_DIR),

	// upstream
	eutilsBaseUrl: z.string().url().default(EUTILS_BASE_URL),
	queries: z.array(z.string().min(1)).min(1).default(DEFAULT_QUERIES),
	articlesPerQuery: positiveInt(DEFAULT_ARTICLES_PER_QUERY),
	searchPadding: nonNegativeInt(DEFAULT_SEARCH_PADDING),
	searchPageSize: positiveInt(DEFAULT_SEARCH_PAGE_SIZE),
	maxSearchPages: positiveInt(DEFAULT_MAX_SEARCH_PAGES),
	fetchPageSize: positiveInt(DEFAULT_FETCH_PAGE_SIZE),
	minAbstractLength: nonNegativeInt(DEFAULT_MIN_ABSTRACT_LENGTH),
	requestDelayMs: nonNegativeInt(DEFAULT_REQUEST_DELAY_MS),
	requestTimeoutMs: positiveInt(DEFAULT_REQUEST_TIMEOUT_MS),

	// processing
	concurrency: positiveInt(DEFAULT_CONCURRENCY),
	retry: z.object({
		attempts: positiveInt(DEFAULT_RETRY_ATTEMPTS),
		baseDelayMs: nonNegativeInt(DEFAULT_RETRY_BASE_DELAY_MS),
		maxDelayMs: nonNegativeInt(DEFAULT_RETRY_MAX_DELAY_MS),
	}),

	// enrichment & narration
	targetLanguage: z.string().min(2).default("zh-TW"),
	targetLanguageName: z.string().min(1).default("Traditional Chinese (Taiwan)"),
	sourceLanguage: z.string().min(2).default("en"),
	aiModel: z.string().min(1).default("gpt-4o-mini"),
	ttsModel: z.string().min(1).default("gpt-4o-mini-tts"),
	ttsVoice: z.string().min(1).default("alloy"),
	maxNarrationChars: positiveInt(DEFAULT_MAX_NARRATION_CHARS),

	// schedule
	schedule: z.string().min(1).default("0 6 * * *"),
	scheduleTimezone: z.string().min(1).default("Asia/Taipei"),

	// secrets (checked by the feature that needs them)
	openaiKey: z.string().min(1).optional(),
	ncbiApiKey: z.string().min(1).optional(),
});

type Config = z.infer<typeof configSchema>;

const blankToUndefined = (value: string | undefined): string | undefined =>
	value === undefined || value.trim() === "" ? undefined : value.trim();

const parseList = (value: string | undefined): string[] | undefined => {
	const items = (value ?? "")
		.split(",")
		.map((item) => item.trim())
		.filter(Boolean);

	return items.length > 0 ? items : undefined;
};

const createConfig = (): Config => {
	const env = process.env;

	const raw = {
		env: blankToUndefined(env.NODE_ENV),
		logLevel: blankToUndefined(env.LOG_LEVEL),

		dataDir: blankToUndefined(env.DATA_DIR),

		eutilsBaseUrl: blankToUndefined(env.EUTILS_BASE_URL),
		queries: parseList(env.PUBMED_QUERIES),
		articlesPerQuery: blankToUndefined(env.ARTICLES_PER_QUERY),
		searchPadding: blankToUndefined(env.SEARCH_PADDING),
		searchPageSize: blankToUndefined(env.SEARCH_PAGE_SIZE),
		maxSearchPages: blankToUndefined(env.MAX_SEARCH_PAGES),
		fetchPageSize: blankToUndefined(env.FETCH_PAGE_SIZE),
		minAbstractLength: blankToUndefined(env.MIN_ABSTRACT_LENGTH),
		requestDelayMs: blankToUndefined(env.REQUEST_DELAY_MS),
		requestTimeoutMs: blankToUndefined(env.REQUEST_TIMEOUT_MS),

		concurrency: blankToUndefined(env.CONCURRENCY),
		retry: {
			attempts: blankToUndefined(env.RETRY_ATTEMPTS),
			baseDelayMs: blankToUndefined(env.RETRY_BASE_DELAY_MS),
			maxDelayMs: blankToUndefined(env.RETRY_MAX_DELAY_MS),
		},

		targetLanguage: blankToUndefined(env.TARGET_LANGUAGE),
		targetLanguageName: blankToUndefined(env.TARGET_LANGUAGE_NAME),
		sourceLanguage: blankToUndefined(env.SOURCE_LANGUAGE),
		aiModel: blankToUndefined(env.AI_MODEL),
		ttsModel: blankToUndefined(env.TTS_MODEL),
		ttsVoice: blankToUndefined(env.TTS_VOICE),
		maxNarrationChars: blankToUndefined(env.MAX_NARRATION_CHARS),

		schedule: blankToUndefined(env.SCHEDULE),
		scheduleTimezone: blankToUndefined(env.SCHEDULE_TIMEZONE),

		openaiKey: blankToUndefined(env.OPENAI_API_KEY),
		ncbiApiKey: blankToUndefined(env.NCBI_API_KEY),
	};

	const result = configSchema.safeParse(raw);

	if (!result.success) {
		console.error("❌ Config validation failed:");
		for (const issue of result.error.issues) {
			console.error(`  ${issue.path.join(".") || "(root)"}: ${issue.message}`);
		}
		process.exit(1);
	}

	return result.data;
};

export const config = createConfig();
export type { Config };

import { z } from "zod";
import { MAX_APPLICATIONS } from "../config/constants";
import { SchemaViolationError } from "./errors";

/** Shape requested from the model. Kept free of transforms so it converts cleanly to JSON Schema. */
export const generationSchema = z.object({
  title_translated: z.string().min(1),
  summary_translated: z.string().min(1),
  applications: z.array(z.string()),
  pitch: z.string().min(1),
});

export type GenerationOutput = z.infer<typeof generationSchema>;

export type Enrichment = {
  titleTranslated: string;
  summaryTranslated: string;
  applications: string[];
  pitch: string;
};

export const normalizeApplications = (applications: readonly string[]): string[] =>
  applications
    .map((application) => application.replace(/\s+/g, " ").trim())
    .filter((application) => application.length > 0)
    .slice(0, MAX_APPLICATIONS);

/**
 * Validates raw generator output at the boundary. Anything that does not yield
 * non-empty translations and at least one application is a schema violation.
 */
export const parseGeneration = (raw: unknown): Enrichment => {
  const result = generationSchema.safeParse(raw);
  if (!result.success) {
    throw new SchemaViolationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(output)"}: ${issue.message}`),
    );
  }

  const titleTranslated = result.data.title_translated.trim();
  const summaryTranslated = result.data.summary_translated.trim();
  const pitch = result.data.pitch.trim();
  const applications = normalizeApplications(result.data.applications);

  const issues = [
    titleTranslated ? null : "title_translated: blank",
    summaryTranslated ? null : "summary_translated: blank",
    pitch ? null : "pitch: blank",
    applications.length > 0 ? null : "applications: no usable entries",
  ].filter((issue): issue is string => issue !== null);

  if (issues.length > 0) {
    throw new SchemaViolationError(issues);
  }

  return { titleTranslated, summaryTranslated, applications, pitch };
};

export const buildEnrichmentPrompt = (input: {
  title: string;
  abstract: string;
  targetLanguageName: string;
}): { system: string; prompt: string } => ({
  system:
    "You are a science communicator who explains biomedical research to a general audience. Return only structured JSON that matches the schema.",
  prompt: [
    `target_language: ${input.targetLanguageName}`,
    "",
    "Tasks:",
    "1. title_translated: translate the article title into the target language.",
    "2. summary_translated: condense the abstract into a concise summary in the target language (about 100-150 characters or words), easy to follow when listened to.",
    `3. applications: imagine exactly ${MAX_APPLICATIONS} application scenarios, each one short plain sentence in the target language, so a layperson understands why the research matters.`,
    "4. pitch: one sentence in the target language pitching the research to an investor.",
    "",
    `title: ${input.title}`,
    "abstract:",
    input.abstract,
  ].join("\n"),
});

import { ENGLISH_NARRATION_LABELS, NARRATION_LABELS, type NarrationLabels } from "../config/constants";
import type { ArticleRecord } from "../core/articleRecord";

export type NarrationScript = {
  text: string;
  language: string;
};

export const narrationLabelsFor = (language: string): NarrationLabels =>
  NARRATION_LABELS[language] ?? NARRATION_LABELS[language.split("-")[0] ?? ""] ?? ENGLISH_NARRATION_LABELS;

/**
 * Title, summary and numbered applications, separated by blank lines.
 * Records without a translation are read in the source language.
 */
export const buildNarrationScript = (
  record: ArticleRecord,
  languages: { targetLanguage: string; sourceLanguage: string },
): NarrationScript => {
  const title = record.title_translated?.trim();
  const summary = record.summary_translated?.trim();

  if (record.status === "FAILED_ENRICHMENT" || !title || !summary) {
    const text = [record.title_original.trim(), record.summary_original.trim()].filter(Boolean).join("\n\n");
    return { text, language: languages.sourceLanguage };
  }

  const labels = narrationLabelsFor(languages.targetLanguage);
  const sections = [title, summary];

  if (record.applications.length > 0) {
    const lines = record.applications.map(
      (application, index) => `${labels.ordinals[index] ?? `${index + 1}. `}${application}`,
    );
    sections.push([labels.applicationsHeading, ...lines].join("\n"));
  }

  return { text: sections.join("\n\n"), language: languages.targetLanguage };
};

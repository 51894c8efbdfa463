// Abstracts deposited with double-escaped markup still carry entities after one XML decode.
const ENTITIES: ReadonlyArray<readonly [RegExp, string]> = [
  [/&nbsp;|&#160;/g, " "],
  [/&lt;/g, "<"],
  [/&gt;/g, ">"],
  [/&quot;/g, '"'],
  [/&#x27;|&#39;|&apos;/g, "'"],
  [/&amp;/g, "&"],
];

const INLINE_TAG = /<\/?(?:i|b|u|em|strong|sup|sub|sc)>/gi;

const decodeLeftovers = (value: string): string =>
  ENTITIES.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), value);

/** One line: leftover entities decoded, inline formatting tags dropped, whitespace collapsed. */
export const cleanInline = (value: string): string =>
  decodeLeftovers(value).replace(INLINE_TAG, "").replace(/\s+/g, " ").trim();

/** Like {@link cleanInline} per line, with blank lines removed. */
export const cleanBlock = (value: string): string =>
  value
    .split("\n")
    .map((line) => cleanInline(line))
    .filter((line) => line.length > 0)
    .join("\n");

/** Translated titles are indexed as `[Title].`; the brackets are dropped. */
export const cleanTitle = (value: string): string => {
  const title = cleanInline(value);
  const bracketed = /^\[(.+)\]\.?$/.exec(title);
  return bracketed?.[1]?.trim() ?? title;
};

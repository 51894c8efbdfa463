import { describe, expect, it } from "vitest";
import { cleanBlock, cleanInline, cleanTitle } from "./text";

describe("cleanInline", () => {
  it("decodes leftover entities and drops inline tags", () => {
    expect(cleanInline("Effects of &lt;i&gt;E. coli&lt;/i&gt;  on  gut")).toBe("Effects of E. coli on gut");
  });

  it("decodes an escaped ampersand only once", () => {
    expect(cleanInline("A &amp;lt; B")).toBe("A &lt; B");
  });

  it("keeps comparison signs that are not tags", () => {
    expect(cleanInline("p &lt; 0.05 and n > 10")).toBe("p < 0.05 and n > 10");
  });
});

describe("cleanBlock", () => {
  it("cleans each line and removes blank ones", () => {
    expect(cleanBlock("Line one &amp; more\n\n  line   two")).toBe("Line one & more\nline two");
  });
});

describe("cleanTitle", () => {
  it("unwraps bracketed translated titles", () => {
    expect(cleanTitle("[Effect of sleep on memory].")).toBe("Effect of sleep on memory");
  });

  it("leaves ordinary titles alone", () => {
    expect(cleanTitle("Sleep and memory: a review.")).toBe("Sleep and memory: a review.");
  });
});

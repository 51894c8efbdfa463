import { describe, expect, it, type Mock, vi } from "vitest";
import { HttpStatusError } from "../core/errors";
import { createPubmedSource, parseEfetchXml } from "./pubmed";
import { toSearchQuery } from "./types";

const EFETCH_XML = `<?xml version="1.0" ?>
<PubmedArticleSet>
  <PubmedArticle>
    <MedlineCitation Status="MEDLINE" Owner="NLM">
      <PMID Version="1">40000001</PMID>
      <Article PubModel="Print">
        <Journal>
          <JournalIssue CitedMedium="Internet">
            <PubDate><Year>2026</Year><Month>Jan</Month><Day>05</Day></PubDate>
          </JournalIssue>
          <Title>Journal of Placeholder Medicine</Title>
        </Journal>
        <ArticleTitle>A placeholder  trial of
          something.</ArticleTitle>
        <ELocationID EIdType="doi" ValidYN="Y">10.0000/placeholder.1</ELocationID>
        <Abstract>
          <AbstractText Label="BACKGROUND">Background   text.</AbstractText>
          <AbstractText Label="RESULTS">Results text.</AbstractText>
        </Abstract>
        <AuthorList>
          <Author><LastName>Example</LastName><ForeName>Ada</ForeName></Author>
          <Author><CollectiveName>Placeholder Study Group</CollectiveName></Author>
        </AuthorList>
      </Article>
    </MedlineCitation>
    <PubmedData>
      <ArticleIdList><ArticleId IdType="pubmed">40000001</ArticleId></ArticleIdList>
    </PubmedData>
  </PubmedArticle>
  <PubmedArticle>
    <MedlineCitation>
      <PMID>40000002</PMID>
      <Article>
        <Journal>
          <JournalIssue><PubDate><MedlineDate>2025 Nov-Dec</MedlineDate></PubDate></JournalIssue>
          <Title>Other Journal</Title>
        </Journal>
        <ArticleTitle></ArticleTitle>
        <Abstract><AbstractText>Plain abstract.</AbstractText></Abstract>
      </Article>
    </MedlineCitation>
    <PubmedData>
      <ArticleIdList><ArticleId IdType="doi">10.0000/placeholder.2</ArticleId></ArticleIdList>
    </PubmedData>
  </PubmedArticle>
</PubmedArticleSet>`;

const query = toSearchQuery("gene therapy");

const createSource = (fetchImpl: typeof fetch) =>
  createPubmedSource({
    baseUrl: "https://eutils.test/entrez/eutils/",
    apiKey: "test-key",
    timeoutMs: 1_000,
    requestDelayMs: 0,
    retry: { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    fetchImpl,
    sleep: async () => undefined,
  });

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const requestedUrl = (fetchImpl: Mock<typeof fetch>, call = 0): URL =>
  new URL(String(fetchImpl.mock.calls[call]?.[0]));

describe("parseEfetchXml", () => {
  it("extracts article fields and keeps abstract section labels", () => {
    expect(parseEfetchXml(EFETCH_XML, query)).toEqual([
      {
        id: "40000001",
        url: "https://pubmed.ncbi.nlm.nih.gov/40000001/",
        query: "gene therapy",
        title: "A placeholder trial of something.",
        abstract: "BACKGROUND: Background text.\nRESULTS: Results text.",
        authors: ["Ada Example", "Placeholder Study Group"],
        journal: "Journal of Placeholder Medicine",
        publishedDate: "2026 Jan 05",
        doi: "10.0000/placeholder.1",
      },
      {
        id: "40000002",
        url: "https://pubmed.ncbi.nlm.nih.gov/40000002/",
        query: "gene therapy",
        title: "(untitled)",
        abstract: "Plain abstract.",
        authors: [],
        journal: "Other Journal",
        publishedDate: "2025 Nov-Dec",
        doi: "10.0000/placeholder.2",
      },
    ]);
  });

  it("cleans escaped markup and bracketed titles", () => {
    const xml = `<PubmedArticleSet><PubmedArticle><MedlineCitation>
      <PMID>40000003</PMID>
      <Article>
        <ArticleTitle>[Role of &amp;lt;i&amp;gt;TP53&amp;lt;/i&amp;gt; in repair].</ArticleTitle>
        <Abstract><AbstractText>Mice &amp;amp; rats.</AbstractText></Abstract>
      </Article>
    </MedlineCitation></PubmedArticle></PubmedArticleSet>`;

    expect(parseEfetchXml(xml, query)).toMatchObject([
      { id: "40000003", title: "Role of TP53 in repair", abstract: "Mice & rats." },
    ]);
  });

  it("returns nothing for an empty article set", () => {
    expect(parseEfetchXml("<PubmedArticleSet></PubmedArticleSet>", query)).toEqual([]);
  });
});

describe("createPubmedSource", () => {
  it("searches newest first within the window", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ esearchresult: { idlist: ["3", "2"] } }));

    await expect(createSource(fetchImpl).search(query, 5, 0)).resolves.toEqual(["3", "2"]);

    const url = requestedUrl(fetchImpl);
    expect(url.pathname).toBe("/entrez/eutils/esearch.fcgi");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      db: "pubmed",
      term: "gene therapy",
      retmode: "json",
      retstart: "0",
      retmax: "5",
      sort: "date",
      api_key: "test-key",
    });
  });

  it("asks for the page starting at the offset", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ esearchresult: { idlist: [] } }));

    await createSource(fetchImpl).search(query, 200, 400);

    expect(requestedUrl(fetchImpl).searchParams.get("retstart")).toBe("400");
    expect(requestedUrl(fetchImpl).searchParams.get("retmax")).toBe("200");
  });

  it("retries server errors", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockImplementationOnce(async () => new Response("busy", { status: 503 }))
      .mockImplementationOnce(async () => jsonResponse({ esearchresult: { idlist: ["9"] } }));

    await expect(createSource(fetchImpl).search(query, 1, 0)).resolves.toEqual(["9"]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("bad request", { status: 400 }));

    await expect(createSource(fetchImpl).search(query, 1, 0)).rejects.toBeInstanceOf(HttpStatusError);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("surfaces search errors reported in the body", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ esearchresult: { idlist: [], ERROR: "Invalid query" } }),
    );

    await expect(createSource(fetchImpl).search(query, 1, 0)).rejects.toThrow(
      'esearch rejected term "gene therapy": Invalid query',
    );
  });

  it("fetches details for a page of ids", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(EFETCH_XML));

    const articles = await createSource(fetchImpl).fetchDetails(["40000001", "40000002"], query);

    expect(articles.map((article) => article.id)).toEqual(["40000001", "40000002"]);
    const url = requestedUrl(fetchImpl);
    expect(url.pathname).toBe("/entrez/eutils/efetch.fcgi");
    expect(url.searchParams.get("id")).toBe("40000001,40000002");
    expect(url.searchParams.get("rettype")).toBe("abstract");
  });

  it("skips the request for an empty page", async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    await expect(createSource(fetchImpl).fetchDetails([], query)).resolves.toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

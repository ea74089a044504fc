import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import logger from "../../utils/logger";
import { TerminalError } from "../../utils/errors";
import { fetchOk, type FetchLike } from "../../utils/http";
import { Throttle } from "../../utils/throttle";
import { normalizeDOI } from "../references/doi";
import type { ResilientClient } from "../../llm/retry";
import type { CallStats, PaperRecord } from "../../types/article";
import { isCitable, type SearchClient } from "./types";

const BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

const ESearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()).default([]),
  }),
});

export interface PubMedClientOptions {
  client: ResilientClient;
  apiKey?: string;
  email?: string;
  fetchImpl?: FetchLike;
  minIntervalMs?: number;
  baseUrl?: string;
}

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined;
}

function list(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

// Text of a leaf that may carry attributes
function textOf(value: unknown): string {
  if (typeof value === "string") return value.replace(/\s+/g, " ").trim();
  if (typeof value === "number") return String(value);
  if (isNode(value)) return textOf(value["#text"]);
  return "";
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, name: string) => {
    if (name.startsWith("#")) {
      const code =
        name[1] === "x" || name[1] === "X"
          ? parseInt(name.slice(2), 16)
          : parseInt(name.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[name.toLowerCase()] ?? match;
  });
}

// Stop nodes arrive raw: inline markup kept and entities still encoded
function markupText(value: unknown): string {
  const raw = isNode(value) ? value["#text"] : value;
  if (typeof raw !== "string") return textOf(raw);
  return decodeEntities(raw.replace(/<[^>]+>/g, "")).replace(/\s+/g, " ").trim();
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  stopNodes: ["*.ArticleTitle", "*.AbstractText"],
  isArray: (name) =>
    ["PubmedArticle", "Author", "AbstractText", "ArticleId", "ELocationID"].includes(name),
});

/**
 * Parse an efetch XML payload into PaperRecords, in document order.
 * Uncitable entries (no title or no authors) are dropped.
 */
export function parsePubMedXml(xml: string): PaperRecord[] {
  const root: unknown = parser.parse(xml);
  const articles = list(child(child(root, "PubmedArticleSet"), "PubmedArticle"));
  const records: PaperRecord[] = [];

  for (const entry of articles) {
    const citation = child(entry, "MedlineCitation");
    const article = child(citation, "Article");
    const pmid = textOf(child(citation, "PMID"));
    const title = markupText(child(article, "ArticleTitle"));

    const authors = list(child(child(article, "AuthorList"), "Author"))
      .map((author) => {
        const collective = textOf(child(author, "CollectiveName"));
        if (collective) return collective;
        return [textOf(child(author, "LastName")), textOf(child(author, "ForeName"))]
          .filter(Boolean)
          .join(" ");
      })
      .filter((name) => name.length > 0);

    if (!isCitable({ title, authors })) {
      logger.debug({ pmid }, "pubmed_record_uncitable");
      continue;
    }

    const abstract = list(child(child(article, "Abstract"), "AbstractText"))
      .map((part) => {
        const label = isNode(part) && typeof part["@_Label"] === "string" ? part["@_Label"] : "";
        const text = markupText(part);
        return label ? `${label}: ${text}` : text;
      })
      .filter(Boolean)
      .join("\n");

    const journal = child(article, "Journal");
    const pubDate = child(child(journal, "JournalIssue"), "PubDate");
    const yearText =
      textOf(child(pubDate, "Year")) || textOf(child(pubDate, "MedlineDate")).slice(0, 4);
    const year = /^\d{4}$/.test(yearText) ? parseInt(yearText, 10) : undefined;

    const doi = findDoi(entry, article);
    const venue = textOf(child(journal, "Title"));

    records.push({
      title,
      authors,
      year,
      venue: venue || undefined,
      doi,
      externalId: doi ? `doi:${doi}` : pmid ? `pmid:${pmid}` : undefined,
      abstract: abstract || undefined,
      url: pmid ? `https://pubmed.ncbi.nlm.nih.gov/${pmid}/` : undefined,
      source: "pubmed",
    });
  }

  return records;
}

function findDoi(entry: unknown, article: unknown): string | undefined {
  const ids = list(child(child(child(entry, "PubmedData"), "ArticleIdList"), "ArticleId"));
  const locations = list(child(article, "ELocationID"));

  for (const id of ids) {
    if (child(id, "@_IdType") === "doi" && textOf(id)) return normalizeDOI(textOf(id));
  }
  for (const location of locations) {
    if (child(location, "@_EIdType") === "doi" && textOf(location)) {
      return normalizeDOI(textOf(location));
    }
  }
  return undefined;
}

export class PubMedClient implements SearchClient {
  readonly service = "pubmed" as const;
  private readonly fetchImpl: FetchLike;
  private readonly throttle: Throttle;
  private readonly baseUrl: string;

  constructor(private readonly options: PubMedClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    // NCBI allows 3 requests/s without a key, 10 with one
    this.throttle = new Throttle(options.minIntervalMs ?? (options.apiKey ? 100 : 340));
    this.baseUrl = options.baseUrl ?? BASE_URL;
  }

  async search(query: string, limit: number, stats?: CallStats): Promise<PaperRecord[]> {
    const ids = await this.options.client.call(
      "pubmed",
      async (signal) => {
        await this.throttle.acquire();
        const response = await fetchOk(this.fetchImpl, this.url("esearch.fcgi", {
          db: "pubmed",
          term: query,
          retmode: "json",
          retmax: String(limit),
          sort: "relevance",
        }), { signal });
        const parsed = ESearchResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new TerminalError(`Unexpected esearch response: ${parsed.error.issues[0]?.message}`);
        }
        return parsed.data.esearchresult.idlist;
      },
      { label: "pubmed_esearch", stats },
    );

    if (ids.length === 0) return [];

    const xml = await this.options.client.call(
      "pubmed",
      async (signal) => {
        await this.throttle.acquire();
        const response = await fetchOk(this.fetchImpl, this.url("efetch.fcgi", {
          db: "pubmed",
          id: ids.join(","),
          retmode: "xml",
        }), { signal });
        return response.text();
      },
      { label: "pubmed_efetch", stats },
    );

    const byPmid = new Map(
      parsePubMedXml(xml).map((record) => [record.url ?? record.title, record] as const),
    );
    // efetch does not promise esearch order; restore relevance ranking
    const ordered = ids
      .map((id) => byPmid.get(`https://pubmed.ncbi.nlm.nih.gov/${id}/`))
      .filter((record): record is PaperRecord => record !== undefined);

    return ordered.slice(0, limit);
  }

  private url(endpoint: string, params: Record<string, string>): string {
    const search = new URLSearchParams(params);
    if (this.options.apiKey) search.set("api_key", this.options.apiKey);
    if (this.options.email) search.set("email", this.options.email);
    search.set("tool", "condition-kb");
    return `${this.baseUrl}/${endpoint}?${search.toString()}`;
  }
}

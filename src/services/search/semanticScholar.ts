import { z } from "zod";
import logger from "../../utils/logger";
import { TerminalError } from "../../utils/errors";
import { fetchOk, type FetchLike } from "../../utils/http";
import { Throttle } from "../../utils/throttle";
import { normalizeDOI } from "../references/doi";
import type { ResilientClient } from "../../llm/retry";
import type { CallStats, PaperRecord } from "../../types/article";
import { doiUrl, isCitable, type SearchClient } from "./types";

const BASE_URL = "https://api.semanticscholar.org/graph/v1";

export const PAPER_FIELDS =
  "title,abstract,authors,year,venue,externalIds,url,citationCount";

const S2PaperSchema = z.object({
  paperId: z.string(),
  title: z.string().nullish(),
  abstract: z.string().nullish(),
  year: z.number().int().nullish(),
  venue: z.string().nullish(),
  url: z.string().nullish(),
  citationCount: z.number().int().nullish(),
  authors: z.array(z.object({ name: z.string().nullish() })).nullish(),
  externalIds: z
    .object({
      DOI: z.string().nullish(),
      PubMed: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
});

const S2SearchResponseSchema = z.object({
  total: z.number().optional(),
  data: z.array(S2PaperSchema).default([]),
});

export type S2Paper = z.infer<typeof S2PaperSchema>;

export interface SemanticScholarClientOptions {
  client: ResilientClient;
  apiKey?: string;
  minCitationCount?: number;
  fetchImpl?: FetchLike;
  minIntervalMs?: number;
  baseUrl?: string;
}

export function normalizeS2Paper(paper: S2Paper): PaperRecord | null {
  const title = paper.title?.trim() ?? "";
  const authors = (paper.authors ?? [])
    .map((author) => author.name?.trim() ?? "")
    .filter((name) => name.length > 0);

  if (!isCitable({ title, authors })) return null;

  const doi = paper.externalIds?.DOI ? normalizeDOI(paper.externalIds.DOI) : undefined;
  const pmid = paper.externalIds?.PubMed ?? undefined;
  const externalId = doi ? `doi:${doi}` : pmid ? `pmid:${pmid}` : `s2:${paper.paperId}`;

  return {
    title,
    authors,
    year: paper.year ?? undefined,
    venue: paper.venue?.trim() || undefined,
    doi,
    externalId,
    abstract: paper.abstract?.trim() || undefined,
    url: paper.url || (doi ? doiUrl(doi) : undefined),
    citationCount: paper.citationCount ?? undefined,
    source: "semantic_scholar",
  };
}

export class SemanticScholarClient implements SearchClient {
  readonly service = "semantic_scholar" as const;
  private readonly fetchImpl: FetchLike;
  private readonly throttle: Throttle;
  private readonly baseUrl: string;

  constructor(private readonly options: SemanticScholarClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    // unauthenticated traffic shares a 1 request/s pool
    this.throttle = new Throttle(options.minIntervalMs ?? 1000);
    this.baseUrl = options.baseUrl ?? BASE_URL;
  }

  async search(query: string, limit: number, stats?: CallStats): Promise<PaperRecord[]> {
    const params = new URLSearchParams({
      query,
      limit: String(limit),
      fields: PAPER_FIELDS,
    });
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.options.apiKey) headers["x-api-key"] = this.options.apiKey;

    const papers = await this.options.client.call(
      "semantic_scholar",
      async (signal) => {
        await this.throttle.acquire();
        const response = await fetchOk(
          this.fetchImpl,
          `${this.baseUrl}/paper/search?${params.toString()}`,
          { headers, signal },
        );
        const parsed = S2SearchResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new TerminalError(
            `Unexpected Semantic Scholar response: ${parsed.error.issues[0]?.message}`,
          );
        }
        return parsed.data.data;
      },
      { label: "semantic_scholar_search", stats },
    );

    const minCitations = this.options.minCitationCount ?? 0;
    const records = papers
      .filter((paper) => (paper.citationCount ?? 0) >= minCitations)
      .map(normalizeS2Paper)
      .filter((record): record is PaperRecord => record !== null);

    if (records.length < papers.length) {
      logger.debug(
        { query, returned: papers.length, kept: records.length },
        "semantic_scholar_records_filtered",
      );
    }

    return records.slice(0, limit);
  }
}

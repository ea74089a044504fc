import logger from "../../utils/logger";
import { SimpleCache } from "../../utils/cache";
import { errorKindOf, errorMessage } from "../../utils/errors";
import type {
  CallStats,
  PaperRecord,
  SearchQuery,
  SearchService,
} from "../../types/article";
import type { SearchClient } from "./types";

export type QueryOutcome =
  | { query: SearchQuery; ok: true; papers: PaperRecord[] }
  | { query: SearchQuery; ok: false; papers: []; error: string; kind: string };

/**
 * Fans SearchQueries out to the configured services. Each query is
 * independent: a failing query yields an empty, flagged outcome.
 */
export class BibliographicSearch {
  private readonly clients: Map<SearchService, SearchClient>;
  private readonly cache: SimpleCache<PaperRecord[]>;

  constructor(
    clients: SearchClient[],
    private readonly defaultLimit = 3,
    cache?: SimpleCache<PaperRecord[]>,
  ) {
    this.clients = new Map(clients.map((client) => [client.service, client]));
    this.cache = cache ?? new SimpleCache<PaperRecord[]>();
  }

  get services(): SearchService[] {
    return [...this.clients.keys()];
  }

  async search(
    query: SearchQuery,
    limit = this.defaultLimit,
    stats?: CallStats,
  ): Promise<PaperRecord[]> {
    const client = this.clients.get(query.service);
    if (!client) {
      throw new Error(`Search service not configured: ${query.service}`);
    }

    const cacheKey = `${query.service}:${limit}:${query.query.trim().toLowerCase()}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return cached;

    const papers = await client.search(query.query, limit, stats);
    this.cache.set(cacheKey, papers);
    return papers;
  }

  async searchAll(
    queries: SearchQuery[],
    limit = this.defaultLimit,
    stats?: CallStats,
  ): Promise<QueryOutcome[]> {
    return Promise.all(
      queries.map(async (query): Promise<QueryOutcome> => {
        try {
          const papers = await this.search(query, limit, stats);
          return { query, ok: true, papers };
        } catch (error) {
          logger.warn(
            {
              service: query.service,
              section: query.section,
              query: query.query,
              error: errorMessage(error),
            },
            "search_query_failed",
          );
          return {
            query,
            ok: false,
            papers: [],
            error: errorMessage(error),
            kind: errorKindOf(error),
          };
        }
      }),
    );
  }
}

export { PubMedClient, parsePubMedXml } from "./pubmed";
export { SemanticScholarClient, normalizeS2Paper } from "./semanticScholar";
export type { SearchClient } from "./types";

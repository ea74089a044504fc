import logger from "../../utils/logger";
import { fillTemplate } from "../../utils/prompt";
import {
  QueryDraftSchema,
  type DocumentState,
  type SearchQuery,
} from "../../types/article";
import { advance, toDraft, type StageContext } from "../shared/document";
import { queryPrompt } from "./prompts";

/**
 * Query agent: asks the model for search queries per section and fans each
 * one out to every configured search service.
 */
export async function queryAgent(
  state: DocumentState,
  ctx: StageContext,
): Promise<DocumentState> {
  const headings = new Set(state.outline.sections.map((section) => section.heading));
  const perSection = ctx.options.queriesPerSection;

  const draft = await ctx.model.generate(
    {
      name: "query_generation",
      schema: QueryDraftSchema,
      prompt: fillTemplate(queryPrompt, {
        perSection: String(perSection),
        article: JSON.stringify(toDraft(state.outline), null, 2),
      }),
      validate: (value) =>
        value.queries
          .filter((query) => !headings.has(query.section))
          .map((query) => `"${query.section}" is not a section heading of this article`),
    },
    ctx.stats,
  );

  const perHeading = new Map<string, string[]>();
  for (const { section, query } of draft.queries) {
    const existing = perHeading.get(section) ?? [];
    const text = query.trim();
    if (existing.length < perSection && !existing.includes(text)) existing.push(text);
    perHeading.set(section, existing);
  }

  const queries: SearchQuery[] = [];
  for (const [section, texts] of perHeading) {
    for (const query of texts) {
      for (const service of ctx.search.services) {
        queries.push({ section, query, service });
      }
    }
  }

  logger.info(
    { conditionId: state.conditionId, sections: perHeading.size, queries: queries.length },
    "queries_generated",
  );

  return { ...advance(state, "QUERIES_GENERATED", state.outline), queries };
}

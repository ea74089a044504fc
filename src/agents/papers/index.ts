import logger from "../../utils/logger";
import { fillTemplate } from "../../utils/prompt";
import {
  OutlineDraftSchema,
  type AttachedPaper,
  type DocumentState,
  type Outline,
} from "../../types/article";
import {
  advance,
  applyDraft,
  draftIssues,
  knownRefs,
  toDraft,
  type StageContext,
} from "../shared/document";
import { formatAuthors } from "../../services/render/markdown";
import { paperIntegrationPrompt } from "./prompts";

export function describePaper(attached: AttachedPaper, abstractChars: number): string {
  const { paper } = attached;
  const details = [formatAuthors(paper.authors), paper.venue, paper.year]
    .filter(Boolean)
    .map((part) => String(part).replace(/\.+$/, ""))
    .join(". ");
  const abstract = paper.abstract
    ? `\n    Abstract: ${paper.abstract.replace(/\s+/g, " ").slice(0, abstractChars)}`
    : "";
  return `[${attached.ref}] ${paper.title.replace(/\.+$/, "")}. ${details}.${abstract}`;
}

/**
 * Retrieves papers for every generated query, attaches them to the section
 * that asked for them under document-unique provisional numbers, then has
 * the model cite them inline. A failed query only loses its own papers.
 */
export async function paperAgent(
  state: DocumentState,
  ctx: StageContext,
): Promise<DocumentState> {
  const outcomes = await ctx.search.searchAll(state.queries, ctx.options.resultLimit, ctx.stats);

  let nextRef = state.nextRef;
  const attachments = new Map<string, AttachedPaper[]>();
  const warnings = [...state.warnings];

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      warnings.push(
        `${outcome.query.service} query "${outcome.query.query}" for ${outcome.query.section} failed: ${outcome.error}`,
      );
      continue;
    }
    const list = attachments.get(outcome.query.section) ?? [];
    for (const paper of outcome.papers) {
      if (list.length >= ctx.options.papersPerSection) break;
      list.push({ ref: nextRef++, query: outcome.query.query, paper });
    }
    attachments.set(outcome.query.section, list);
  }

  const outline: Outline = {
    ...state.outline,
    sections: state.outline.sections.map((section) => ({
      ...section,
      papers: [...section.papers, ...(attachments.get(section.heading) ?? [])],
    })),
  };
  const attached = [...attachments.values()].reduce((sum, list) => sum + list.length, 0);
  const failed = outcomes.filter((outcome) => !outcome.ok).length;

  logger.info(
    { conditionId: state.conditionId, queries: outcomes.length, failed, attached },
    "papers_retrieved",
  );

  const next = { ...state, nextRef, warnings };

  if (attached === 0) {
    logger.warn({ conditionId: state.conditionId }, "no_papers_retrieved");
    return advance(next, "PAPERS_INTEGRATED", outline);
  }

  const paperList = outline.sections
    .filter((section) => section.papers.length > 0)
    .map(
      (section) =>
        `## ${section.heading}\n${section.papers
          .map((paper) => describePaper(paper, ctx.options.abstractChars))
          .join("\n")}`,
    )
    .join("\n\n");

  const allowed = knownRefs(outline);
  const draft = await ctx.model.generate(
    {
      name: "paper_integration",
      schema: OutlineDraftSchema,
      prompt: fillTemplate(paperIntegrationPrompt, {
        article: JSON.stringify(toDraft(outline), null, 2),
        papers: paperList,
      }),
      validate: (value) => draftIssues(outline, value, allowed),
    },
    ctx.stats,
  );

  return advance(next, "PAPERS_INTEGRATED", applyDraft(outline, draft));
}

import logger from "../../utils/logger";
import { fillTemplate } from "../../utils/prompt";
import { DataIntegrityError } from "../../utils/errors";
import { conditionTopic } from "../../services/catalog";
import { OutlineDraftSchema, type DocumentState } from "../../types/article";
import { draftIssues, type StageContext } from "../shared/document";
import { DEFAULT_SECTIONS, outlinePrompt, outlineSystemPrompt } from "./prompts";

/**
 * Outline agent: creates the article skeleton (title, subtitle and one
 * drafted section per heading) for a condition. Entry state for every run.
 */
export async function outlineAgent(
  ctx: StageContext,
  headings: readonly string[] = DEFAULT_SECTIONS,
): Promise<DocumentState> {
  const { condition } = ctx;
  const emptyOutline = {
    title: condition.name,
    subtitle: "",
    sections: headings.map((heading) => ({ heading, content: "", citations: [], papers: [] })),
  };

  const draft = await ctx.model.generate(
    {
      name: "outline",
      schema: OutlineDraftSchema,
      systemInstruction: outlineSystemPrompt,
      prompt: fillTemplate(outlinePrompt, {
        topic: conditionTopic(condition),
        category: condition.category || "General",
        tags: condition.tags.length > 0 ? condition.tags.join(", ") : "none",
        sections: headings.map((heading) => `- ${heading}`).join("\n"),
      }),
      validate: (value) => draftIssues(emptyOutline, value, new Set()),
    },
    ctx.stats,
  );

  if (draft.sections.every((section) => section.content.trim().length === 0)) {
    throw new DataIntegrityError(`Outline for ${condition.id} has no content`);
  }

  logger.info(
    { conditionId: condition.id, sections: draft.sections.length },
    "outline_generated",
  );

  return {
    conditionId: condition.id,
    stage: "OUTLINED",
    completed: ["OUTLINED"],
    outline: {
      title: draft.title,
      subtitle: draft.subtitle,
      sections: draft.sections.map((section) => ({
        heading: section.heading,
        content: section.content,
        citations: [],
        papers: [],
      })),
    },
    queries: [],
    nextRef: 1,
    stats: ctx.stats,
    warnings: [],
  };
}

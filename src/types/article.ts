import { z } from "zod";

export const STAGES = [
  "OUTLINED",
  "LOCAL_INTEGRATED",
  "QUERIES_GENERATED",
  "PAPERS_INTEGRATED",
  "FINALIZED",
] as const;

export const StageSchema = z.enum(STAGES);
export type Stage = z.infer<typeof StageSchema>;

export const SEARCH_SERVICES = ["pubmed", "semantic_scholar"] as const;
export const SearchServiceSchema = z.enum(SEARCH_SERVICES);
export type SearchService = z.infer<typeof SearchServiceSchema>;

export const ConditionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  alternativeName: z.string().optional(),
  category: z.string(),
  tags: z.array(z.string()),
});

export type Condition = z.infer<typeof ConditionSchema>;

// Shapes the model is asked to produce

export const SectionDraftSchema = z
  .object({
    heading: z.string().min(1).describe("Section heading, unchanged between stages"),
    content: z
      .string()
      .describe("Section body in Markdown. Citation markers look like [3] or [1, 4]"),
  })
  .strict();

export const OutlineDraftSchema = z
  .object({
    title: z.string().min(1).describe("Article title"),
    subtitle: z.string().describe("One-sentence subtitle"),
    sections: z.array(SectionDraftSchema).min(1),
  })
  .strict();

export type OutlineDraft = z.infer<typeof OutlineDraftSchema>;

export const QueryDraftSchema = z
  .object({
    queries: z
      .array(
        z
          .object({
            section: z.string().min(1).describe("Heading of the section the query serves"),
            query: z.string().min(1).describe("Keyword query for a biomedical literature search"),
          })
          .strict(),
      )
      .min(1),
  })
  .strict();

export type QueryDraft = z.infer<typeof QueryDraftSchema>;

// Pipeline state

export const PaperRecordSchema = z.object({
  title: z.string().min(1),
  authors: z.array(z.string().min(1)).min(1),
  year: z.number().int().optional(),
  venue: z.string().optional(),
  externalId: z.string().optional(),
  doi: z.string().optional(),
  abstract: z.string().optional(),
  url: z.string().optional(),
  citationCount: z.number().int().optional(),
  source: SearchServiceSchema,
});

export type PaperRecord = z.infer<typeof PaperRecordSchema>;

export const AttachedPaperSchema = z.object({
  ref: z.number().int().positive(),
  query: z.string(),
  paper: PaperRecordSchema,
});

export type AttachedPaper = z.infer<typeof AttachedPaperSchema>;

export const SectionSchema = z.object({
  heading: z.string().min(1),
  content: z.string(),
  citations: z.array(z.number().int().positive()),
  papers: z.array(AttachedPaperSchema),
});

export type Section = z.infer<typeof SectionSchema>;

export const OutlineSchema = z.object({
  title: z.string().min(1),
  subtitle: z.string(),
  sections: z.array(SectionSchema),
});

export type Outline = z.infer<typeof OutlineSchema>;

export const SearchQuerySchema = z.object({
  section: z.string().min(1),
  query: z.string().min(1),
  service: SearchServiceSchema,
});

export type SearchQuery = z.infer<typeof SearchQuerySchema>;

export const CitationSchema = z.object({
  number: z.number().int().positive(),
  paper: PaperRecordSchema,
  sections: z.array(z.string()).min(1),
});

export type Citation = z.infer<typeof CitationSchema>;

export const ArticleSectionSchema = z.object({
  heading: z.string().min(1),
  content: z.string(),
  citations: z.array(z.number().int().positive()),
});

export type ArticleSection = z.infer<typeof ArticleSectionSchema>;

export const ArticleSchema = z.object({
  conditionId: z.string().min(1),
  title: z.string().min(1),
  subtitle: z.string(),
  sections: z.array(ArticleSectionSchema).min(1),
  references: z.array(CitationSchema),
  stages: z.array(StageSchema),
  generatedAt: z.string().datetime(),
});

export type Article = z.infer<typeof ArticleSchema>;

export const CallStatsSchema = z.object({
  calls: z.number().int().nonnegative(),
  networkRetries: z.number().int().nonnegative(),
  repairs: z.number().int().nonnegative(),
});

export type CallStats = z.infer<typeof CallStatsSchema>;

/** Checkpointed per-condition state between stages. */
export const DocumentStateSchema = z.object({
  conditionId: z.string().min(1),
  stage: StageSchema,
  completed: z.array(StageSchema),
  outline: OutlineSchema,
  queries: z.array(SearchQuerySchema),
  nextRef: z.number().int().positive(),
  stats: CallStatsSchema,
  warnings: z.array(z.string()).default([]),
});

export type DocumentState = z.infer<typeof DocumentStateSchema>;

import { z } from "zod";
import { SEARCH_SERVICES, SearchServiceSchema } from "./types/article";
import { PROVIDER_NAMES } from "./llm/types";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const positiveIntFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const boolFromEnv = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const PipelineConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(PROVIDER_NAMES).default("google"),
    model: z.string().default("gemini-2.5-flash"),
    apiKey: optionalString,
    baseUrl: optionalString,
    temperature: z.coerce.number().min(0).max(2).default(0.3),
    maxTokens: positiveIntFromEnv(16000),
  }),
  search: z.object({
    services: z.array(SearchServiceSchema).min(1).default([...SEARCH_SERVICES]),
    resultLimit: positiveIntFromEnv(3),
    minCitationCount: intFromEnv(0),
    pubmedApiKey: optionalString,
    pubmedEmail: optionalString,
    semanticScholarApiKey: optionalString,
  }),
  concurrency: z.object({
    conditions: positiveIntFromEnv(4),
    model: positiveIntFromEnv(4),
    pubmed: positiveIntFromEnv(2),
    semantic_scholar: positiveIntFromEnv(1),
  }),
  retry: z.object({
    maxAttempts: positiveIntFromEnv(5),
    repairAttempts: intFromEnv(2),
    baseDelayMs: intFromEnv(1000),
    maxDelayMs: intFromEnv(16000),
    modelTimeoutMs: positiveIntFromEnv(120000),
    searchTimeoutMs: positiveIntFromEnv(30000),
    seed: z.coerce.number().int().optional(),
  }),
  paths: z.object({
    catalog: z.string().default("data/conditions.csv"),
    relevance: optionalString,
    output: z.string().default("output"),
  }),
  localDocsLimit: positiveIntFromEnv(5),
  saveCheckpoints: boolFromEnv(true),
  queue: z.object({
    enabled: boolFromEnv(false),
    redisUrl: z.string().default("redis://localhost:6379"),
  }),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function list(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function apiKeyFor(provider: string | undefined, env: Env): string | undefined {
  switch (provider ?? "google") {
    case "openai":
      return read(env, "OPENAI_API_KEY");
    case "anthropic":
      return read(env, "ANTHROPIC_API_KEY");
    default:
      return read(env, "GOOGLE_API_KEY");
  }
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the run configuration once at startup. The result is frozen and
 * handed to the controller; nothing below it reads process.env.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: { catalog?: string; relevance?: string; output?: string } = {},
): Readonly<PipelineConfig> {
  const config = PipelineConfigSchema.parse({
    llm: {
      provider: read(env, "LLM_PROVIDER"),
      model: read(env, "LLM_MODEL"),
      apiKey: apiKeyFor(read(env, "LLM_PROVIDER"), env),
      baseUrl: read(env, "LLM_BASE_URL"),
      temperature: read(env, "LLM_TEMPERATURE"),
      maxTokens: read(env, "LLM_MAX_TOKENS"),
    },
    search: {
      services: list(read(env, "SEARCH_SERVICES")),
      resultLimit: read(env, "SEARCH_RESULT_LIMIT"),
      minCitationCount: read(env, "MIN_CITATION_COUNT"),
      pubmedApiKey: read(env, "PUBMED_API_KEY"),
      pubmedEmail: read(env, "PUBMED_EMAIL"),
      semanticScholarApiKey: read(env, "SEMANTIC_SCHOLAR_API_KEY"),
    },
    concurrency: {
      conditions: read(env, "MAX_CONDITIONS_IN_FLIGHT"),
      model: read(env, "MODEL_CONCURRENCY"),
      pubmed: read(env, "PUBMED_CONCURRENCY"),
      semantic_scholar: read(env, "SEMANTIC_SCHOLAR_CONCURRENCY"),
    },
    retry: {
      maxAttempts: read(env, "MAX_ATTEMPTS"),
      repairAttempts: read(env, "REPAIR_ATTEMPTS"),
      baseDelayMs: read(env, "BACKOFF_BASE_MS"),
      maxDelayMs: read(env, "BACKOFF_MAX_MS"),
      modelTimeoutMs: read(env, "MODEL_TIMEOUT_MS"),
      searchTimeoutMs: read(env, "SEARCH_TIMEOUT_MS"),
      seed: read(env, "RETRY_SEED") || undefined,
    },
    paths: {
      catalog: overrides.catalog ?? read(env, "CATALOG_PATH"),
      relevance: overrides.relevance ?? read(env, "RELEVANCE_PATH"),
      output: overrides.output ?? read(env, "OUTPUT_DIR"),
    },
    localDocsLimit: read(env, "LOCAL_DOCS_LIMIT"),
    saveCheckpoints: read(env, "SAVE_CHECKPOINTS"),
    queue: {
      enabled: read(env, "USE_JOB_QUEUE"),
      redisUrl: read(env, "REDIS_URL"),
    },
  });

  return deepFreeze(config);
}

import { readFile } from "fs/promises";
import { extname } from "path";
import Papa from "papaparse";
import { z } from "zod";
import logger from "../../utils/logger";
import { ConditionSchema, type Condition } from "../../types/article";

export type Catalog = ReadonlyArray<Readonly<Condition>>;

const CsvRowSchema = z.object({
  Condition: z.string().trim().min(1),
  "Alternative Name": z.string().trim().optional(),
  Category: z.string().trim().optional(),
  Tags: z.string().optional(),
  Id: z.string().trim().optional(),
});

const JsonEntrySchema = z.object({
  id: z.string().trim().optional(),
  name: z.string().trim().min(1),
  alternativeName: z.string().trim().optional(),
  category: z.string().trim().default(""),
  tags: z.array(z.string()).default([]),
});

/** Filesystem-safe identifier derived from a condition name. */
export function slugify(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** "Name (Alternative Name)" when an alternative name exists. */
export function conditionTopic(condition: Condition): string {
  return condition.alternativeName
    ? `${condition.name} (${condition.alternativeName})`
    : condition.name;
}

export function parseCatalogCsv(text: string): Condition[] {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  if (result.errors.length > 0) {
    throw new Error(
      `CSV parsing errors: ${result.errors.map((e) => e.message).join(", ")}`,
    );
  }

  return result.data.map((row, index) => {
    const parsed = CsvRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Catalog row ${index + 2} is invalid: ${parsed.error.issues[0]?.message}`);
    }
    const { Condition: name, Category, Tags, Id } = parsed.data;
    const alternativeName = parsed.data["Alternative Name"] || undefined;
    return ConditionSchema.parse({
      id: Id || slugify(name),
      name,
      alternativeName,
      category: Category ?? "",
      tags: (Tags ?? "")
        .split(";")
        .map((tag) => tag.trim())
        .filter(Boolean),
    });
  });
}

export function parseCatalogJson(text: string): Condition[] {
  const entries = z.array(JsonEntrySchema).parse(JSON.parse(text));
  return entries.map((entry) =>
    ConditionSchema.parse({ ...entry, id: entry.id || slugify(entry.name) }),
  );
}

// Output files are named by slug; this one belongs to the run report
const RESERVED_SLUGS = new Set(["run-report"]);

/**
 * Freeze a list of conditions into the run's catalog. Ids must be unique
 * after slugging, since the slug names the condition's output files.
 */
export function buildCatalog(conditions: Condition[]): Catalog {
  const seen = new Map<string, string>();
  for (const condition of conditions) {
    const slug = slugify(condition.id);
    if (!slug || RESERVED_SLUGS.has(slug)) {
      throw new Error(`Condition id cannot name an output file: ${condition.id}`);
    }
    const previous = seen.get(slug);
    if (previous === condition.id) {
      throw new Error(`Duplicate condition id in catalog: ${condition.id}`);
    }
    if (previous !== undefined) {
      throw new Error(
        `Condition ids ${previous} and ${condition.id} share the output name ${slug}`,
      );
    }
    seen.set(slug, condition.id);
  }
  return Object.freeze(
    conditions.map((condition) =>
      Object.freeze({ ...condition, tags: [...condition.tags] }),
    ),
  );
}

export async function loadCatalog(path: string): Promise<Catalog> {
  const text = await readFile(path, "utf-8");
  const conditions =
    extname(path).toLowerCase() === ".json" ? parseCatalogJson(text) : parseCatalogCsv(text);
  const catalog = buildCatalog(conditions);
  logger.info({ path, conditions: catalog.length }, "catalog_loaded");
  return catalog;
}

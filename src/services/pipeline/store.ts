import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname, join } from "path";
import logger from "../../utils/logger";
import { errorMessage } from "../../utils/errors";
import { generateUUID } from "../../utils/uuid";
import { slugify } from "../catalog";
import { checkArticleCitations } from "../references/resolver";
import {
  ArticleSchema,
  DocumentStateSchema,
  STAGES,
  type Article,
  type DocumentState,
} from "../../types/article";

/**
 * Write through a temporary sibling and rename, so a reader only ever sees
 * the previous file or the complete new one.
 */
export async function atomicWrite(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${generateUUID()}.tmp`;
  try {
    await writeFile(tmpPath, content, "utf-8");
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  }
}

/**
 * Article and checkpoint files for one output directory.
 *
 * Layout:
 *   <out>/<slug>.json          finalized Article (commit marker)
 *   <out>/<slug>.md            Markdown rendering
 *   <out>/<slug>/checkpoints/  per-stage DocumentState while a run is open
 *   <out>/run-report.json      last run report
 */
export class ArticleStore {
  constructor(readonly outputDir: string) {}

  articlePath(conditionId: string): string {
    return join(this.outputDir, `${slugify(conditionId)}.json`);
  }

  markdownPath(conditionId: string): string {
    return join(this.outputDir, `${slugify(conditionId)}.md`);
  }

  checkpointDir(conditionId: string): string {
    return join(this.outputDir, slugify(conditionId), "checkpoints");
  }

  get reportPath(): string {
    return join(this.outputDir, "run-report.json");
  }

  async loadArticle(conditionId: string): Promise<Article | null> {
    const text = await readIfExists(this.articlePath(conditionId));
    if (text === null) return null;
    try {
      const parsed = ArticleSchema.safeParse(JSON.parse(text));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  /** An existing article counts only if it parses and its citations check out. */
  async hasValidArticle(conditionId: string): Promise<boolean> {
    const article = await this.loadArticle(conditionId);
    if (!article || article.conditionId !== conditionId) return false;
    const problems = checkArticleCitations(article);
    if (problems.length > 0) {
      logger.warn({ conditionId, problems: problems.slice(0, 5) }, "existing_article_invalid");
      return false;
    }
    return true;
  }

  /** Markdown first; the JSON rename is what makes the article count as done. */
  async saveArticle(article: Article, markdown: string): Promise<string> {
    const path = this.articlePath(article.conditionId);
    await atomicWrite(this.markdownPath(article.conditionId), markdown);
    await atomicWrite(path, `${JSON.stringify(article, null, 2)}\n`);
    logger.info({ conditionId: article.conditionId, path }, "article_persisted");
    return path;
  }

  async saveCheckpoint(state: DocumentState): Promise<void> {
    const path = join(this.checkpointDir(state.conditionId), `${state.stage}.json`);
    await atomicWrite(path, JSON.stringify(state));
  }

  /** Latest valid checkpoint, walking back from the furthest stage. */
  async loadCheckpoint(conditionId: string): Promise<DocumentState | null> {
    for (const stage of [...STAGES].reverse()) {
      const text = await readIfExists(join(this.checkpointDir(conditionId), `${stage}.json`));
      if (text === null) continue;
      try {
        const parsed = DocumentStateSchema.safeParse(JSON.parse(text));
        if (parsed.success && parsed.data.conditionId === conditionId && parsed.data.stage === stage) {
          return parsed.data;
        }
      } catch (error) {
        logger.warn({ conditionId, stage, error: errorMessage(error) }, "checkpoint_unreadable");
      }
    }
    return null;
  }

  async clearCheckpoints(conditionId: string): Promise<void> {
    await rm(join(this.outputDir, slugify(conditionId)), { recursive: true, force: true });
  }

  async writeReport(report: unknown): Promise<string> {
    await atomicWrite(this.reportPath, `${JSON.stringify(report, null, 2)}\n`);
    return this.reportPath;
  }
}

import type { Condition } from "../../types/article";
import type { ConditionOutcome } from "../pipeline/report";

export const ARTICLE_QUEUE_NAME = "article-generation";

export interface ArticleJobData {
  condition: Condition;
  force: boolean;
}

export type ArticleJobResult = ConditionOutcome;

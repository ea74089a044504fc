import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import logger from "../utils/logger";
import { MalformedOutputError } from "../utils/errors";
import { extractJson } from "../utils/jsonExtractor";
import type { CallStats } from "../types/article";
import type { ResilientClient } from "./retry";
import type { ChatMessage, ChatModel } from "./types";

export interface ModelSettings {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface StructuredRequest<T> {
  /** Short name used in logs, e.g. "outline". */
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  prompt: string;
  systemInstruction?: string;
  /** Extra checks on a schema-valid value; any issue triggers a repair. */
  validate?: (value: T) => string[];
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: string[] };

export function parseStructured<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  validate?: (value: T) => string[],
): ParseResult<T> {
  const extracted = extractJson(raw);
  if (!extracted) {
    return { ok: false, issues: ["Response is not valid JSON"] };
  }

  const parsed = schema.safeParse(extracted.value);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    };
  }

  const issues = validate ? validate(parsed.data) : [];
  return issues.length > 0
    ? { ok: false, issues }
    : { ok: true, value: parsed.data };
}

export function schemaInstructions(
  schema: z.ZodType<unknown, z.ZodTypeDef, unknown>,
): string {
  const jsonSchema = JSON.stringify(
    zodToJsonSchema(schema, { $refStrategy: "none" }),
    null,
    2,
  );
  return `Respond with a single JSON object that conforms to this JSON Schema. Return ONLY the JSON, no markdown, no commentary.\n\n${jsonSchema}`;
}

export function repairPrompt(issues: string[]): string {
  return [
    "The previous response was invalid:",
    ...issues.slice(0, 20).map((issue) => `- ${issue}`),
    "",
    "Return ONLY the corrected JSON object. Keep all valid content unchanged. No markdown, no code blocks.",
  ].join("\n");
}

/**
 * Model calls that must come back as schema-valid JSON.
 *
 * Network failures are retried inside ResilientClient.call. A response that
 * arrives but does not parse is fed back to the model with the validation
 * issues, up to policy.repairAttempts times.
 */
export class StructuredModel {
  constructor(
    private readonly client: ResilientClient,
    private readonly model: ChatModel,
    private readonly settings: ModelSettings,
  ) {}

  async generate<T>(request: StructuredRequest<T>, stats?: CallStats): Promise<T> {
    const { repairAttempts } = this.client.policy;
    const basePrompt: ChatMessage = {
      role: "user",
      content: `${request.prompt}\n\n${schemaInstructions(request.schema)}`,
    };
    let messages: ChatMessage[] = [basePrompt];

    for (let repair = 0; ; repair++) {
      const response = await this.client.call(
        "model",
        (signal) =>
          this.model.createChatCompletion({
            model: this.settings.model,
            temperature: this.settings.temperature,
            maxTokens: this.settings.maxTokens,
            systemInstruction: request.systemInstruction,
            messages,
            json: true,
            signal,
          }),
        { label: request.name, stats },
      );

      const result = parseStructured(response.content, request.schema, request.validate);
      if (result.ok) return result.value;

      if (repair >= repairAttempts) {
        logger.error(
          { name: request.name, repairs: repair, issues: result.issues.slice(0, 5) },
          "structured_output_invalid",
        );
        throw new MalformedOutputError(
          `${request.name} output still invalid after ${repair} repair attempts`,
          result.issues,
          response.content,
        );
      }

      if (stats) stats.repairs++;
      logger.warn(
        {
          name: request.name,
          repair: repair + 1,
          repairAttempts,
          issues: result.issues.slice(0, 5),
        },
        "structured_output_repair",
      );

      messages = [
        basePrompt,
        { role: "assistant", content: response.content },
        { role: "user", content: repairPrompt(result.issues) },
      ];
    }
  }
}

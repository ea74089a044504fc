import logger from "../utils/logger";
import {
  RetryableError,
  TerminalError,
  classifyError,
  errorMessage,
  statusOf,
} from "../utils/errors";
import type { ChatModel, LLMProvider, LLMRequest, LLMResponse } from "./types";

export abstract class LLMAdapter implements ChatModel {
  protected provider: LLMProvider;

  constructor(provider: LLMProvider) {
    this.provider = provider;
  }

  abstract createChatCompletion(request: LLMRequest): Promise<LLMResponse>;

  logDuration(method: string, durationMs: number): void {
    logger.debug(
      { provider: this.provider.name, method, durationMs },
      "llm_call_duration",
    );
  }
}

/**
 * Re-raise an SDK failure as a classified pipeline error, keeping the HTTP
 * status so the resilient client can tell rate limits from bad credentials.
 */
export function toProviderError(label: string, error: unknown): Error {
  const message = `${label} chat completion failed: ${errorMessage(error)}`;
  const status = statusOf(error);
  return classifyError(error) === "terminal"
    ? new TerminalError(message, status, { cause: error })
    : new RetryableError(message, status, { cause: error });
}

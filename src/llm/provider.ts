import { LLMAdapter } from "./adapter";
import { AnthropicAdapter } from "./adapters/anthropic";
import { GoogleAdapter } from "./adapters/google";
import { OpenAIAdapter } from "./adapters/openai";
import {
  PROVIDER_NAMES,
  type ChatModel,
  type LLMProvider,
  type LLMRequest,
  type LLMResponse,
} from "./types";

export function isProviderName(value: string): value is LLMProvider["name"] {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Creates an LLMProvider configuration from a provider name and key.
 */
export function createLLMProvider(
  providerName: string,
  apiKey: string | undefined,
  baseUrl?: string,
): LLMProvider {
  if (!isProviderName(providerName)) {
    throw new Error(`Unsupported provider: ${providerName}`);
  }

  if (!apiKey) {
    throw new Error(`${providerName.toUpperCase()}_API_KEY is not configured.`);
  }

  return baseUrl
    ? { name: providerName, apiKey, baseUrl }
    : { name: providerName, apiKey };
}

export class LLM implements ChatModel {
  private adapter: LLMAdapter;

  constructor(provider: LLMProvider) {
    this.adapter = this.createAdapter(provider);
  }

  async createChatCompletion(request: LLMRequest): Promise<LLMResponse> {
    const startTime = Date.now();
    const result = await this.adapter.createChatCompletion(request);
    this.adapter.logDuration("createChatCompletion", Date.now() - startTime);
    return result;
  }

  private createAdapter(provider: LLMProvider): LLMAdapter {
    switch (provider.name) {
      case "openai":
        return new OpenAIAdapter(provider);
      case "google":
        return new GoogleAdapter(provider);
      case "anthropic":
        return new AnthropicAdapter(provider);
    }
  }
}

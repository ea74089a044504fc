import Anthropic from "@anthropic-ai/sdk";

import { LLMAdapter, toProviderError } from "../adapter";
import type { LLMProvider, LLMRequest, LLMResponse } from "../types";

type Message = Anthropic.Messages.Message;
type TextBlock = Anthropic.Messages.TextBlock;
type MessageCreateParamsNonStreaming =
  Anthropic.Messages.MessageCreateParamsNonStreaming;

export class AnthropicAdapter extends LLMAdapter {
  private client: Anthropic;

  constructor(provider: LLMProvider) {
    super(provider);

    if (!provider.apiKey) {
      throw new Error("Anthropic provider requires an API key");
    }

    const clientOptions: ConstructorParameters<typeof Anthropic>[0] = {
      apiKey: provider.apiKey,
      timeout: 240000,
      maxRetries: 0,
    };

    if (provider.baseUrl) {
      clientOptions.baseURL = provider.baseUrl;
    }

    this.client = new Anthropic(clientOptions);
  }

  async createChatCompletion(request: LLMRequest): Promise<LLMResponse> {
    const anthropicRequest = this.transformRequest(request);

    try {
      const response = await this.client.messages.create(anthropicRequest, {
        signal: request.signal,
      });
      return this.transformResponse(response);
    } catch (error) {
      throw toProviderError("Anthropic", error);
    }
  }

  protected transformRequest(
    request: LLMRequest,
  ): MessageCreateParamsNonStreaming {
    const userAndAssistantMessages = request.messages.filter(
      (message) => message.role === "user" || message.role === "assistant",
    );

    if (userAndAssistantMessages.length === 0) {
      throw new Error(
        "Anthropic requires at least one user or assistant message in the request",
      );
    }

    const systemSegments: string[] = [];
    if (request.systemInstruction) {
      systemSegments.push(request.systemInstruction);
    }

    request.messages
      .filter((message) => message.role === "system")
      .forEach((message) => {
        if (message.content) {
          systemSegments.push(message.content);
        }
      });

    const anthropicRequest: MessageCreateParamsNonStreaming = {
      model: request.model,
      messages: userAndAssistantMessages.map((message) => ({
        role: message.role === "assistant" ? "assistant" : "user",
        content: message.content,
      })),
      max_tokens: request.maxTokens ?? 8000,
    };

    if (systemSegments.length > 0) {
      anthropicRequest.system = systemSegments.join("\n\n");
    }

    if (request.temperature !== undefined) {
      anthropicRequest.temperature = request.temperature;
    }

    return anthropicRequest;
  }

  protected transformResponse(response: Message): LLMResponse {
    const content = response.content
      .filter((block): block is TextBlock => block.type === "text")
      .map((block) => block.text.trim())
      .filter((text) => text.length > 0)
      .join("\n\n");

    return {
      content,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }
}

import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { LLMAdapter, toProviderError } from "../adapter";
import type { LLMProvider, LLMRequest, LLMResponse } from "../types";

export class OpenAIAdapter extends LLMAdapter {
  private client: OpenAI;

  constructor(provider: LLMProvider) {
    super(provider);

    if (!provider.apiKey) {
      throw new Error("OpenAI provider requires an API key");
    }

    const clientOptions: ConstructorParameters<typeof OpenAI>[0] = {
      apiKey: provider.apiKey,
      // retries are owned by the resilient client
      maxRetries: 0,
    };

    if (provider.baseUrl) {
      clientOptions.baseURL = provider.baseUrl;
    }

    this.client = new OpenAI(clientOptions);
  }

  async createChatCompletion(request: LLMRequest): Promise<LLMResponse> {
    const transformedRequest = this.transformRequest(request);

    try {
      const completion = await this.client.chat.completions.create(
        transformedRequest,
        { signal: request.signal },
      );
      return this.transformResponse(completion);
    } catch (error) {
      throw toProviderError("OpenAI", error);
    }
  }

  protected transformRequest(
    request: LLMRequest,
  ): ChatCompletionCreateParamsNonStreaming {
    const baseMessages: ChatCompletionMessageParam[] = request.messages.map(
      (message) => ({
        role: message.role,
        content: message.content,
      }),
    );

    const messages: ChatCompletionMessageParam[] = request.systemInstruction
      ? [
          { role: "system", content: request.systemInstruction },
          ...baseMessages.filter((msg) => msg.role !== "system"),
        ]
      : baseMessages;

    const openaiRequest: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages,
    };

    if (request.maxTokens !== undefined) {
      openaiRequest.max_completion_tokens = request.maxTokens;
    }

    if (request.temperature !== undefined) {
      openaiRequest.temperature = request.temperature;
    }

    if (request.json) {
      openaiRequest.response_format = { type: "json_object" };
    }

    return openaiRequest;
  }

  protected transformResponse(completion: ChatCompletion): LLMResponse {
    const content = completion.choices[0]?.message?.content ?? "";

    return {
      content,
      usage: completion.usage
        ? {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : undefined,
    };
  }
}

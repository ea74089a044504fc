import {
  GoogleGenAI,
  setDefaultBaseUrls,
  type Content,
  type GenerateContentConfig,
  type GenerateContentParameters,
  type GenerateContentResponse,
} from '@google/genai';

import { LLMAdapter, toProviderError } from '../adapter';
import type { LLMProvider, LLMRequest, LLMResponse } from '../types';
import logger from '../../utils/logger';

export class GoogleAdapter extends LLMAdapter {
  private client: GoogleGenAI;

  constructor(provider: LLMProvider) {
    super(provider);

    if (!provider.apiKey) {
      throw new Error('Google provider requires an API key');
    }

    if (provider.baseUrl) {
      setDefaultBaseUrls({ geminiUrl: provider.baseUrl });
    }

    this.client = new GoogleGenAI({ apiKey: provider.apiKey });
  }

  async createChatCompletion(request: LLMRequest): Promise<LLMResponse> {
    const parameters = this.transformRequest(request);

    try {
      const response = await this.client.models.generateContent(parameters);
      return this.transformResponse(response);
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error), model: parameters.model },
        'google_chat_completion_failed',
      );
      throw toProviderError('Google', error);
    }
  }

  protected transformRequest(request: LLMRequest): GenerateContentParameters {
    const contents = this.buildContents(request);
    if (contents.length === 0) {
      throw new Error('Google adapter requires at least one non-system message');
    }

    const config: GenerateContentConfig = {};

    const systemSegments: string[] = [];
    if (request.systemInstruction) {
      systemSegments.push(request.systemInstruction);
    }

    request.messages
      .filter((message) => message.role === 'system')
      .forEach((message) => {
        if (message.content) {
          systemSegments.push(message.content);
        }
      });

    if (systemSegments.length > 0) {
      config.systemInstruction = systemSegments.join('\n\n');
    }

    if (request.temperature !== undefined) {
      config.temperature = request.temperature;
    }

    if (request.maxTokens !== undefined) {
      config.maxOutputTokens = request.maxTokens;
    }

    if (request.json) {
      config.responseMimeType = 'application/json';
    }

    if (request.signal) {
      config.abortSignal = request.signal;
    }

    return {
      model: request.model,
      contents,
      config,
    };
  }

  private buildContents(request: LLMRequest): Content[] {
    return request.messages
      .filter((message) => message.role === 'user' || message.role === 'assistant')
      .map((message) => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      }));
  }

  protected transformResponse(response: GenerateContentResponse): LLMResponse {
    const text = (response.text ?? '').trim();
    const usage = response.usageMetadata;

    return {
      content: text,
      usage: usage
        ? {
            promptTokens: usage.promptTokenCount ?? 0,
            completionTokens: usage.candidatesTokenCount ?? 0,
            totalTokens: usage.totalTokenCount ?? 0,
          }
        : undefined,
    };
  }
}

export const PROVIDER_NAMES = ['google', 'openai', 'anthropic'] as const;

export interface LLMProvider {
  name: (typeof PROVIDER_NAMES)[number];
  apiKey: string;
  baseUrl?: string;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  messages: ChatMessage[];
  model: string;
  systemInstruction?: string;
  maxTokens?: number;
  temperature?: number;
  // Ask the provider for a JSON body where it supports it
  json?: boolean;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/** Anything that can answer a chat request. The LLM class and test doubles implement it. */
export interface ChatModel {
  createChatCompletion(request: LLMRequest): Promise<LLMResponse>;
}

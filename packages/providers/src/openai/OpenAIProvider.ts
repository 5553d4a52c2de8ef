import OpenAI from 'openai';
import { ProviderError, errorMessage } from '@orderflow/core';
import type {
  LLMGenerateOptions,
  LLMMessage,
  LLMProvider,
  LLMResponse,
  LLMTool,
} from '../base/LLMProvider.js';
import { mapFinishReason, parseToolArguments } from '../base/LLMProvider.js';

/**
 * Configuration for OpenAI provider
 */
export interface OpenAIProviderConfig {
  apiKey: string;
  /** Defaults to 'gpt-4o-mini' */
  model?: string;
  /** Custom endpoint (any OpenAI-compatible server) */
  baseURL?: string;
  organization?: string;
  maxRetries?: number;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * OpenAI provider using chat completions with function calling
 *
 * @example
 * ```typescript
 * const provider = new OpenAIProvider({ apiKey: process.env.OPENAI_API_KEY ?? '' });
 * const fallback = new LLMFallbackProvider(provider);
 * ```
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIProviderConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      organization: config.organization,
      maxRetries: config.maxRetries ?? 2,
      timeout: config.timeout ?? 30000,
    });
    this.model = config.model ?? 'gpt-4o-mini';
  }

  async generateWithTools(
    messages: LLMMessage[],
    tools: LLMTool[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    try {
      const openaiMessages: OpenAI.Chat.ChatCompletionMessageParam[] = [
        ...(options?.system ? [{ role: 'system' as const, content: options.system }] : []),
        ...messages.map((m) => ({ role: m.role, content: m.content })),
      ];

      const openaiTools: OpenAI.Chat.ChatCompletionTool[] = tools.map((t) => ({
        type: 'function' as const,
        function: {
          name: t.name,
          description: t.description,
          parameters: t.input_schema,
        },
      }));

      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: openaiMessages,
        tools: openaiTools.length > 0 ? openaiTools : undefined,
        temperature: options?.temperature ?? 1.0,
        max_tokens: options?.maxTokens,
      });

      const choice = response.choices[0];
      const message = choice?.message;
      if (!message) {
        throw new Error('No message in OpenAI response');
      }

      const toolCalls = message.tool_calls
        ?.filter((tc) => tc.type === 'function')
        .map((tc) => ({
          id: tc.id,
          name: tc.function.name,
          arguments: parseToolArguments(tc.function.arguments),
        }));

      return {
        content: message.content || undefined,
        toolCalls: toolCalls && toolCalls.length > 0 ? toolCalls : undefined,
        usage: {
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
        },
        stopReason: mapFinishReason(choice?.finish_reason),
      };
    } catch (error) {
      throw new ProviderError('openai', errorMessage(error), error);
    }
  }
}

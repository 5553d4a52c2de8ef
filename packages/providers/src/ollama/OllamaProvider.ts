import { z } from 'zod';
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
 * Configuration for Ollama provider
 */
export interface OllamaProviderConfig {
  /** Base URL for Ollama server */
  baseURL?: string;
  /** Model name (e.g., 'llama3.1:8b', 'qwen2.5:7b') */
  model: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

const OllamaResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  id: z.string().optional(),
                  function: z.object({ name: z.string(), arguments: z.unknown() }),
                })
              )
              .nullish(),
          })
          .optional(),
        finish_reason: z.string().nullish(),
      })
    )
    .default([]),
  usage: z
    .object({ prompt_tokens: z.number().optional(), completion_tokens: z.number().optional() })
    .optional(),
});

/**
 * Ollama provider for local models, over its OpenAI-compatible endpoint.
 * Requires a running Ollama instance at `baseURL`.
 *
 * @example
 * ```typescript
 * const provider = new OllamaProvider({ model: 'llama3.1:8b' });
 * ```
 */
export class OllamaProvider implements LLMProvider {
  readonly name = 'ollama';
  private baseURL: string;
  private model: string;
  private timeout: number;

  constructor(config: OllamaProviderConfig) {
    this.baseURL = config.baseURL ?? 'http://localhost:11434';
    this.model = config.model;
    this.timeout = config.timeout ?? 60000; // local inference is slow
  }

  async generateWithTools(
    messages: LLMMessage[],
    tools: LLMTool[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const requestBody = {
        model: this.model,
        messages: [
          ...(options?.system ? [{ role: 'system' as const, content: options.system }] : []),
          ...messages.map((m) => ({ role: m.role, content: m.content })),
        ],
        ...(tools.length > 0
          ? {
              tools: tools.map((t) => ({
                type: 'function' as const,
                function: { name: t.name, description: t.description, parameters: t.input_schema },
              })),
            }
          : {}),
        temperature: options?.temperature ?? 1.0,
        max_tokens: options?.maxTokens,
      };

      const response = await fetch(`${this.baseURL}/v1/chat/completions`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(requestBody),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        throw new Error(`Ollama API error (${response.status} ${response.statusText}): ${errorText}`);
      }

      const data = OllamaResponseSchema.parse(await response.json());
      const choice = data.choices[0];
      const message = choice?.message;
      if (!message) {
        throw new Error('No message in Ollama response');
      }

      const toolCalls = (message.tool_calls ?? []).map((tc) => ({
        id: tc.id || `call_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`,
        name: tc.function.name,
        arguments: parseToolArguments(tc.function.arguments),
      }));

      return {
        content: message.content || undefined,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
        usage: {
          inputTokens: data.usage?.prompt_tokens ?? 0,
          outputTokens: data.usage?.completion_tokens ?? 0,
        },
        stopReason: mapFinishReason(choice?.finish_reason),
      };
    } catch (error) {
      throw new ProviderError('ollama', errorMessage(error), error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

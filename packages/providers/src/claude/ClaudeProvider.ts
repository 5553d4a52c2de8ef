import Anthropic from '@anthropic-ai/sdk';
import { ProviderError, errorMessage } from '@orderflow/core';
import type {
  LLMGenerateOptions,
  LLMMessage,
  LLMProvider,
  LLMResponse,
  LLMTool,
  StopReason,
} from '../base/LLMProvider.js';
import { parseToolArguments } from '../base/LLMProvider.js';

/**
 * Configuration for Claude provider
 */
export interface ClaudeProviderConfig {
  apiKey: string;
  model?: string;
  maxRetries?: number;
  /** Request timeout in milliseconds */
  timeout?: number;
}

function toStopReason(value: string | null): StopReason | undefined {
  switch (value) {
    case 'end_turn':
    case 'tool_use':
    case 'max_tokens':
    case 'stop_sequence':
      return value;
    default:
      return undefined;
  }
}

/**
 * Claude (Anthropic) LLM provider implementation
 */
export class ClaudeProvider implements LLMProvider {
  readonly name = 'claude';
  private client: Anthropic;
  private model: string;

  constructor(config: ClaudeProviderConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: config.maxRetries ?? 2,
      timeout: config.timeout ?? 30000,
    });
    this.model = config.model ?? 'claude-3-5-haiku-20241022';
  }

  async generateWithTools(
    messages: LLMMessage[],
    tools: LLMTool[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: options?.maxTokens ?? 1024,
        temperature: options?.temperature ?? 1.0,
        system: options?.system,
        messages: messages.map((m) => ({
          role: m.role === 'system' ? ('user' as const) : m.role,
          content: m.content,
        })),
        ...(tools.length > 0
          ? {
              tools: tools.map((t) => ({
                name: t.name,
                description: t.description,
                input_schema: { ...t.input_schema, type: 'object' as const },
              })),
            }
          : {}),
      });

      const toolCalls = response.content
        .filter((block): block is Anthropic.ToolUseBlock => block.type === 'tool_use')
        .map((block) => ({
          id: block.id,
          name: block.name,
          arguments: parseToolArguments(block.input),
        }));

      const textBlocks = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text);

      return {
        content: textBlocks.length > 0 ? textBlocks.join('\n') : undefined,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: toStopReason(response.stop_reason),
      };
    } catch (error) {
      throw new ProviderError('claude', errorMessage(error), error);
    }
  }
}

import { z } from 'zod';

/**
 * Message in LLM conversation
 */
export interface LLMMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

/**
 * Tool definition for LLM
 */
export interface LLMTool {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

/**
 * Tool call from LLM response
 */
export interface LLMToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence';

/**
 * Response from LLM provider
 */
export interface LLMResponse {
  content?: string;
  toolCalls?: LLMToolCall[];
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  stopReason?: StopReason;
}

export interface LLMGenerateOptions {
  maxTokens?: number;
  temperature?: number;
  system?: string;
}

/**
 * LLM provider interface
 */
export interface LLMProvider {
  readonly name: string;
  generateWithTools(messages: LLMMessage[], tools: LLMTool[], options?: LLMGenerateOptions): Promise<LLMResponse>;
}

const ToolArgumentsSchema = z.record(z.unknown());

/**
 * Tool-call arguments arrive as a JSON string (OpenAI-style) or an object
 */
export function parseToolArguments(raw: unknown): Record<string, unknown> {
  const value: unknown = typeof raw === 'string' ? JSON.parse(raw || '{}') : raw;
  const parsed = ToolArgumentsSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Tool call arguments are not an object: ${String(raw)}`);
  }
  return parsed.data;
}

/**
 * OpenAI-compatible finish_reason to stop reason
 */
export function mapFinishReason(finishReason: string | null | undefined): StopReason | undefined {
  switch (finishReason) {
    case 'tool_calls':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    case 'stop':
      return 'end_turn';
    case 'content_filter':
      return 'stop_sequence';
    default:
      return undefined;
  }
}

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { FallbackExtraction, FallbackProvider, Language, Logger } from '@orderflow/core';
import { INTENTS, SIZE_CODES, errorMessage, sanitizeExtraction, silentLogger } from '@orderflow/core';
import type { LLMProvider, LLMTool } from '../base/LLMProvider.js';
import { buildExtractionPrompt, buildReplyMessage, buildReplyPrompt, INTENT_DESCRIPTIONS } from './prompts.js';

export const IntentArgumentsSchema = z.object({
  item: z.string().optional().describe('Menu item name without size or quantity words'),
  size: z.enum(SIZE_CODES).optional().describe('Size code'),
  quantity: z.number().int().positive().optional(),
  order_id: z.string().optional().describe('Order number, digits only'),
  address: z.string().optional(),
  phone: z.string().optional(),
  confidence: z.number().min(0).max(1).describe('Confidence in the chosen intent'),
});

export interface LLMFallbackProviderConfig {
  /** Defaults to 0.1 */
  temperature?: number;
  /** Defaults to 512 */
  maxTokens?: number;
  /** Used when the model omits a confidence. Defaults to 0.7. */
  defaultConfidence?: number;
  logger?: Logger;
}

/**
 * One tool per intent, all sharing the same argument schema
 */
export function buildIntentTools(): LLMTool[] {
  const inputSchema = zodToJsonSchema(IntentArgumentsSchema, { $refStrategy: 'none' }) as Record<string, unknown>;
  return INTENTS.map((intent) => ({
    name: intent,
    description: INTENT_DESCRIPTIONS[intent],
    input_schema: inputSchema,
  }));
}

/**
 * Fallback provider backed by a tool-calling LLM. Never rejects: failures are
 * logged and reported as `null`.
 */
export class LLMFallbackProvider implements FallbackProvider {
  readonly name: string;
  private readonly tools: LLMTool[];
  private readonly config: Required<Omit<LLMFallbackProviderConfig, 'logger'>>;
  private readonly logger: Logger;

  constructor(
    private readonly llm: LLMProvider,
    config: LLMFallbackProviderConfig = {}
  ) {
    this.name = `llm:${llm.name}`;
    this.tools = buildIntentTools();
    this.config = {
      temperature: config.temperature ?? 0.1,
      maxTokens: config.maxTokens ?? 512,
      defaultConfidence: config.defaultConfidence ?? 0.7,
    };
    this.logger = config.logger ?? silentLogger;
  }

  async extractIntent(text: string, language: Language): Promise<FallbackExtraction | null> {
    try {
      const response = await this.llm.generateWithTools([{ role: 'user', content: text }], this.tools, {
        system: buildExtractionPrompt(language),
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
      });

      const call = response.toolCalls?.[0];
      if (!call) {
        return { intent: null, entities: {}, confidence: 0 };
      }

      const { confidence, ...entities } = call.arguments;
      return sanitizeExtraction({
        intent: call.name,
        entities,
        confidence: typeof confidence === 'number' ? confidence : this.config.defaultConfidence,
      });
    } catch (error) {
      this.logger.warn('Intent extraction failed', { provider: this.llm.name, error: errorMessage(error) });
      return null;
    }
  }

  async generateReply(text: string, contextBlob: string, language: Language): Promise<string | null> {
    try {
      const response = await this.llm.generateWithTools(
        [{ role: 'user', content: buildReplyMessage(text, contextBlob) }],
        [],
        { system: buildReplyPrompt(language), temperature: this.config.temperature, maxTokens: this.config.maxTokens }
      );
      return response.content?.trim() || null;
    } catch (error) {
      this.logger.warn('Reply generation failed', { provider: this.llm.name, error: errorMessage(error) });
      return null;
    }
  }
}

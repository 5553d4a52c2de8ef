import { z } from 'zod';
import { INTENTS, SIZE_CODES } from '../types/index.js';
import type { Entities, FallbackExtraction, MenuItem } from '../types/index.js';
import { sizeFromToken } from '../domain/normalize.js';

export const IntentSchema = z.enum(INTENTS);

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return undefined;
    const text = String(value).trim();
    return text === '' ? undefined : text;
  });

// Providers answer "large", "L" or "Large"; normalize to a size code
const sizeField = z
  .string()
  .nullish()
  .transform((value) => {
    if (!value) return undefined;
    const upper = value.trim().toUpperCase();
    const direct = SIZE_CODES.find((code) => code === upper);
    return direct ?? sizeFromToken(value.trim()) ?? undefined;
  });

const quantityField = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined || value === '') return undefined;
    const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
  });

/**
 * Entity map as produced by an untrusted source. Unknown keys are dropped,
 * blank values removed.
 */
export const EntitiesSchema = z
  .object({
    item: optionalText,
    size: sizeField,
    quantity: quantityField,
    order_id: optionalText,
    address: optionalText,
    phone: optionalText,
  })
  .transform((raw): Entities => {
    const entities: Entities = {};
    if (raw.item !== undefined) entities.item = raw.item;
    if (raw.size !== undefined) entities.size = raw.size;
    if (raw.quantity !== undefined) entities.quantity = raw.quantity;
    if (raw.order_id !== undefined) entities.order_id = raw.order_id;
    if (raw.address !== undefined) entities.address = raw.address;
    if (raw.phone !== undefined) entities.phone = raw.phone;
    return entities;
  });

export const FallbackExtractionSchema = z
  .object({
    intent: z.string().nullish(),
    entities: z.record(z.unknown()).nullish(),
    confidence: z.number().nullish(),
  })
  .transform((raw): FallbackExtraction => {
    const intent = IntentSchema.safeParse(raw.intent);
    const entities = EntitiesSchema.safeParse(raw.entities ?? {});
    const confidence = raw.confidence ?? 0;
    return {
      intent: intent.success ? intent.data : null,
      entities: entities.success ? entities.data : {},
      confidence: Math.min(1, Math.max(0, confidence)),
    };
  });

/**
 * Coerce an untrusted extraction into the standard shape
 */
export function sanitizeExtraction(raw: unknown): FallbackExtraction | null {
  const parsed = FallbackExtractionSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export const MenuSizeSchema = z.object({
  id: z.number().int(),
  size: z.enum(SIZE_CODES),
  price: z.number().nonnegative(),
  available: z.boolean().default(true),
});

export const MenuItemSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  category: z.string().min(1),
  description: z.string().optional(),
  available: z.boolean().default(true),
  sizes: z.array(MenuSizeSchema).min(1),
});

/**
 * Validate a menu loaded from JSON or another untrusted source
 */
export function parseMenu(raw: unknown): MenuItem[] {
  return z.array(MenuItemSchema).parse(raw);
}

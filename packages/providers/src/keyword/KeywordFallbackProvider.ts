import { readFileSync } from 'node:fs';
import natural from 'natural';
import { ara, eng, removeStopwords } from 'stopword';
import { z } from 'zod';
import type { Entities, FallbackExtraction, FallbackProvider, Intent, Language } from '@orderflow/core';
import { IntentSchema, LANGUAGES } from '@orderflow/core';

const CorpusSchema = z.record(z.enum(LANGUAGES), z.record(IntentSchema, z.array(z.string())));

export type IntentCorpus = z.infer<typeof CorpusSchema>;

export interface KeywordFallbackProviderConfig {
  /** Phrase examples per language and intent; defaults to the bundled corpus */
  corpus?: IntentCorpus;
  /** Minimum TF-IDF score to accept an intent. Defaults to 0.5. */
  threshold?: number;
}

const STOPWORDS: Record<Language, string[]> = { en: eng, ar: ara };

export function loadDefaultCorpus(): IntentCorpus {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/intent-corpus.json', import.meta.url), 'utf8')
  );
  return CorpusSchema.parse(raw);
}

interface LanguageIndex {
  tfidf: natural.TfIdf;
  intents: Intent[];
}

/**
 * Offline fallback: TF-IDF similarity against example phrases per intent.
 * Has no generative reply.
 */
export class KeywordFallbackProvider implements FallbackProvider {
  readonly name = 'keyword';
  private readonly indexes = new Map<Language, LanguageIndex>();
  private readonly threshold: number;
  private readonly tokenizer = new natural.WordTokenizer();

  constructor(config: KeywordFallbackProviderConfig = {}) {
    this.threshold = config.threshold ?? 0.5;
    const corpus = config.corpus ?? loadDefaultCorpus();

    for (const language of LANGUAGES) {
      const tfidf = new natural.TfIdf();
      const intents: Intent[] = [];
      for (const [intent, phrases] of Object.entries(corpus[language] ?? {})) {
        const parsed = IntentSchema.safeParse(intent);
        if (!parsed.success || !phrases || phrases.length === 0) continue;
        tfidf.addDocument(this.tokenize(phrases.join(' '), language));
        intents.push(parsed.data);
      }
      this.indexes.set(language, { tfidf, intents });
    }
  }

  async extractIntent(text: string, language: Language): Promise<FallbackExtraction | null> {
    const index = this.indexes.get(language);
    const tokens = this.tokenize(text, language);
    if (!index || tokens.length === 0) {
      return { intent: null, entities: {}, confidence: 0 };
    }

    const scores: Array<{ intent: Intent; score: number }> = [];
    index.tfidf.tfidfs(tokens, (i, score) => {
      const intent = index.intents[i];
      if (intent && score > 0) {
        scores.push({ intent, score });
      }
    });
    scores.sort((a, b) => b.score - a.score);

    const [winner] = scores;
    if (!winner || winner.score < this.threshold) {
      return { intent: null, entities: {}, confidence: 0 };
    }

    return {
      intent: winner.intent,
      entities: extractEntities(winner.intent, text),
      confidence: Math.min(0.9, winner.score / (winner.score + 1)),
    };
  }

  async generateReply(): Promise<string | null> {
    return null;
  }

  private tokenize(text: string, language: Language): string[] {
    const lowered = text.toLowerCase();
    const tokens =
      language === 'en'
        ? this.tokenizer.tokenize(lowered)
        : lowered.split(/[^\p{L}\p{N}]+/u).filter(Boolean);
    return removeStopwords(tokens, STOPWORDS[language]);
  }
}

function extractEntities(intent: Intent, text: string): Entities {
  const digits = /\d+/.exec(text)?.[0];
  return intent === 'track_order' && digits ? { order_id: digits } : {};
}

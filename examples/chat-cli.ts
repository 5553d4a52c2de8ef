/**
 * Interactive ordering session in the terminal
 *
 * Usage:
 *   npm run chat
 *   LLM_PROVIDER=keyword npm run chat
 *   LLM_PROVIDER=ollama LLM_MODEL=llama3.1:8b npm run chat
 */

import { readFileSync } from 'node:fs';
import { createInterface } from 'node:readline/promises';
import {
  InMemoryOrderingStore,
  createLogger,
  createOrderAssistant,
  errorMessage,
  loadConfig,
  parseMenu,
} from '@orderflow/core';
import { HybridExtractor } from '@orderflow/extractors';
import { createFallbackProvider } from '@orderflow/providers';

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL });

  const menu = parseMenu(JSON.parse(readFileSync(new URL('./menu.json', import.meta.url), 'utf8')));
  const store = new InMemoryOrderingStore({ menu });
  const fallback = createFallbackProvider(config, logger);

  const assistant = createOrderAssistant({
    store,
    extractor: new HybridExtractor({
      fallback,
      defaultLanguage: config.DEFAULT_LANGUAGE,
      logger: logger.child('extractor'),
    }),
    fallbackProvider: fallback,
    settings: config,
    logger,
  });

  console.log(`🍕 Ordering assistant (fallback: ${fallback?.name ?? 'none'})`);
  console.log("Type a message, or 'quit' to exit.\n");

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const text = (await rl.question('> ')).trim();
      if (text === 'quit' || text === 'exit') break;
      if (!text) continue;

      const response = await assistant.processMessage('cli-user', text);
      console.log(`\n${response.reply}`);
      if (response.suggestedActions.length > 0) {
        console.log(`\n💡 ${response.suggestedActions.join(' | ')}`);
      }
      console.log(`   [${response.intent ?? 'no intent'} via ${response.source}, ${response.duration}ms]\n`);
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Chat failed:', errorMessage(error));
  process.exit(1);
});

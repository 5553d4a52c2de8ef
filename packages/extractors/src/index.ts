export { detectLanguage } from './language.js';
export { INTENT_PATTERNS, flattenRules } from './pattern/rules.js';
export type { IntentPatterns, PatternRule } from './pattern/rules.js';
export { MultiItemParser } from './pattern/MultiItemParser.js';
export { PatternMatcher } from './pattern/PatternMatcher.js';
export type { PatternMatcherConfig } from './pattern/PatternMatcher.js';
export { HybridExtractor } from './HybridExtractor.js';
export type { HybridExtractorConfig } from './HybridExtractor.js';

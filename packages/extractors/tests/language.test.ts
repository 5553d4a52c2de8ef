import { describe, it, expect } from 'vitest';
import { detectLanguage } from '../src/language.js';

describe('detectLanguage', () => {
  it('should pick Arabic when any Arabic letter appears', () => {
    expect(detectLanguage('عايز بيتزا')).toBe('ar');
    expect(detectLanguage('add 2 بيتزا')).toBe('ar');
  });

  it('should use the fallback otherwise', () => {
    expect(detectLanguage('add cola')).toBe('en');
    expect(detectLanguage('123', 'ar')).toBe('ar');
  });
});

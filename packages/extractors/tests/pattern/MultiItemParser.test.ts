import { describe, it, expect } from 'vitest';
import { MultiItemParser } from '../../src/pattern/MultiItemParser.js';

describe('MultiItemParser', () => {
  const parser = new MultiItemParser();

  describe('isMultiItem', () => {
    it('should detect two number-led items', () => {
      expect(parser.isMultiItem('1 fries 2 cola', 'en')).toBe(true);
    });

    it('should detect separated items', () => {
      expect(parser.isMultiItem('fries and cola', 'en')).toBe(true);
      expect(parser.isMultiItem('fries, cola', 'en')).toBe(true);
    });

    it('should not treat a single item as a list', () => {
      expect(parser.isMultiItem('1 large pizza', 'en')).toBe(false);
      expect(parser.isMultiItem('fries and', 'en')).toBe(false);
    });

    it('should not split inside words', () => {
      expect(parser.isMultiItem('candy', 'en')).toBe(false);
    });
  });

  describe('parse', () => {
    it('should scan number-led items', () => {
      expect(parser.parse('1 fries 2 cola', 'en')).toEqual([
        { item: 'fries', quantity: 1, size: null },
        { item: 'cola', quantity: 2, size: null },
      ]);
    });

    it('should keep sizes with their item', () => {
      expect(parser.parse('2 large pepperoni pizza and 1 small margherita', 'en')).toEqual([
        { item: 'pepperoni pizza', quantity: 2, size: 'L' },
        { item: 'margherita', quantity: 1, size: 'S' },
      ]);
    });

    it('should default the quantity to one when splitting on separators', () => {
      expect(parser.parse('fries and cola', 'en')).toEqual([
        { item: 'fries', quantity: 1, size: null },
        { item: 'cola', quantity: 1, size: null },
      ]);
    });

    it('should read word numbers in separated parts', () => {
      expect(parser.parse('two cola, a medium pizza', 'en')).toEqual([
        { item: 'cola', quantity: 2, size: null },
        { item: 'pizza', quantity: 1, size: 'M' },
      ]);
    });

    it('should return a single item for one request', () => {
      expect(parser.parse('1 large pizza', 'en')).toEqual([{ item: 'pizza', quantity: 1, size: 'L' }]);
    });

    it('should split Arabic lists', () => {
      expect(parser.parse('بيتزا كبير و كولا', 'ar')).toEqual([
        { item: 'بيتزا', quantity: 1, size: 'L' },
        { item: 'كولا', quantity: 1, size: null },
      ]);
    });
  });
});

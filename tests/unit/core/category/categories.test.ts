/**
 * Tests for the category enumeration.
 */
import { describe, it, expect } from 'vitest';
import {
  CATEGORIES,
  CATEGORY_IDS,
  isCategory,
  parseCategory,
  categoryOfPath,
} from '../../../../src/core/category/index.js';
import { InvalidCategoryError } from '../../../../src/utils/errors.js';

describe('categories', () => {
  it('should have exactly the two categories', () => {
    expect(CATEGORY_IDS).toEqual(['how', 'why']);
    expect(CATEGORIES.how.kind).toBe('mechanics');
    expect(CATEGORIES.why.kind).toBe('mental-model');
  });

  describe('parseCategory', () => {
    it('should accept the known values', () => {
      expect(parseCategory('how')).toBe('how');
      expect(parseCategory('why')).toBe('why');
    });

    it.each(['', 'HOW', 'what', 'how ', 'mechanics'])('should reject %j', (value) => {
      expect(() => parseCategory(value)).toThrow(InvalidCategoryError);
      expect(() => parseCategory(value)).toThrow("TYPE must be 'how' or 'why'");
    });
  });

  describe('isCategory', () => {
    it('should narrow strings', () => {
      expect(isCategory('why')).toBe(true);
      expect(isCategory('why/')).toBe(false);
    });
  });

  describe('categoryOfPath', () => {
    it('should infer the category from the directory', () => {
      expect(categoryOfPath('how/git.md')).toBe('how');
      expect(categoryOfPath('why/naming.md')).toBe('why');
    });

    it('should ignore files outside category directories', () => {
      expect(categoryOfPath('README.md')).toBeUndefined();
      expect(categoryOfPath('lessons/git.md')).toBeUndefined();
    });

    it('should only count flat markdown files', () => {
      expect(categoryOfPath('how/nested/git.md')).toBeUndefined();
      expect(categoryOfPath('how/notes.txt')).toBeUndefined();
    });

    it('should accept Windows separators', () => {
      expect(categoryOfPath('why\\naming.md')).toBe('why');
    });
  });
});

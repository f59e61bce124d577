// Merge configuration unit tests
// Tests MergeConfig validation and defaults

import { describe, it, expect } from 'vitest';
import { createMergeConfig, DEFAULT_WEIGHT } from '../../src/config.js';
import type { MergeConfigInput } from '../../src/config.js';

describe('Configuration', () => {
  describe('Valid configuration accepted', () => {
    it('should apply defaults', () => {
      const input: MergeConfigInput = {
        sources: [{ path: 'a.txt' }, { path: 'b.txt', weight: 3 }],
      };

      const config = createMergeConfig(input);

      expect(config.sources).toEqual([
        { path: 'a.txt', weight: DEFAULT_WEIGHT },
        { path: 'b.txt', weight: 3 },
      ]);
      expect(config.defaultWeight).toBe(1);
      expect(config.label).toBe(false);
      expect(config.limit).toBeUndefined();
    });

    it('should use a custom default weight for sources without one', () => {
      const config = createMergeConfig({
        sources: [{ path: 'a.txt' }, { path: 'b.txt', weight: 1 }],
        defaultWeight: 4,
        label: true,
        limit: 10,
      });

      expect(config.sources.map((source) => source.weight)).toEqual([4, 1]);
      expect(config.label).toBe(true);
      expect(config.limit).toBe(10);
    });
  });

  describe('Invalid configuration rejected', () => {
    it('should reject an empty source list', () => {
      expect(() => createMergeConfig({ sources: [] })).toThrow('At least one source is required');
    });

    it('should reject an empty path', () => {
      expect(() => createMergeConfig({ sources: [{ path: '' }] })).toThrow('Source path cannot be empty');
    });

    it('should reject a zero weight', () => {
      expect(() => createMergeConfig({ sources: [{ path: 'a.txt', weight: 0 }] })).toThrow(
        'Weight must be a positive integer'
      );
    });

    it('should reject a zero default weight', () => {
      expect(() => createMergeConfig({ sources: [{ path: 'a.txt', weight: 2 }], defaultWeight: 0 })).toThrow(
        'Weight must be a positive integer'
      );
    });

    it('should reject a non-positive limit', () => {
      expect(() => createMergeConfig({ sources: [{ path: 'a.txt' }], limit: 0 })).toThrow(
        'Limit must be a positive integer'
      );
    });
  });
});

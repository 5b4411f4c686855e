/**
 * Unit tests for the compiler specifier algebra.
 *
 * Tests expansion, compatibility, intersection and option handling.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  expandCompilerId,
  areCompilersCompatible,
  compilersIntersect,
} from '../compilers/compiler-range.js';
import { resolveCompilerOptions, DEFAULT_COMPILER_OPTIONS } from '../policies/default-options.js';

const lexicalCompare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

describe('Compiler specifier algebra', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('expandCompilerId', () => {
    it('should expand minimum version', () => {
      expect(expandCompilerId('GCC@>=10.2.0')).toEqual({ name: 'GCC', minVersion: '10.2.0' });
    });

    it('should expand exact version', () => {
      expect(expandCompilerId('AC6@6.18.0')).toEqual({
        name: 'AC6',
        minVersion: '6.18.0',
        maxVersion: '6.18.0',
      });
    });

    it('should expand name only to any version', () => {
      expect(expandCompilerId('GCC')).toEqual({ name: 'GCC', minVersion: '0.0.0' });
      expect(expandCompilerId('')).toEqual({ name: '', minVersion: '0.0.0' });
    });

    it('should expand two-sided range', () => {
      expect(expandCompilerId('GCC@5.0.0..9.0.0')).toEqual({
        name: 'GCC',
        minVersion: '5.0.0',
        maxVersion: '9.0.0',
      });
    });

    it('should use configured lowest version', () => {
      expect(expandCompilerId('IAR', { lowestVersion: '0' })).toEqual({ name: 'IAR', minVersion: '0' });
    });
  });

  describe('areCompilersCompatible', () => {
    it('should reject exact version below minimum', () => {
      expect(areCompilersCompatible('GCC@6.0.0', 'GCC@>=10.2.0')).toBe(false);
    });

    it('should accept exact version above minimum', () => {
      expect(areCompilersCompatible('GCC@>=6.0.0', 'GCC@10.2.0')).toBe(true);
    });

    it('should treat empty specifier as universally compatible', () => {
      expect(areCompilersCompatible('gcc', '')).toBe(true);
      expect(areCompilersCompatible('', 'AC6@6.18.0')).toBe(true);
      expect(areCompilersCompatible('', '')).toBe(true);
    });

    it('should reject different names', () => {
      expect(areCompilersCompatible('GCC', 'AC6')).toBe(false);
    });

    it('should reject range ending below minimum', () => {
      expect(areCompilersCompatible('GCC@5.0.0..9.0.0', 'GCC@>=10.0.0')).toBe(false);
    });

    it('should be symmetric', () => {
      const specifiers = [
        '',
        'GCC',
        'AC6',
        'GCC@6.0.0',
        'GCC@10.2.0',
        'GCC@>=6.0.0',
        'GCC@>=10.2.0',
        'GCC@5.0.0..9.0.0',
      ];
      for (const a of specifiers) {
        for (const b of specifiers) {
          expect(areCompilersCompatible(a, b)).toBe(areCompilersCompatible(b, a));
        }
      }
    });

    it('should reject inverted range', () => {
      expect(areCompilersCompatible('GCC@9.0.0..5.0.0', 'GCC')).toBe(false);
      expect(areCompilersCompatible('GCC', 'GCC@9.0.0..5.0.0')).toBe(false);
    });

    it('should compare long version segments exactly', () => {
      expect(areCompilersCompatible('GCC@1.9007199254740992', 'GCC@>=1.9007199254740993')).toBe(false);
    });

    it('should use injected comparator', () => {
      expect(areCompilersCompatible('GCC@10.0.0', 'GCC@>=9.0.0')).toBe(true);
      expect(
        areCompilersCompatible('GCC@10.0.0', 'GCC@>=9.0.0', { compareVersions: lexicalCompare })
      ).toBe(false);
    });
  });

  describe('compilersIntersect', () => {
    it('should return empty string for two empty inputs', () => {
      expect(compilersIntersect('', '')).toBe('');
    });

    it('should narrow any version to minimum version', () => {
      expect(compilersIntersect('GCC', 'GCC@>=10.2.0')).toBe('GCC@>=10.2.0');
    });

    it('should keep name when other side is empty', () => {
      expect(compilersIntersect('GCC', '')).toBe('GCC');
      expect(compilersIntersect('', 'GCC')).toBe('GCC');
    });

    it('should pick the greater minimum', () => {
      expect(compilersIntersect('GCC@>=6.0.0', 'GCC@>=8.0.0')).toBe('GCC@>=8.0.0');
      expect(compilersIntersect('GCC@>=8.0.0', 'GCC@>=6.0.0')).toBe('GCC@>=8.0.0');
    });

    it('should resolve minimum and exact to exact', () => {
      expect(compilersIntersect('GCC@>=6.0.0', 'GCC@10.2.0')).toBe('GCC@10.2.0');
      expect(compilersIntersect('GCC@10.2.0', 'GCC@>=6.0.0')).toBe('GCC@10.2.0');
    });

    it('should treat equal-precedence versions as exact', () => {
      expect(compilersIntersect('GCC@1.2', 'GCC@1.2.0')).toBe('GCC@1.2');
    });

    it('should return empty string for incompatible inputs', () => {
      expect(compilersIntersect('GCC@6.0.0', 'GCC@>=10.2.0')).toBe('');
      expect(compilersIntersect('GCC', 'AC6')).toBe('');
    });

    it('should fold many specifiers pairwise', () => {
      const merged = ['GCC', 'GCC@>=6.0.0', '', 'GCC@>=8.1.0'].reduce(
        (acc, specifier) => compilersIntersect(acc, specifier),
        ''
      );
      expect(merged).toBe('GCC@>=8.1.0');
    });

    it('should commute for every pair of specifiers', () => {
      const options = { rangeEncoding: 'bounded' } as const;
      const specifiers = [
        '',
        'GCC',
        'AC6',
        'GCC@6.0.0',
        'GCC@10.2.0',
        'GCC@>=6.0.0',
        'GCC@>=10.2.0',
        'GCC@5.0.0..9.0.0',
        'GCC@6.0.0..12.0.0',
      ];
      for (const a of specifiers) {
        for (const b of specifiers) {
          const ab = compilersIntersect(a, b, options);
          const ba = compilersIntersect(b, a, options);
          expect(ab === '').toBe(ba === '');
          if (ab && ba) {
            expect(expandCompilerId(ab)).toEqual(expandCompilerId(ba));
          }
        }
      }
    });

    it('should return empty string for inverted range', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      expect(compilersIntersect('GCC@9.0.0..5.0.0', 'GCC')).toBe('');
      expect(compilersIntersect('GCC@9.0.0..5.0.0', 'GCC', { rangeEncoding: 'bounded' })).toBe('');
      expect(compilersIntersect('GCC@9.0.0..5.0.0', '', { rangeEncoding: 'bounded' })).toBe('');
      expect(warn).not.toHaveBeenCalled();
    });

    describe('two-sided ranges', () => {
      it('should drop two-sided result under exact-only encoding and warn', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        expect(compilersIntersect('GCC@5.0.0..9.0.0', 'GCC@>=6.0.0')).toBe('');
        expect(warn).toHaveBeenCalledTimes(1);
      });

      it('should write two-sided result under bounded encoding', () => {
        const options = { rangeEncoding: 'bounded' } as const;

        expect(compilersIntersect('GCC@5.0.0..9.0.0', 'GCC@>=6.0.0', options)).toBe('GCC@6.0.0..9.0.0');
        expect(compilersIntersect('GCC@>=6.0.0', 'GCC@5.0.0..9.0.0', options)).toBe('GCC@6.0.0..9.0.0');
        expect(compilersIntersect('GCC@5.0.0..9.0.0', 'GCC@6.0.0..12.0.0', options)).toBe('GCC@6.0.0..9.0.0');
      });

      it('should read back bounded output', () => {
        const result = compilersIntersect('GCC@5.0.0..9.0.0', 'GCC@>=6.0.0', { rangeEncoding: 'bounded' });

        expect(expandCompilerId(result)).toEqual({
          name: 'GCC',
          minVersion: '6.0.0',
          maxVersion: '9.0.0',
        });
      });
    });
  });

  describe('resolveCompilerOptions', () => {
    it('should fall back to defaults', () => {
      const options = resolveCompilerOptions();

      expect(options.lowestVersion).toBe('0.0.0');
      expect(options.rangeEncoding).toBe('exact-only');
      expect(options.compareVersions).toBe(DEFAULT_COMPILER_OPTIONS.compareVersions);
    });

    it('should reject empty lowest version', () => {
      expect(() => expandCompilerId('GCC', { lowestVersion: '' })).toThrow();
    });

    it('should keep defaults frozen', () => {
      expect(Object.isFrozen(DEFAULT_COMPILER_OPTIONS)).toBe(true);
    });
  });
});

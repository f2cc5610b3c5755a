/**
 * @fileoverview Unit tests for directive parsing and caching
 */

import {
  DirectiveCache,
  INLINE,
  MalformedDirectiveError,
  parseDirective,
  PLAIN,
  PRIVATE,
} from '../../../src';

describe('Directive Parser', () => {
  describe('parseDirective', () => {
    it('should return null for an absent annotation', () => {
      expect(parseDirective(undefined)).toBeNull();
    });

    it('should parse the reserved forms', () => {
      expect(parseDirective('')).toBe(PLAIN);
      expect(parseDirective('inline')).toBe(INLINE);
      expect(parseDirective('private')).toBe(PRIVATE);
    });

    it('should parse any other value as a name', () => {
      expect(parseDirective('db')).toEqual({ kind: 'named', name: 'db' });
    });

    it('should keep only the first comma segment', () => {
      expect(parseDirective('db,optional,lazy')).toEqual({ kind: 'named', name: 'db' });
    });

    it('should trim the name', () => {
      expect(parseDirective(' db , optional')).toEqual({ kind: 'named', name: 'db' });
    });

    it('should unquote a quoted name', () => {
      expect(parseDirective('"primary db"')).toEqual({ kind: 'named', name: 'primary db' });
    });

    it('should reject a dangling delimiter', () => {
      expect(() => parseDirective(',optional')).toThrowGraphError('MALFORMED_DIRECTIVE');
      expect(() => parseDirective(',optional')).toThrow(
        'unexpected directive format `,optional`: dangling delimiter',
      );
    });

    it('should reject a blank annotation', () => {
      expect(() => parseDirective('   ')).toThrow(
        'unexpected directive format `   `: no value',
      );
    });

    it('should reject an unterminated quote', () => {
      expect(() => parseDirective('"db')).toThrowErrorType(MalformedDirectiveError);
      expect(() => parseDirective('"')).toThrow('unterminated quoted value');
    });

    it('should reject a stray quote', () => {
      expect(() => parseDirective('d"b')).toThrow('stray quote');
    });

    it('should reject an empty quoted name', () => {
      expect(() => parseDirective('""')).toThrow('no value');
    });
  });

  describe('DirectiveCache', () => {
    it('should return the same parsed directive for identical annotations', () => {
      const cache = new DirectiveCache();

      const first = cache.parse('db,optional');
      const second = cache.parse('db,optional');

      expect(first).toBe(second);
      expect(cache.size).toBe(1);
    });

    it('should keep distinct entries for distinct annotations', () => {
      const cache = new DirectiveCache();

      cache.parse('db');
      cache.parse('db,optional');
      cache.parse('');

      expect(cache.size).toBe(3);
    });

    it('should not cache absent annotations', () => {
      const cache = new DirectiveCache();

      expect(cache.parse(undefined)).toBeNull();
      expect(cache.size).toBe(0);
    });

    it('should not cache failures', () => {
      const cache = new DirectiveCache();

      expect(() => cache.parse(',x')).toThrowErrorType(MalformedDirectiveError);
      expect(cache.size).toBe(0);
    });
  });
});

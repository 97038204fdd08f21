import { describe, it, expect } from 'vitest';
import { isRowbindError } from '@rowbind/core';
import { CsvTokenizer } from '../../../src/infrastructure/CsvTokenizer.js';

describe('CsvTokenizer', () => {
  const tokenizer = new CsvTokenizer();

  describe('parse()', () => {
    it('should split text into rows of string cells', () => {
      expect(tokenizer.parse('name,age\nAnn,31\n')).toEqual([
        ['name', 'age'],
        ['Ann', '31'],
      ]);
    });

    it('should unquote fields with delimiters and escaped quotes', () => {
      expect(tokenizer.parse('name,bio\n"Doe, Jane","said ""hi"""\n')).toEqual([
        ['name', 'bio'],
        ['Doe, Jane', 'said "hi"'],
      ]);
    });

    it('should accept CRLF line endings', () => {
      expect(tokenizer.parse('a,b\r\n1,2\r\n')).toEqual([
        ['a', 'b'],
        ['1', '2'],
      ]);
    });

    it('should skip blank lines', () => {
      expect(tokenizer.parse('a\n\n1\n\n')).toEqual([['a'], ['1']]);
    });

    it('should keep rows of uneven length', () => {
      expect(tokenizer.parse('a,b,c\n1\n')).toEqual([['a', 'b', 'c'], ['1']]);
    });

    it('should return no rows for empty text', () => {
      expect(tokenizer.parse('')).toEqual([]);
    });

    it('should fail with SOURCE_READ_ERROR on an unterminated quote', () => {
      let error: unknown;
      try {
        tokenizer.parse('a,b\n"oops,1\n');
      } catch (caught) {
        error = caught;
      }

      expect(isRowbindError(error, 'SOURCE_READ_ERROR')).toBe(true);
      expect(error instanceof Error ? error.message : '').toMatch(/MissingQuotes/);
    });
  });

  describe('serialize()', () => {
    it('should join rows with LF and end with a newline', () => {
      expect(
        tokenizer.serialize([
          ['name', 'active'],
          ['Ann', 'true'],
        ]),
      ).toBe('name,active\nAnn,true\n');
    });

    it('should quote cells that need it', () => {
      expect(tokenizer.serialize([['name'], ['Doe, Jane'], ['say "hi"']])).toBe('name\n"Doe, Jane"\n"say ""hi"""\n');
    });

    it('should write a lone header row', () => {
      expect(tokenizer.serialize([['name', 'active']])).toBe('name,active\n');
    });

    it('should write nothing for no rows', () => {
      expect(tokenizer.serialize([])).toBe('');
    });

    it('should read back what it wrote', () => {
      const rows = [
        ['label', 'note'],
        [' padded ', 'line\nbreak'],
      ];
      expect(tokenizer.parse(tokenizer.serialize(rows))).toEqual(rows);
    });
  });
});

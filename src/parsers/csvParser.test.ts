import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { detectDelimiter, parseDelimitedText, resolveDelimiter } from './csvParser';

describe('csvParser', () => {
  describe('parseDelimitedText', () => {
    it('should split the header from the data rows', () => {
      const table = parseDelimitedText('id,name\n1,Jane\n2,John\n');

      expect(table?.headers).toEqual(['id', 'name']);
      expect(table?.rows).toEqual([
        ['1', 'Jane'],
        ['2', 'John'],
      ]);
      expect(table?.headerMap.get('name')).toBe(1);
    });

    it('should return null when there are no records', () => {
      expect(parseDelimitedText('\n\n')).toBeNull();
    });

    it('should keep ragged rows as they are', () => {
      const table = parseDelimitedText('a,b,c\n1\n1,2,3,4\n');

      expect(table?.rows).toEqual([['1'], ['1', '2', '3', '4']]);
    });

    it('should map a duplicated header name to its last position', () => {
      const table = parseDelimitedText('id,name,id\n1,Jane,2\n');

      expect(table?.headerMap.get('id')).toBe(2);
    });

    it('should keep cell whitespace for the caller to trim', () => {
      const table = parseDelimitedText('a;b\n 1 ; x\n', ';');

      expect(table?.rows).toEqual([[' 1 ', ' x']]);
    });

    it('should throw on an unterminated quote', () => {
      expect(() => parseDelimitedText('a\n"open\n')).toThrow();
    });
  });

  describe('detectDelimiter', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-detect-test-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    const write = (name: string, content: string | Buffer): string => {
      const filePath = path.join(tmpDir, name);
      fs.writeFileSync(filePath, content);
      return filePath;
    };

    it('should detect tabs in a txt export', () => {
      expect(detectDelimiter(write('export.txt', 'id\tname\tcity\n1\tJane\tParis\n'))).toBe('\t');
    });

    it('should prefer tabs when they tie with commas', () => {
      expect(detectDelimiter(write('mixed.txt', 'id\tname,city\n'))).toBe('\t');
    });

    it('should detect semicolons when there are no commas', () => {
      expect(detectDelimiter(write('data.csv', 'id;name\n1;Jane\n'))).toBe(';');
    });

    it('should only look at the first line', () => {
      expect(detectDelimiter(write('data.csv', 'id,name\n1\tJane\t\t\n'))).toBe(',');
    });

    it('should default to commas', () => {
      expect(detectDelimiter(write('data.csv', 'id,name\n'))).toBe(',');
      expect(detectDelimiter(write('single.csv', 'id\n1\n'))).toBe(',');
    });

    it('should ignore a byte order mark', () => {
      expect(detectDelimiter(write('bom.csv', '\uFEFFid;name\n'))).toBe(';');
    });

    it('should decode the sample under the given encoding', () => {
      // Each U+062C code unit carries a 0x2C (comma) byte in UTF-16LE
      const filePath = write('wide.txt', Buffer.from('\u062C\u062C\u062C\tname\n', 'utf16le'));

      expect(detectDelimiter(filePath, 'utf-16le')).toBe('\t');
      expect(detectDelimiter(filePath)).toBe(',');
    });

    it('should fall back to commas for an unreadable path or unknown encoding', () => {
      expect(detectDelimiter(path.join(tmpDir, 'missing.csv'))).toBe(',');
      expect(detectDelimiter(write('data.txt', 'a\tb\n'), 'not-a-charset')).toBe(',');
    });

    it('should resolve delimiter names', () => {
      const filePath = write('data.txt', 'a\tb\n');

      expect(resolveDelimiter(filePath, undefined)).toBe(',');
      expect(resolveDelimiter(filePath, 'auto')).toBe('\t');
      expect(resolveDelimiter(filePath, 'tab')).toBe('\t');
      expect(resolveDelimiter(filePath, '|')).toBe('|');
    });

    it('should pass the encoding through when resolving auto', () => {
      const filePath = write('wide.txt', Buffer.from('\u062C\u062C\tb\n', 'utf16le'));

      expect(resolveDelimiter(filePath, 'auto', 'utf-16le')).toBe('\t');
      expect(resolveDelimiter(filePath, 'auto')).toBe(',');
    });
  });
});

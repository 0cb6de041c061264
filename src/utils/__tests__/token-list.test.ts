import { describe, it, expect } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseCommaList, parseTokenList, readTokenFile, shortId } from '../token-list.js';

describe('token list utilities', () => {
  describe('parseTokenList', () => {
    it('should skip blank lines, comments and duplicates', () => {
      const contents = '# watched tokens\r\nMINT_A\n\n  MINT_B  \nMINT_A\n';
      expect(parseTokenList(contents)).toEqual(['MINT_A', 'MINT_B']);
    });

    it('should keep case as written', () => {
      expect(parseTokenList('mint_a\nMINT_A')).toEqual(['mint_a', 'MINT_A']);
    });
  });

  describe('parseCommaList', () => {
    it('should split, trim and dedupe', () => {
      expect(parseCommaList(' MINT_A, MINT_B ,,MINT_A')).toEqual(['MINT_A', 'MINT_B']);
    });

    it('should return an empty list for missing values', () => {
      expect(parseCommaList(undefined)).toEqual([]);
      expect(parseCommaList('')).toEqual([]);
    });
  });

  describe('readTokenFile', () => {
    it('should read tokens from disk', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'token-list-'));
      try {
        const path = join(dir, 'tokens.txt');
        await writeFile(path, 'MINT_A\nMINT_B\n');
        await expect(readTokenFile(path)).resolves.toEqual(['MINT_A', 'MINT_B']);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('should treat a missing file as empty', async () => {
      await expect(readTokenFile(join(tmpdir(), 'does-not-exist', 'tokens.txt'))).resolves.toEqual([]);
    });
  });

  describe('shortId', () => {
    it('should shorten long ids to 8 characters', () => {
      expect(shortId('ABCDEFGHIJKL')).toBe('ABCDEFGH...');
      expect(shortId('SHORT')).toBe('SHORT');
    });
  });
});

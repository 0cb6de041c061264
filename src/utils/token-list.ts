/**
 * Token list parsing for seed lists and token files
 */

import { readFile } from 'fs/promises';
import type { TopicId } from '../types/feed.js';

/**
 * Parse newline-separated token file contents.
 * Blank lines and lines starting with `#` are skipped; duplicates collapse.
 */
export function parseTokenList(contents: string): TopicId[] {
  const tokens = new Set<TopicId>();
  for (const line of contents.split(/\r?\n/)) {
    const token = line.trim();
    if (token.length === 0 || token.startsWith('#')) {
      continue;
    }
    tokens.add(token);
  }
  return Array.from(tokens);
}

/**
 * Parse a comma-separated list such as the SEED_TOKENS variable
 */
export function parseCommaList(value: string | undefined): TopicId[] {
  if (!value) {
    return [];
  }
  return Array.from(new Set(value.split(',').map(t => t.trim()).filter(t => t.length > 0)));
}

/**
 * Read a token file; a missing file is an empty list
 */
export async function readTokenFile(path: string): Promise<TopicId[]> {
  try {
    return parseTokenList(await readFile(path, 'utf8'));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function shortId(topic: TopicId): string {
  return topic.length > 8 ? `${topic.substring(0, 8)}...` : topic;
}

/**
 * Retry-once policy for assistant searches: when the first search comes back empty,
 * search again with a reworded query, and stop after MAX_SEARCH_ATTEMPTS.
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { MAX_SEARCH_ATTEMPTS } from '../constants.js';
import { info as logInfo } from '../logger.js';

const stopwordsSchema = z.record(z.string(), z.array(z.string()));

function stripAccents(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

// data/ sits at the package root: two levels above src/server, three above dist/src/server
const STOPWORD_FILES = ['../../data/stopwords.json', '../../../data/stopwords.json'];

function loadStopwords(): Set<string> {
  const file = STOPWORD_FILES.map((candidate) => new URL(candidate, import.meta.url)).find(
    (url) => existsSync(url)
  );
  if (!file) {
    throw new Error('data/stopwords.json not found');
  }
  const lists = stopwordsSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
  return new Set(Object.values(lists).flat().map((word) => stripAccents(word.toLowerCase())));
}

const STOPWORDS = loadStopwords();

/**
 * Reword a query into its keywords: punctuation and stopwords (English and Spanish,
 * compared without accents) are dropped. Returns the trimmed input when nothing remains.
 */
export function rewordQuery(query: string): string {
  const words = query
    .replace(/[¿?¡!.,;:"'()[\]{}]/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0);
  const keywords = words.filter((word) => !STOPWORDS.has(stripAccents(word.toLowerCase())));
  return keywords.length > 0 ? keywords.join(' ') : query.trim();
}

export interface SearchAttempt {
  query: string;
  result_count: number;
}

export interface RetryOutcome<Row> {
  attempts: SearchAttempt[];
  rows: Row[];
}

/**
 * Run search(query); on an empty result, run it once more with fallbackQuery (or the
 * reworded query). No second attempt is made when the reworded query is unchanged.
 */
export async function searchWithRetry<Row>(
  query: string,
  search: (query: string) => Promise<Row[]>,
  fallbackQuery?: string
): Promise<RetryOutcome<Row>> {
  const attempts: SearchAttempt[] = [];
  const candidates = [query.trim()];
  const second = fallbackQuery?.trim() || rewordQuery(query);
  if (second.toLowerCase() !== candidates[0]?.toLowerCase()) {
    candidates.push(second);
  }

  for (const candidate of candidates.slice(0, MAX_SEARCH_ATTEMPTS)) {
    const rows = await search(candidate);
    attempts.push({ query: candidate, result_count: rows.length });
    if (rows.length > 0) {
      return { attempts, rows };
    }
    logInfo(`Search returned no results for "${candidate}"`);
  }
  return { attempts, rows: [] };
}

import type { CellValue } from '../types';

export type Sex = 'male' | 'female' | 'unknown';

const FEMALE_TOKENS = new Set(['female', 'f', 'woman', 'women', 'girl']);
const MALE_TOKENS = new Set(['male', 'm', 'man', 'men', 'boy']);

function classifyValue(value: string): Sex {
  const tokens = value.toLowerCase().split(/[^a-z]+/).filter((token) => token.length > 0);
  const female = tokens.some((token) => FEMALE_TOKENS.has(token));
  const male = tokens.some((token) => MALE_TOKENS.has(token));
  if (female === male) {
    return 'unknown';
  }
  return female ? 'female' : 'male';
}

/**
 * Classifies free-text values into a sex. The first value that names
 * exactly one of the two wins; values naming both or neither are skipped.
 */
export function parseSex(values: readonly CellValue[]): Sex {
  for (const value of values) {
    if (typeof value !== 'string') {
      continue;
    }
    const sex = classifyValue(value);
    if (sex !== 'unknown') {
      return sex;
    }
  }
  return 'unknown';
}

const BARE_NUMBER = /^\d+(?:\.\d+)?$/;
const MENTIONS_AGE = /\bage\b/i;
const FIRST_NUMBER = /(\d+(?:\.\d+)?)/;

export function parseAge(values: readonly CellValue[]): number | null {
  for (const value of values) {
    if (typeof value === 'number') {
      if (Number.isFinite(value)) {
        return value;
      }
      continue;
    }
    if (value === null) {
      continue;
    }
    const trimmed = value.trim();
    if (BARE_NUMBER.test(trimmed)) {
      return Number(trimmed);
    }
    if (MENTIONS_AGE.test(trimmed)) {
      const match = FIRST_NUMBER.exec(trimmed);
      if (match) {
        return Number(match[1]);
      }
    }
  }
  return null;
}

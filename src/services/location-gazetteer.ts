// src/services/location-gazetteer.ts: validate a free-text location against a local list
import { readFile } from 'fs/promises';
import z from 'zod';
import defaultLocations from '../data/locations.json';

export type MatchKind = 'exact' | 'substring' | 'fuzzy';

export interface LocationMatch {
  location: string;
  kind: MatchKind;
  score: number;
}

const FUZZY_THRESHOLD = 0.75;

const gazetteerSchema = z.array(z.string().min(1));

export function normalizeLocation(s: string): string {
  return s
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9\s,]/g, ' ')
    .replace(/\s*,\s*/g, ',')
    .replace(/\s+/g, ' ')
    .trim();
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}

/** 1 for identical strings, 0 for nothing in common. */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
}

export async function loadGazetteer(file?: string): Promise<string[]> {
  if (!file) return [...defaultLocations];
  const raw: unknown = JSON.parse(await readFile(file, 'utf-8'));
  return gazetteerSchema.parse(raw);
}

/**
 * Exact matches (whole entry or its first component) win; otherwise entries
 * containing the input; otherwise entries whose first component is within
 * edit-distance similarity FUZZY_THRESHOLD, best first.
 */
export function matchLocations(input: string, gazetteer: readonly string[]): LocationMatch[] {
  const needle = normalizeLocation(input);
  if (!needle) return [];

  const entries = gazetteer.map((location) => {
    const normalized = normalizeLocation(location);
    return { location, normalized, head: normalized.split(',')[0] };
  });

  const exact = entries.filter((e) => e.normalized === needle || e.head === needle);
  if (exact.length > 0) return exact.map((e) => ({ location: e.location, kind: 'exact' as const, score: 1 }));

  const substring = entries.filter((e) => e.normalized.includes(needle));
  if (substring.length > 0) {
    return substring.map((e) => ({ location: e.location, kind: 'substring' as const, score: needle.length / e.normalized.length }));
  }

  return entries
    .map((e) => ({ location: e.location, kind: 'fuzzy' as const, score: similarity(needle, e.head) }))
    .filter((m) => m.score >= FUZZY_THRESHOLD)
    .sort((a, b) => b.score - a.score);
}

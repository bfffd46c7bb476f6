import { SearchReplyShapeError } from '../../../utils/errors';
import type { SearchHit, SearchReply } from './types';

const WRAPPER_KEYS = ['web', 'data', 'results', 'organic_results'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isRecord(value)) {
    const keys = Object.keys(value).slice(0, 5);
    return keys.length ? `object with keys ${keys.join(', ')}` : 'empty object';
  }
  return typeof value;
}

/** Tags a raw provider body with the shape it has. */
export function describeSearchReply(raw: unknown): SearchReply {
  if (Array.isArray(raw)) return { kind: 'list', items: raw };

  if (isRecord(raw)) {
    for (const key of WRAPPER_KEYS) {
      const value = raw[key];
      if (Array.isArray(value)) return { kind: 'wrapped', key, items: value };
      // Firecrawl v2 nests the list one level deeper: { data: { web: [...] } }
      if (isRecord(value) && Array.isArray(value.web)) {
        return { kind: 'wrapped', key: `${key}.web`, items: value.web };
      }
    }
  }

  return { kind: 'invalid', reason: describeValue(raw) };
}

function toHit(item: unknown): SearchHit | null {
  if (!isRecord(item)) return null;
  const url = typeof item.url === 'string' ? item.url : typeof item.link === 'string' ? item.link : null;
  if (!url || url.trim() === '') return null;
  return typeof item.title === 'string' ? { url: url.trim(), title: item.title } : { url: url.trim() };
}

function hitsOf(reply: SearchReply): SearchHit[] {
  switch (reply.kind) {
    case 'invalid':
      throw new SearchReplyShapeError(reply.reason);
    case 'typed':
      return reply.hits;
    case 'list':
    case 'wrapped':
      return reply.items.map(toHit).filter((h): h is SearchHit => h !== null);
  }
}

/**
 * The single conversion from a search reply to an ordered, de-duplicated
 * list of hits. Throws SearchReplyShapeError for an invalid reply.
 */
export function searchReplyToHits(reply: SearchReply): SearchHit[] {
  const seen = new Set<string>();
  return hitsOf(reply).filter((hit) => {
    if (seen.has(hit.url)) return false;
    seen.add(hit.url);
    return true;
  });
}

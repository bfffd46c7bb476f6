/**
 * Shared JSON parse for model replies: strips markdown fences and retries
 * once with single quotes normalized. Throws MalformedReplyError.
 */
import { MalformedReplyError } from './errors';

export function stripJsonFences(raw: string): string {
  let txt = raw.trim();
  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

export function safeParseJson(raw: string, context: string): unknown {
  const txt = stripJsonFences(raw);
  if (txt === '') {
    throw new MalformedReplyError(`${context}: empty reply`, raw);
  }
  try {
    return JSON.parse(txt);
  } catch {
    try {
      return JSON.parse(txt.replace(/'/g, '"'));
    } catch {
      throw new MalformedReplyError(`${context}: reply is not valid JSON`, txt.slice(0, 300));
    }
  }
}

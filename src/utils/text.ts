import sanitizeHtml from 'sanitize-html';
import he from 'he';
import type { AlbumRecord } from '../types/index.js';

export class TextNormalizer {
  /** Strips markup, decodes entities and collapses whitespace. */
  static clean(text: string | undefined): string {
    if (!text) return '';

    const sanitized = sanitizeHtml(text, {
      allowedTags: [],
      allowedAttributes: {},
    });

    return he.decode(sanitized).replace(/\s+/g, ' ').trim();
  }

  static normalizeForIdentity(text: string): string {
    return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
  }

  static joinArtists(names: string[], separator: string): string {
    const seen = new Set<string>();
    const unique: string[] = [];

    for (const name of names) {
      const cleaned = TextNormalizer.clean(name);
      const key = TextNormalizer.normalizeForIdentity(cleaned);
      if (!cleaned || seen.has(key)) continue;
      seen.add(key);
      unique.push(cleaned);
    }

    return unique.join(separator);
  }

  /** Strips the parentheses a release date is usually wrapped in: "(2024)" -> "2024". */
  static stripParentheses(text: string): string {
    return text.replace(/^\s*[([]\s*/, '').replace(/\s*[)\]]\s*$/, '').trim();
  }
}

export function identityKey(record: Pick<AlbumRecord, 'artist' | 'title'>): string {
  return `${TextNormalizer.normalizeForIdentity(record.artist)}\u0000${TextNormalizer.normalizeForIdentity(record.title)}`;
}

export function parseRating(text: string | undefined): number | undefined {
  if (!text) return undefined;

  const trimmed = text.trim();
  if (!/^\d+(?:\.\d+)?$/.test(trimmed)) return undefined;

  const value = Number.parseFloat(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

export function resolveLink(href: string | undefined, baseUrl: string): string | undefined {
  const trimmed = href?.trim();
  if (!trimmed || trimmed === '#') return undefined;

  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return undefined;
  }
}

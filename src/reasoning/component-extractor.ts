/**
 * LexicalComponentExtractor: word-list heuristics standing in for real
 * linguistic analysis. Each token lands in at most one bucket; the first
 * matching rule wins (entity, relation, quantifier, modality, action).
 */

import type { ComponentExtractor, ExtractedComponents } from './types.js';

export const RELATION_WORDS: ReadonlySet<string> = new Set([
  'is', 'has', 'can', 'does', 'will', 'should', 'must',
]);

export const QUANTIFIER_WORDS: ReadonlySet<string> = new Set([
  'all', 'every', 'some', 'no', 'none',
]);

export const MODALITY_WORDS: ReadonlySet<string> = new Set([
  'possible', 'necessary', 'impossible',
]);

export const PRONOUNS: ReadonlySet<string> = new Set([
  'i', 'you', 'he', 'she', 'it', 'we', 'they',
]);

/**
 * Split on whitespace and strip leading/trailing punctuation.
 * Inner punctuation ("I'm", "x-ray") is kept.
 */
export function tokenize(text: string): string[] {
  return text
    .split(/\s+/)
    .map(t => t.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
    .filter(t => t.length > 0);
}

function isCapitalized(token: string): boolean {
  return /^\p{Lu}/u.test(token);
}

type ComponentBuckets = { -readonly [K in keyof ExtractedComponents]: string[] };

export function emptyComponents(): ComponentBuckets {
  return { entities: [], relations: [], quantifiers: [], modalities: [], actions: [] };
}

export class LexicalComponentExtractor implements ComponentExtractor {
  readonly name = 'lexical';

  extract(query: string): ExtractedComponents {
    const components = emptyComponents();

    for (const token of tokenize(query)) {
      const lower = token.toLowerCase();

      if ((isCapitalized(token) && token.length > 2) || PRONOUNS.has(lower)) {
        components.entities.push(token);
      } else if (RELATION_WORDS.has(lower)) {
        components.relations.push(lower);
      } else if (QUANTIFIER_WORDS.has(lower)) {
        components.quantifiers.push(lower);
      } else if (MODALITY_WORDS.has(lower)) {
        components.modalities.push(lower);
      } else if (lower.endsWith('ing') || lower.endsWith('ed')) {
        components.actions.push(lower);
      }
    }

    return components;
  }
}

/**
 * Controlled category vocabulary.
 *
 * Loaded from a YAML file listing canonical category names and their aliases.
 * Matching is case-insensitive and exact after whitespace normalisation.
 *
 * @module config/categories
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { UNKNOWN_CATEGORY } from '../types/catalog';

const categoryFileSchema = z.object({
  categories: z
    .array(
      z.object({
        name: z.string().min(1),
        aliases: z.array(z.string()).default([])
      })
    )
    .default([])
});

export interface CategoryDefinition {
  name: string;
  aliases?: string[];
}

const matchKey = (text: string): string => text.normalize('NFC').replace(/\s+/g, ' ').trim().toLowerCase();

export class CategoryVocabulary {
  private readonly lookup = new Map<string, string>();
  private readonly names: string[] = [];

  constructor(definitions: CategoryDefinition[]) {
    for (const definition of definitions) {
      const name = definition.name.normalize('NFC').trim();
      if (!name) {
        continue;
      }
      this.names.push(name);
      for (const label of [name, ...(definition.aliases ?? [])]) {
        const key = matchKey(label);
        // First definition wins when two categories claim the same label
        if (key && !this.lookup.has(key)) {
          this.lookup.set(key, name);
        }
      }
    }
  }

  /**
   * Map free text to a canonical category name, or "unknown".
   */
  resolve(text: string | null | undefined): string {
    if (!text) {
      return UNKNOWN_CATEGORY;
    }
    return this.lookup.get(matchKey(text)) ?? UNKNOWN_CATEGORY;
  }

  categories(): string[] {
    return [...this.names];
  }
}

export const parseCategoryVocabulary = (source: string): CategoryVocabulary => {
  const parsed = categoryFileSchema.parse(parseYaml(source) ?? {});
  return new CategoryVocabulary(parsed.categories);
};

/**
 * Load the vocabulary file. A missing file yields an empty vocabulary, so
 * every record falls back to "unknown".
 */
export const loadCategoryVocabulary = async (path: string): Promise<CategoryVocabulary> => {
  if (!existsSync(path)) {
    logger.warn('Category vocabulary not found, all categories will be unknown', { path });
    return new CategoryVocabulary([]);
  }

  const vocabulary = parseCategoryVocabulary(await readFile(path, 'utf8'));
  logger.info('Category vocabulary loaded', { path, categories: vocabulary.categories().length });
  return vocabulary;
};

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CatalogueError, describeError } from '../errors.js';

export interface Category {
  readonly name: string;
  readonly phrases: readonly string[];
}

/** Categories in rotation order. */
export type Catalogue = readonly Category[];

export interface CategoryInput {
  name: string;
  phrases: string[];
}

const catalogueFileSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string().min(1),
      phrases: z.array(z.string()),
    })
  ),
});

export const DEFAULT_CATALOGUE_PATH = fileURLToPath(
  new URL('./catalogue.json', import.meta.url)
);

/**
 * Freeze the categories into a catalogue. An empty catalogue, a category
 * without phrases or a repeated category name is rejected here so that
 * traversal never meets one.
 */
export function createCatalogue(categories: readonly CategoryInput[]): Catalogue {
  if (categories.length === 0) {
    throw new CatalogueError('Catalogue has no categories');
  }

  const seen = new Set<string>();
  const frozen = categories.map(({ name, phrases }) => {
    if (phrases.length === 0) {
      throw new CatalogueError(`Category "${name}" has no phrases`);
    }
    if (seen.has(name)) {
      throw new CatalogueError(`Category "${name}" appears more than once`);
    }
    seen.add(name);
    return Object.freeze({ name, phrases: Object.freeze([...phrases]) });
  });

  return Object.freeze(frozen);
}

export function loadCatalogue(filePath: string = DEFAULT_CATALOGUE_PATH): Catalogue {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CatalogueError(
      `Cannot read catalogue ${filePath}: ${describeError(error)}`,
      { cause: error }
    );
  }

  const parsed = catalogueFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogueError(
      `Malformed catalogue ${filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      { cause: parsed.error }
    );
  }

  return createCatalogue(parsed.data.categories);
}

export function totalPhraseCount(catalogue: Catalogue): number {
  return catalogue.reduce((sum, category) => sum + category.phrases.length, 0);
}

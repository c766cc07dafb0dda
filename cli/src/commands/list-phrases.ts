/**
 * Phrases Command
 *
 * Lists the catalogue in rotation order.
 */

import { loadConfig } from '../../../engine/config.js';
import { loadCatalogue, totalPhraseCount } from '../../../engine/phrases/catalogue.js';

interface ListPhrasesOptions {
  format: string;
}

export function listPhrases(options: ListPhrasesOptions): void {
  const catalogue = loadCatalogue(loadConfig().cataloguePath);

  if (options.format === 'json') {
    console.log(JSON.stringify({ categories: catalogue }, null, 2));
    return;
  }

  for (const category of catalogue) {
    console.log(`${category.name} (${category.phrases.length})`);
    for (const phrase of category.phrases) {
      console.log(`  ${phrase}`);
    }
  }
  console.log(`${catalogue.length} categories, ${totalPhraseCount(catalogue)} phrases`);
}

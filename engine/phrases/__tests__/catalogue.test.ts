import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  createCatalogue,
  loadCatalogue,
  totalPhraseCount,
} from '../catalogue.js';
import { CatalogueError } from '../../errors.js';

function writeTempFile(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'markoshka-catalogue-'));
  const file = join(dir, 'catalogue.json');
  writeFileSync(file, content);
  return file;
}

describe('Catalogue', () => {
  describe('createCatalogue', () => {
    it('should keep categories in insertion order', () => {
      const catalogue = createCatalogue([
        { name: 'B', phrases: ['b1'] },
        { name: 'A', phrases: ['a1', 'a2'] },
      ]);

      expect(catalogue.map(category => category.name)).toEqual(['B', 'A']);
      expect(totalPhraseCount(catalogue)).toBe(3);
    });

    it('should freeze categories and their phrases', () => {
      const input = [{ name: 'A', phrases: ['a1'] }];
      const catalogue = createCatalogue(input);
      input[0].phrases.push('added later');

      expect(Object.isFrozen(catalogue)).toBe(true);
      expect(Object.isFrozen(catalogue[0])).toBe(true);
      expect(catalogue[0].phrases).toEqual(['a1']);
    });

    it('should reject an empty catalogue', () => {
      expect(() => createCatalogue([])).toThrow(CatalogueError);
    });

    it('should reject a category without phrases', () => {
      expect(() =>
        createCatalogue([
          { name: 'A', phrases: ['a1'] },
          { name: 'Empty', phrases: [] },
        ])
      ).toThrow('Category "Empty" has no phrases');
    });

    it('should reject repeated category names', () => {
      expect(() =>
        createCatalogue([
          { name: 'A', phrases: ['a1'] },
          { name: 'A', phrases: ['a2'] },
        ])
      ).toThrow('Category "A" appears more than once');
    });
  });

  describe('loadCatalogue', () => {
    it('should load the bundled catalogue', () => {
      const catalogue = loadCatalogue();

      expect(catalogue).toHaveLength(9);
      expect(catalogue[0]).toEqual({
        name: 'Поддержка',
        phrases: ['Ты справишься!', 'Дыши глубже, все ок'],
      });
      expect(totalPhraseCount(catalogue)).toBe(12);
    });

    it('should load a catalogue from a given file', () => {
      const file = writeTempFile(
        JSON.stringify({ categories: [{ name: 'Test', phrases: ['one', 'two'] }] })
      );

      expect(loadCatalogue(file)).toEqual([{ name: 'Test', phrases: ['one', 'two'] }]);
    });

    it('should reject a file that is not JSON', () => {
      const file = writeTempFile('not json');

      expect(() => loadCatalogue(file)).toThrow(CatalogueError);
    });

    it('should reject a file with the wrong shape', () => {
      const file = writeTempFile(JSON.stringify({ categories: [{ title: 'x' }] }));

      expect(() => loadCatalogue(file)).toThrow(/^Malformed catalogue/);
    });

    it('should reject a missing file', () => {
      expect(() => loadCatalogue('/nonexistent/catalogue.json')).toThrow(
        /^Cannot read catalogue \/nonexistent\/catalogue.json/
      );
    });
  });
});

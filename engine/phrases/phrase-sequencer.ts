import type { PhraseMode } from '../control/mode.js';
import type { Catalogue, Category } from './catalogue.js';

export interface SequencerPosition {
  categoryIndex: number;
  phraseIndex: number;
}

export interface PhrasePick {
  category: Category;
  phrase: string;
}

/**
 * Cursor over the catalogue. Sequential and category modes walk it in
 * order, visiting every phrase once before repeating; random mode picks
 * a category and then a phrase uniformly and leaves the cursor alone.
 */
export class PhraseSequencer {
  private categoryIndex = 0;
  private phraseIndex = 0;

  constructor(
    private readonly catalogue: Catalogue,
    private readonly random: () => number = Math.random
  ) {}

  get position(): SequencerPosition {
    return { categoryIndex: this.categoryIndex, phraseIndex: this.phraseIndex };
  }

  get currentCategory(): Category {
    return this.catalogue[this.categoryIndex];
  }

  nextPhrase(mode: PhraseMode): PhrasePick {
    switch (mode) {
      case 'random':
        return this.pickRandom();
      case 'sequential':
      case 'category':
        // Category mode starts wherever cycleCategory pinned the cursor and
        // then carries on into the following categories.
        return this.advance();
    }
  }

  /** Move to the start of the next category, wrapping at the end. */
  jumpToNextCategory(): Category {
    this.categoryIndex = (this.categoryIndex + 1) % this.catalogue.length;
    this.phraseIndex = 0;
    return this.currentCategory;
  }

  private advance(): PhrasePick {
    const category = this.currentCategory;
    const phrase = category.phrases[this.phraseIndex];

    this.phraseIndex += 1;
    if (this.phraseIndex >= category.phrases.length) {
      this.phraseIndex = 0;
      this.categoryIndex = (this.categoryIndex + 1) % this.catalogue.length;
    }

    return { category, phrase };
  }

  private pickRandom(): PhrasePick {
    const category = this.catalogue[this.randomIndex(this.catalogue.length)];
    const phrase = category.phrases[this.randomIndex(category.phrases.length)];
    return { category, phrase };
  }

  private randomIndex(length: number): number {
    return Math.min(Math.floor(this.random() * length), length - 1);
  }
}

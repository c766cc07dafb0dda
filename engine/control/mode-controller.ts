import { logger } from '../logger.js';
import type { OverlayScheduler } from '../overlay/overlay-scheduler.js';
import type { Category } from '../phrases/catalogue.js';
import type { PhraseSequencer } from '../phrases/phrase-sequencer.js';
import type { Intent } from './intent-queue.js';
import {
  categoryLabel,
  isPhraseMode,
  modeLabel,
  nextPhraseMode,
  type Mode,
} from './mode.js';

/**
 * Owns the active mode. Every transition changes the mode and requests its
 * overlay in the same call.
 */
export class ModeController {
  private current: Mode = 'sequential';
  private previous: Mode | null = null;

  constructor(
    private readonly sequencer: PhraseSequencer,
    private readonly overlays: OverlayScheduler
  ) {}

  get mode(): Mode {
    return this.current;
  }

  /** The mode weather will return to; set only while weather is active. */
  get previousMode(): Mode | null {
    return this.previous;
  }

  apply(intent: Intent): void {
    switch (intent) {
      case 'toggle-mode':
        this.toggleMode();
        break;
      case 'cycle-category':
        this.cycleCategory();
        break;
      case 'toggle-weather':
        this.toggleWeather();
        break;
    }
  }

  /** Sequential → random → category → sequential. Ignored in weather mode. */
  toggleMode(): Mode {
    if (!isPhraseMode(this.current)) {
      logger.debug('Mode button ignored while weather is shown');
      return this.current;
    }

    this.switchTo(nextPhraseMode(this.current));
    this.overlays.request(modeLabel(this.current));
    return this.current;
  }

  /** Pin the next category and switch to category mode. */
  cycleCategory(): Category {
    this.previous = null;
    this.switchTo('category');
    const category = this.sequencer.jumpToNextCategory();
    this.overlays.request(categoryLabel(category.name));
    return category;
  }

  toggleWeather(): Mode {
    if (this.current === 'weather') {
      this.switchTo(this.previous ?? 'sequential');
      this.previous = null;
    } else {
      this.previous = this.current;
      this.switchTo('weather');
    }
    this.overlays.request(modeLabel(this.current));
    return this.current;
  }

  private switchTo(mode: Mode): void {
    if (mode !== this.current) {
      logger.debug(`Mode ${this.current} -> ${mode}`);
    }
    this.current = mode;
  }
}

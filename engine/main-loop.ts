import { logger } from './logger.js';
import type { ModeController } from './control/mode-controller.js';
import type { IntentQueue } from './control/intent-queue.js';
import type { OverlayScheduler } from './overlay/overlay-scheduler.js';
import type { PhraseSequencer } from './phrases/phrase-sequencer.js';
import type { DisplayDriver } from './display/types.js';
import {
  DEFAULT_FRAME_DELAY_MS,
  showMessage,
  showStaticMessage,
} from './display/renderer.js';
import { formatWeatherSummary } from './weather/weather-summary.js';
import type { WeatherSource } from './weather/types.js';
import type { Clock } from './utils/clock.js';

export interface LoadingOptions {
  durationMs: number;
  intervalMs: number;
  readyMs: number;
}

export interface MainLoopOptions {
  /** How often fresh content is shown. */
  refreshMs: number;
  /** Poll interval for overlays, button intents and stop requests. */
  pollMs: number;
  categoryAnnouncementMs: number;
  frameDelayMs: number;
  loading: LoadingOptions;
}

export const DEFAULT_LOOP_OPTIONS: MainLoopOptions = {
  refreshMs: 5000,
  pollMs: 100,
  categoryAnnouncementMs: 5000,
  frameDelayMs: DEFAULT_FRAME_DELAY_MS,
  loading: { durationMs: 5000, intervalMs: 700, readyMs: 5000 },
};

export const LOADING_TITLE = 'Маркошка v1.0';
export const LOADING_CAPTION = 'загружается';
export const READY_MESSAGE = 'Маркошка готова!\nПоехали!';

export interface MainLoopDeps {
  driver: DisplayDriver;
  controller: ModeController;
  sequencer: PhraseSequencer;
  overlays: OverlayScheduler;
  intents: IntentQueue;
  weather: WeatherSource;
  clock: Clock;
  /** Wall-clock time for the weather screen. */
  currentDate?: () => Date;
}

/**
 * Single-threaded driver of the display. Each tick applies queued button
 * intents, shows a pending overlay, and when the refresh period has passed
 * shows the next phrase or the weather screen.
 */
export class MainLoop {
  private running = false;
  private nextContentAt = 0;
  private lastCategoryShown: string | null = null;
  private readonly options: MainLoopOptions;

  constructor(
    private readonly deps: MainLoopDeps,
    options: Partial<MainLoopOptions> = {}
  ) {
    this.options = { ...DEFAULT_LOOP_OPTIONS, ...options };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Takes effect at the next poll; the tick in progress finishes first. */
  stop(): void {
    this.running = false;
  }

  async run(): Promise<void> {
    this.running = true;
    logger.info('Display loop started');

    await this.playLoading();
    this.nextContentAt = this.deps.clock.now();
    this.lastCategoryShown = null;

    while (this.running) {
      try {
        await this.tick();
      } catch (error) {
        logger.error('Display tick failed:', error);
      }
      await this.deps.clock.sleep(this.options.pollMs);
    }

    logger.info('Display loop stopped');
  }

  async tick(): Promise<void> {
    for (const intent of this.deps.intents.drain()) {
      this.deps.controller.apply(intent);
    }

    // Blocks for the overlay hold time
    await this.deps.overlays.showOverlayIfPending();

    if (this.deps.clock.now() < this.nextContentAt) {
      return;
    }

    await this.showContent();
    this.nextContentAt = this.deps.clock.now() + this.options.refreshMs;
  }

  /** Cosmetic boot screen: animated dots, then a ready message. */
  async playLoading(): Promise<void> {
    const { clock, driver } = this.deps;
    const { durationMs, intervalMs, readyMs } = this.options.loading;

    const start = clock.now();
    let frame = 0;
    while (this.running) {
      const remaining = durationMs - (clock.now() - start);
      if (remaining <= 0) {
        break;
      }
      const dots = '.'.repeat((frame % 3) + 1);
      showStaticMessage(driver, `${LOADING_TITLE}\n${LOADING_CAPTION}${dots}`);
      frame += 1;
      await clock.sleep(Math.min(intervalMs, remaining));
    }

    if (!this.running) {
      return;
    }
    showStaticMessage(driver, READY_MESSAGE);
    await clock.sleep(readyMs);
  }

  private async showContent(): Promise<void> {
    const { controller, driver, clock } = this.deps;
    const mode = controller.mode;

    if (mode === 'weather') {
      const reading = await this.deps.weather.fetch();
      const now = this.deps.currentDate?.() ?? new Date();
      showStaticMessage(driver, formatWeatherSummary(reading, now));
      this.lastCategoryShown = null;
      return;
    }

    const { category, phrase } = this.deps.sequencer.nextPhrase(mode);
    const showOptions = { clock, frameDelayMs: this.options.frameDelayMs };

    if (mode === 'random') {
      this.lastCategoryShown = null;
    } else if (category.name !== this.lastCategoryShown) {
      await showMessage(driver, category.name, showOptions);
      await clock.sleep(this.options.categoryAnnouncementMs);
      this.lastCategoryShown = category.name;
    }

    await showMessage(driver, phrase, showOptions);
  }
}

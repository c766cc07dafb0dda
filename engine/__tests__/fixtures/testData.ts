import type { Clock } from '../../utils/clock.js';
import type { ButtonInput, LineValue } from '../../buttons/button-manager.js';
import { createCatalogue, type Catalogue } from '../../phrases/catalogue.js';

/** Clock whose sleep advances time instantly and records every wait. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function createTestCatalogue(): Catalogue {
  return createCatalogue([
    { name: 'Support', phrases: ['You can do it', 'Breathe'] },
    { name: 'Humor', phrases: ['Coffee is coming'] },
    { name: 'Rest', phrases: ['Stretch', 'Blink', 'Sip water'] },
  ]);
}

type WatchCallback = (error: Error | null | undefined, value: LineValue) => void;

/** GPIO line driven by the test through emit(). */
export class FakeButtonInput implements ButtonInput {
  private callback: WatchCallback | null = null;
  unexported = false;

  watch(callback: WatchCallback): void {
    this.callback = callback;
  }

  unexport(): void {
    this.unexported = true;
  }

  emit(value: LineValue, error: Error | null = null): void {
    this.callback?.(error, value);
  }
}

import { showStaticMessage } from '../display/renderer.js';
import type { DisplayDriver } from '../display/types.js';
import type { Clock } from '../utils/clock.js';

export const OVERLAY_HOLD_MS = 1500;

/**
 * Holds at most one status message waiting to be shown. A new request
 * replaces a message that has not been shown yet.
 */
export class OverlayScheduler {
  private pending: string | null = null;

  constructor(
    private readonly driver: DisplayDriver,
    private readonly clock: Clock,
    private readonly holdMs: number = OVERLAY_HOLD_MS
  ) {}

  get pendingText(): string | null {
    return this.pending;
  }

  request(text: string): void {
    this.pending = text;
  }

  /**
   * Show the pending message statically and keep it on screen for the hold
   * time. Blocks the calling tick for that long; the message is taken off
   * the queue before the hold, so a request made meanwhile is kept for the
   * next tick.
   */
  async showOverlayIfPending(): Promise<boolean> {
    const text = this.pending;
    if (text === null) {
      return false;
    }

    this.pending = null;
    showStaticMessage(this.driver, text);
    await this.clock.sleep(this.holdMs);
    return true;
  }
}

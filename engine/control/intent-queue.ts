/** What a button press asks for; applied later by the main loop. */
export type Intent = 'toggle-mode' | 'cycle-category' | 'toggle-weather';

/**
 * Hand-off between button callbacks and the main loop. Callbacks only
 * push; the loop drains everything at the start of a tick and applies the
 * intents in arrival order, so mode changes never interleave with a
 * half-finished step.
 */
export class IntentQueue {
  private items: Intent[] = [];

  push(intent: Intent): void {
    this.items.push(intent);
  }

  drain(): Intent[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get size(): number {
    return this.items.length;
  }
}

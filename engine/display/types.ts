export const DISPLAY_WIDTH = 20;
export const DISPLAY_HEIGHT = 2;

/** Exactly what the display shows: two rows of DISPLAY_WIDTH characters. */
export type DisplayFrame = readonly [string, string];

export type Transport = 'serial' | 'i2c' | 'console';

export interface DisplayDriver {
  readonly transport: Transport | 'memory';
  /** Fire-and-forget; callers pass frames already normalised by the renderer. */
  write(frame: DisplayFrame): void;
  close?(): Promise<void>;
}

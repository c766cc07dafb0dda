import type { DisplayDriver, DisplayFrame } from '../types.js';

/** Keeps every frame in memory, oldest first. */
export class RecordingDisplayDriver implements DisplayDriver {
  readonly transport = 'memory' as const;
  readonly frames: DisplayFrame[] = [];

  write(frame: DisplayFrame): void {
    this.frames.push(frame);
  }

  get lastFrame(): DisplayFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  clear(): void {
    this.frames.length = 0;
  }
}

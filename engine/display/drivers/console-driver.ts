import { DISPLAY_WIDTH, type DisplayDriver, type DisplayFrame } from '../types.js';

/** Prints frames as a boxed 20x2 panel; used when no hardware is attached. */
export class ConsoleDisplayDriver implements DisplayDriver {
  readonly transport = 'console' as const;

  write(frame: DisplayFrame): void {
    const divider = '-'.repeat(DISPLAY_WIDTH + 2);
    console.log(divider);
    for (const line of frame) {
      console.log(`|${line.padEnd(DISPLAY_WIDTH).slice(0, DISPLAY_WIDTH)}|`);
    }
    console.log(divider);
  }
}

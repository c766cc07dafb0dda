/**
 * Text-to-frame rendering for the 20x2 character display.
 *
 * Messages are wrapped on word boundaries, then shown either as a single
 * static frame or as an upward-scrolling sequence of frames when they need
 * more than DISPLAY_HEIGHT rows.
 */

import { logger } from '../logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  DISPLAY_HEIGHT,
  DISPLAY_WIDTH,
  type DisplayDriver,
  type DisplayFrame,
} from './types.js';

export const DEFAULT_FRAME_DELAY_MS = 800;

export type Presentation = 'static' | 'scrolling';

export interface ShowMessageOptions {
  frameDelayMs?: number;
  clock?: Clock;
}

/** Truncate to the display width and right-pad with spaces. */
export function fitLine(line: string): string {
  return line.slice(0, DISPLAY_WIDTH).padEnd(DISPLAY_WIDTH, ' ');
}

function wrapSegment(segment: string): string[] {
  const words = segment.split(/\s+/).filter(word => word.length > 0);
  if (words.length === 0) {
    return [''];
  }

  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    const candidate = current === '' ? word : `${current} ${word}`;
    if (candidate.length <= DISPLAY_WIDTH) {
      current = candidate;
      continue;
    }

    if (word.length <= DISPLAY_WIDTH) {
      lines.push(current);
      current = word;
      continue;
    }

    // A word wider than the display is cut; its first piece fills the
    // current line when there is room after the separating space.
    let rest = word;
    if (current !== '') {
      const room = DISPLAY_WIDTH - current.length - 1;
      if (room > 0) {
        current = `${current} ${rest.slice(0, room)}`;
        rest = rest.slice(room);
      }
      lines.push(current);
    }
    while (rest.length > DISPLAY_WIDTH) {
      lines.push(rest.slice(0, DISPLAY_WIDTH));
      rest = rest.slice(DISPLAY_WIDTH);
    }
    current = rest;
  }

  if (current !== '') {
    lines.push(current);
  }
  return lines;
}

/**
 * Split on explicit newlines, collapse whitespace inside each segment and
 * word-wrap it to the display width. Hyphenated words are kept whole.
 * An empty segment produces one empty line; the result is never empty.
 */
export function wrapMessageLines(message: string): string[] {
  return message.split(/\r?\n/).flatMap(wrapSegment);
}

/** First two wrapped lines; anything past the second row is dropped. */
export function staticFrame(message: string): DisplayFrame {
  const lines = wrapMessageLines(message);
  return [fitLine(lines[0] ?? ''), fitLine(lines[1] ?? '')];
}

/**
 * One frame per step of a two-row window sliding down the wrapped lines,
 * so the text moves up the display. N wrapped lines give N - 1 frames; a
 * single line gives none and the caller shows it statically instead.
 *
 * The returned iterable is lazy and can be iterated more than once.
 */
export function verticalScrollingFrames(message: string): Iterable<DisplayFrame> {
  const lines = wrapMessageLines(message);
  return {
    *[Symbol.iterator](): Iterator<DisplayFrame> {
      for (let i = 0; i + 1 < lines.length; i++) {
        yield [fitLine(lines[i]), fitLine(lines[i + 1])];
      }
    },
  };
}

/** Write a frame, logging instead of throwing when the driver fails. */
export function writeFrame(driver: DisplayDriver, frame: DisplayFrame): void {
  try {
    driver.write(frame);
  } catch (error) {
    logger.error(`Display write failed on ${driver.transport} driver:`, error);
  }
}

export function showStaticMessage(driver: DisplayDriver, message: string): void {
  writeFrame(driver, staticFrame(message));
}

/**
 * Entry point for normal content: static when the wrapped text fits on
 * the display, otherwise an animated scroll with a delay after each frame.
 */
export async function showMessage(
  driver: DisplayDriver,
  message: string,
  options: ShowMessageOptions = {}
): Promise<Presentation> {
  const clock = options.clock ?? systemClock;
  const frameDelayMs = options.frameDelayMs ?? DEFAULT_FRAME_DELAY_MS;

  if (wrapMessageLines(message).length <= DISPLAY_HEIGHT) {
    showStaticMessage(driver, message);
    return 'static';
  }

  for (const frame of verticalScrollingFrames(message)) {
    writeFrame(driver, frame);
    await clock.sleep(frameDelayMs);
  }
  return 'scrolling';
}

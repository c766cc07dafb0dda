import { describe, it, expect, vi } from 'vitest';
import {
  fitLine,
  showMessage,
  staticFrame,
  verticalScrollingFrames,
  wrapMessageLines,
  writeFrame,
} from '../renderer.js';
import { RecordingDisplayDriver } from '../drivers/recording-driver.js';
import { DISPLAY_WIDTH, type DisplayDriver } from '../types.js';
import { FakeClock } from '../../__tests__/fixtures/testData.js';
import { logger } from '../../logger.js';

vi.mock('../../logger.js', () => ({
  logger: { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));

const LONG_SENTENCE = 'the quick brown fox jumps over the lazy dog';
const BLANK_ROW = ' '.repeat(DISPLAY_WIDTH);

describe('DisplayRenderer', () => {
  describe('wrapMessageLines', () => {
    it('should split on explicit newlines', () => {
      const lines = wrapMessageLines('Ты справишься!\nДыши глубже');

      expect(lines).toEqual(['Ты справишься!', 'Дыши глубже']);
      for (const line of lines) {
        expect(line.length).toBeLessThanOrEqual(DISPLAY_WIDTH);
      }
    });

    it('should collapse runs of whitespace inside a segment', () => {
      expect(wrapMessageLines('  Шаг \t за   шагом  ')).toEqual(['Шаг за шагом']);
    });

    it('should word-wrap to the display width', () => {
      expect(wrapMessageLines(LONG_SENTENCE)).toEqual([
        'the quick brown fox',
        'jumps over the lazy',
        'dog',
      ]);
    });

    it('should keep hyphenated words whole', () => {
      expect(wrapMessageLines('Микро-перерыв? Микро-перерыв?')).toEqual([
        'Микро-перерыв?',
        'Микро-перерыв?',
      ]);
    });

    it('should keep intentional blank lines', () => {
      expect(wrapMessageLines('one\n\ntwo')).toEqual(['one', '', 'two']);
    });

    it('should return one empty line for an empty message', () => {
      expect(wrapMessageLines('')).toEqual(['']);
      expect(wrapMessageLines('   ')).toEqual(['']);
    });

    it('should cut words wider than the display', () => {
      expect(wrapMessageLines('a'.repeat(45))).toEqual([
        'a'.repeat(20),
        'a'.repeat(20),
        'a'.repeat(5),
      ]);
    });

    it('should start a cut word on the current line when there is room', () => {
      expect(wrapMessageLines(`hi ${'b'.repeat(30)}`)).toEqual([
        `hi ${'b'.repeat(17)}`,
        'b'.repeat(13),
      ]);
    });

    it('should accept CRLF line breaks', () => {
      expect(wrapMessageLines('top\r\nbottom')).toEqual(['top', 'bottom']);
    });
  });

  describe('fitLine', () => {
    it('should pad short lines and truncate long ones', () => {
      expect(fitLine('abc')).toBe(`abc${' '.repeat(17)}`);
      expect(fitLine('x'.repeat(25))).toBe('x'.repeat(20));
    });
  });

  describe('staticFrame', () => {
    it('should return two blank rows for an empty message', () => {
      expect(staticFrame('')).toEqual([BLANK_ROW, BLANK_ROW]);
    });

    it('should pad a single line and leave the second row blank', () => {
      expect(staticFrame('Ты справишься!')).toEqual([
        `Ты справишься!${' '.repeat(6)}`,
        BLANK_ROW,
      ]);
    });

    it('should drop lines past the second', () => {
      expect(staticFrame(LONG_SENTENCE)).toEqual([
        'the quick brown fox ',
        'jumps over the lazy ',
      ]);
    });

    it('should always produce two rows of display width', () => {
      for (const message of ['', 'x', LONG_SENTENCE, 'a'.repeat(100), 'a\nb\nc']) {
        const frame = staticFrame(message);
        expect(frame).toHaveLength(2);
        expect(frame[0]).toHaveLength(DISPLAY_WIDTH);
        expect(frame[1]).toHaveLength(DISPLAY_WIDTH);
      }
    });
  });

  describe('verticalScrollingFrames', () => {
    it('should slide a two-row window one line at a time', () => {
      const frames = Array.from(verticalScrollingFrames(LONG_SENTENCE));

      expect(frames).toEqual([
        ['the quick brown fox ', 'jumps over the lazy '],
        ['jumps over the lazy ', `dog${' '.repeat(17)}`],
      ]);
      for (let i = 1; i < frames.length; i++) {
        expect(frames[i][0]).toBe(frames[i - 1][1]);
      }
    });

    it('should yield N - 1 frames for N wrapped lines', () => {
      const message = 'one\ntwo\nthree\nfour\nfive';
      expect(Array.from(verticalScrollingFrames(message))).toHaveLength(4);
    });

    it('should yield nothing for a single line', () => {
      expect(Array.from(verticalScrollingFrames('short'))).toEqual([]);
      expect(Array.from(verticalScrollingFrames(''))).toEqual([]);
    });

    it('should be iterable more than once', () => {
      const frames = verticalScrollingFrames(LONG_SENTENCE);
      expect(Array.from(frames)).toEqual(Array.from(frames));
    });
  });

  describe('showMessage', () => {
    it('should show a short phrase statically', async () => {
      const driver = new RecordingDisplayDriver();
      const clock = new FakeClock();

      const presentation = await showMessage(driver, 'Ты справишься!', { clock });

      expect(presentation).toBe('static');
      expect(driver.frames).toEqual([staticFrame('Ты справишься!')]);
      expect(clock.sleeps).toEqual([]);
    });

    it('should treat exactly two wrapped lines as static', async () => {
      const driver = new RecordingDisplayDriver();

      const presentation = await showMessage(driver, 'Ты справишься!\nДыши глубже', {
        clock: new FakeClock(),
      });

      expect(presentation).toBe('static');
      expect(driver.frames).toHaveLength(1);
    });

    it('should scroll a long unbroken phrase with a delay after each frame', async () => {
      const driver = new RecordingDisplayDriver();
      const clock = new FakeClock();

      const presentation = await showMessage(driver, 'a'.repeat(45), {
        clock,
        frameDelayMs: 250,
      });

      expect(presentation).toBe('scrolling');
      expect(driver.frames).toEqual([
        ['a'.repeat(20), 'a'.repeat(20)],
        ['a'.repeat(20), `aaaaa${' '.repeat(15)}`],
      ]);
      expect(clock.sleeps).toEqual([250, 250]);
    });

    it('should use the default frame delay', async () => {
      const clock = new FakeClock();

      await showMessage(new RecordingDisplayDriver(), LONG_SENTENCE, { clock });

      expect(clock.sleeps).toEqual([800, 800]);
    });
  });

  describe('writeFrame', () => {
    it('should log and carry on when the driver throws', () => {
      const writeError = new Error('bus error');
      const driver: DisplayDriver = {
        transport: 'i2c',
        write: vi.fn(() => {
          throw writeError;
        }),
      };

      expect(() => writeFrame(driver, staticFrame('hello'))).not.toThrow();
      expect(logger.error).toHaveBeenCalledWith(
        'Display write failed on i2c driver:',
        writeError
      );
    });
  });
});

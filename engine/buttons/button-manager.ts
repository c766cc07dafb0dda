import { Gpio } from 'onoff';
import { logger } from '../logger.js';
import { describeError } from '../errors.js';
import { systemClock, type Clock } from '../utils/clock.js';

export const DEFAULT_HOLD_MS = 1200;
const DEBOUNCE_MS = 10;

export type LineValue = 0 | 1;

/** The part of an onoff GPIO line the manager uses. */
export interface ButtonInput {
  watch(callback: (error: Error | null | undefined, value: LineValue) => void): void;
  unexport(): void;
}

export type ButtonInputFactory = (pin: number) => ButtonInput;

export interface ButtonCallbacks {
  shortPress: () => void;
  longPress: () => void;
}

export interface ButtonManagerOptions {
  name: string;
  pin: number;
  holdMs?: number;
  clock?: Clock;
  openInput?: ButtonInputFactory;
}

export const openGpioInput: ButtonInputFactory = pin => {
  if (!Gpio.accessible) {
    throw new Error('GPIO is not accessible on this host');
  }
  // Expects an external pull-up: the line reads 0 while the button is held down
  return new Gpio(pin, 'in', 'both', { debounceTimeout: DEBOUNCE_MS });
};

/**
 * One push button on a GPIO line. A release after at least holdMs counts
 * as a long press, anything shorter as a short press. Without GPIO access
 * the manager logs once and stays inert.
 */
export class ButtonManager {
  private input: ButtonInput | null = null;
  private pressedAt: number | null = null;
  private readonly name: string;
  private readonly holdMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly callbacks: ButtonCallbacks,
    options: ButtonManagerOptions
  ) {
    this.name = options.name;
    this.holdMs = options.holdMs ?? DEFAULT_HOLD_MS;
    this.clock = options.clock ?? systemClock;

    const openInput = options.openInput ?? openGpioInput;
    let input: ButtonInput;
    try {
      input = openInput(options.pin);
    } catch (error) {
      logger.warn(
        `${options.name} button on GPIO${options.pin} disabled: ${describeError(error)}`
      );
      return;
    }

    input.watch((error, value) => {
      if (error) {
        logger.error(`${options.name} button read failed:`, error);
        return;
      }
      this.handleEdge(value);
    });
    this.input = input;
    logger.info(`${options.name} button on GPIO${options.pin}`);
  }

  get enabled(): boolean {
    return this.input !== null;
  }

  close(): void {
    if (!this.input) {
      return;
    }
    const input = this.input;
    this.input = null;
    try {
      input.unexport();
    } catch (error) {
      logger.warn(`${this.name} button release failed: ${describeError(error)}`);
    }
  }

  private handleEdge(value: LineValue): void {
    if (value === 0) {
      this.pressedAt = this.clock.now();
      return;
    }

    if (this.pressedAt === null) {
      return;
    }
    const heldFor = this.clock.now() - this.pressedAt;
    this.pressedAt = null;

    if (heldFor >= this.holdMs) {
      this.callbacks.longPress();
    } else {
      this.callbacks.shortPress();
    }
  }
}

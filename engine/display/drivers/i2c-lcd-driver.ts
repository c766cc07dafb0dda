import i2c from 'i2c-bus';
import { logger } from '../../logger.js';
import { DriverUnavailableError, describeError } from '../../errors.js';
import type { DisplayDriver, DisplayFrame } from '../types.js';
import { encodeAscii } from './charset.js';

// PCF8574 backpack wiring: P0 RS, P1 RW, P2 E, P3 backlight, P4-P7 data
const REGISTER_SELECT = 0x01;
const ENABLE = 0x04;
const BACKLIGHT = 0x08;

const ROW_ADDRESSES = [0x80, 0xc0] as const;

// 8-bit reset twice, switch to 4-bit, 2 lines 5x8, display on, entry left, clear
const INIT_SEQUENCE = [0x33, 0x32, 0x28, 0x0c, 0x06, 0x01];

export interface I2cLcdOptions {
  bus: number;
  address: number;
}

/** The part of an i2c-bus handle the driver uses. */
export interface LcdBus {
  sendByteSync(address: number, byte: number): unknown;
  closeSync(): void;
}

export type LcdBusFactory = (busNumber: number) => LcdBus;

export const openI2cBus: LcdBusFactory = busNumber => i2c.openSync(busNumber);

/** HD44780 character LCD behind a PCF8574 I2C expander, driven in 4-bit mode. */
export class I2cLcdDriver implements DisplayDriver {
  readonly transport = 'i2c' as const;

  private constructor(
    private readonly bus: LcdBus,
    private readonly address: number
  ) {}

  static open(options: I2cLcdOptions, openBus: LcdBusFactory = openI2cBus): I2cLcdDriver {
    let bus: LcdBus;
    try {
      bus = openBus(options.bus);
    } catch (error) {
      throw new DriverUnavailableError(
        'i2c',
        `Cannot open I2C bus ${options.bus}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const driver = new I2cLcdDriver(bus, options.address);
    try {
      for (const command of INIT_SEQUENCE) {
        driver.command(command);
      }
    } catch (error) {
      bus.closeSync();
      throw new DriverUnavailableError(
        'i2c',
        `No LCD at 0x${options.address.toString(16)}: ${describeError(error)}`,
        { cause: error }
      );
    }

    logger.info(
      `I2C display ready on bus ${options.bus} at 0x${options.address.toString(16)}`
    );
    return driver;
  }

  write(frame: DisplayFrame): void {
    frame.forEach((line, row) => {
      this.command(ROW_ADDRESSES[row]);
      for (const code of encodeAscii(line)) {
        this.send(code, REGISTER_SELECT);
      }
    });
  }

  async close(): Promise<void> {
    this.bus.closeSync();
  }

  private command(value: number): void {
    this.send(value, 0);
  }

  private send(value: number, mode: number): void {
    this.writeNibble(value & 0xf0, mode);
    this.writeNibble((value << 4) & 0xf0, mode);
  }

  private writeNibble(nibble: number, mode: number): void {
    const data = nibble | mode | BACKLIGHT;
    this.bus.sendByteSync(this.address, data | ENABLE);
    this.bus.sendByteSync(this.address, data);
  }
}

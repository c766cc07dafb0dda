import { SerialPort } from 'serialport';
import { logger } from '../../logger.js';
import { DriverUnavailableError, describeError } from '../../errors.js';
import type { DisplayDriver, DisplayFrame } from '../types.js';
import { encodeCp866 } from './charset.js';

const INITIALIZE = Buffer.from([0x1b, 0x40]); // ESC @
const CLEAR_HOME = Buffer.from([0x0c]);

export interface SerialVfdOptions {
  path: string;
  baudRate: number;
}

/** The part of a serialport stream the driver uses. */
export interface SerialLine {
  readonly isOpen: boolean;
  open(callback: (error: Error | null) => void): void;
  write(data: Buffer, callback: (error: Error | null | undefined) => void): boolean;
  close(callback: (error?: Error | null) => void): void;
}

export type SerialLineFactory = (options: SerialVfdOptions) => SerialLine;

export const openSerialPort: SerialLineFactory = options =>
  new SerialPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });

/**
 * Two-row customer display (VFD) on a UART. Clearing the screen homes the
 * cursor, and the display runs the first row into the second, so a frame
 * is written as forty consecutive characters.
 */
export class SerialVfdDriver implements DisplayDriver {
  readonly transport = 'serial' as const;

  private constructor(private readonly port: SerialLine) {}

  static async open(
    options: SerialVfdOptions,
    createLine: SerialLineFactory = openSerialPort
  ): Promise<SerialVfdDriver> {
    const port = createLine(options);

    try {
      await new Promise<void>((resolve, reject) => {
        port.open(error => (error ? reject(error) : resolve()));
      });
    } catch (error) {
      throw new DriverUnavailableError(
        'serial',
        `Cannot open ${options.path}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const driver = new SerialVfdDriver(port);
    driver.send(INITIALIZE);
    logger.info(`Serial display ready on ${options.path} @ ${options.baudRate}`);
    return driver;
  }

  write(frame: DisplayFrame): void {
    this.send(Buffer.concat([CLEAR_HOME, encodeCp866(frame[0] + frame[1])]));
  }

  async close(): Promise<void> {
    if (!this.port.isOpen) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.port.close(error => (error ? reject(error) : resolve()));
    });
  }

  private send(bytes: Buffer): void {
    this.port.write(bytes, error => {
      if (error) {
        logger.error('Serial display write failed:', error);
      }
    });
  }
}

import { logger } from '../logger.js';
import { describeError } from '../errors.js';
import type { DeviceConfig } from '../config.js';
import type { DisplayDriver, Transport } from './types.js';
import { ConsoleDisplayDriver } from './drivers/console-driver.js';
import { SerialVfdDriver } from './drivers/serial-vfd-driver.js';
import { I2cLcdDriver } from './drivers/i2c-lcd-driver.js';

export type DriverConfig = Pick<DeviceConfig, 'transport' | 'serial' | 'i2c'>;

export type DriverOpener = (config: DriverConfig) => Promise<DisplayDriver>;

export const DRIVER_OPENERS: Record<Transport, DriverOpener> = {
  serial: config => SerialVfdDriver.open(config.serial),
  i2c: async config => I2cLcdDriver.open(config.i2c),
  console: async () => new ConsoleDisplayDriver(),
};

// Each hardware transport falls through to the next one, ending at the console
const FALLBACK_ORDER: readonly Transport[] = ['serial', 'i2c', 'console'];

/**
 * Resolve the configured display transport. A transport that cannot be
 * opened is logged and the next one in the chain is tried, so this never
 * fails: the console driver is always available.
 */
export async function createDisplayDriver(
  config: DriverConfig,
  openers: Record<Transport, DriverOpener> = DRIVER_OPENERS
): Promise<DisplayDriver> {
  const candidates = FALLBACK_ORDER.slice(FALLBACK_ORDER.indexOf(config.transport));

  for (const transport of candidates) {
    try {
      return await openers[transport](config);
    } catch (error) {
      logger.warn(`Display transport ${transport} unavailable: ${describeError(error)}`);
    }
  }

  return new ConsoleDisplayDriver();
}

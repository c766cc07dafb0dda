/**
 * Run Command
 *
 * Starts the display loop on the configured hardware and keeps it going
 * until SIGINT or SIGTERM.
 */

import { loadConfig } from '../../../engine/config.js';
import { createDeviceApp } from '../../../engine/app.js';
import { logger } from '../../../engine/logger.js';

export async function runDevice(): Promise<void> {
  const config = loadConfig();
  const app = await createDeviceApp(config);

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping`);
    app.stop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    await app.run();
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

import { logger } from './logger.js';
import type { DeviceConfig } from './config.js';
import { loadCatalogue, type Catalogue } from './phrases/catalogue.js';
import { PhraseSequencer } from './phrases/phrase-sequencer.js';
import { IntentQueue } from './control/intent-queue.js';
import { ModeController } from './control/mode-controller.js';
import { OverlayScheduler } from './overlay/overlay-scheduler.js';
import { createDisplayDriver } from './display/driver-factory.js';
import type { DisplayDriver } from './display/types.js';
import { ButtonManager, type ButtonInputFactory } from './buttons/button-manager.js';
import { WeatherClient } from './weather/weather-client.js';
import type { WeatherSource } from './weather/types.js';
import { MainLoop, type MainLoopOptions } from './main-loop.js';
import { systemClock, type Clock } from './utils/clock.js';
import { describeError } from './errors.js';

export interface DeviceAppOverrides {
  catalogue?: Catalogue;
  driver?: DisplayDriver;
  weather?: WeatherSource;
  clock?: Clock;
  openInput?: ButtonInputFactory;
  loop?: Partial<MainLoopOptions>;
}

/**
 * The assembled device: display loop plus the hardware it holds. Buttons
 * and the display are released when run() returns or throws.
 */
export class DeviceApp {
  constructor(
    readonly loop: MainLoop,
    readonly intents: IntentQueue,
    private readonly buttons: ButtonManager[],
    private readonly driver: DisplayDriver
  ) {}

  async run(): Promise<void> {
    try {
      await this.loop.run();
    } finally {
      await this.release();
    }
  }

  stop(): void {
    this.loop.stop();
  }

  private async release(): Promise<void> {
    // ButtonManager.close logs its own failures
    for (const button of this.buttons) {
      button.close();
    }
    try {
      await this.driver.close?.();
    } catch (error) {
      logger.warn(`Display close failed: ${describeError(error)}`);
    }
  }
}

/**
 * Wire the device from configuration. Catalogue problems throw; an
 * unavailable display or button degrades instead.
 */
export async function createDeviceApp(
  config: DeviceConfig,
  overrides: DeviceAppOverrides = {}
): Promise<DeviceApp> {
  const catalogue = overrides.catalogue ?? loadCatalogue(config.cataloguePath);
  const clock = overrides.clock ?? systemClock;
  const driver = overrides.driver ?? (await createDisplayDriver(config));
  logger.info(`Using ${driver.transport} display`);

  const sequencer = new PhraseSequencer(catalogue);
  const overlays = new OverlayScheduler(driver, clock);
  const controller = new ModeController(sequencer, overlays);
  const intents = new IntentQueue();

  const buttons = [
    new ButtonManager(
      {
        shortPress: () => intents.push('toggle-mode'),
        longPress: () => intents.push('cycle-category'),
      },
      {
        name: 'Mode',
        pin: config.buttons.primaryPin,
        holdMs: config.buttons.holdMs,
        clock,
        openInput: overrides.openInput,
      }
    ),
    new ButtonManager(
      {
        shortPress: () => intents.push('toggle-weather'),
        // Reserved
        longPress: () => undefined,
      },
      {
        name: 'Weather',
        pin: config.buttons.weatherPin,
        holdMs: config.buttons.holdMs,
        clock,
        openInput: overrides.openInput,
      }
    ),
  ];

  const loop = new MainLoop(
    {
      driver,
      controller,
      sequencer,
      overlays,
      intents,
      weather: overrides.weather ?? new WeatherClient(config.weather),
      clock,
    },
    overrides.loop
  );

  return new DeviceApp(loop, intents, buttons, driver);
}

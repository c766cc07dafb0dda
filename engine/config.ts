import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { Transport } from './display/types.js';

const i2cAddress = z
  .string()
  .default('0x27')
  .transform((value, ctx) => {
    // Number() reads both "0x27" and "39"
    const address = Number(value);
    if (!Number.isInteger(address) || address < 0x03 || address > 0x77) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected a 7-bit I2C address, got "${value}"`,
      });
      return z.NEVER;
    }
    return address;
  });

const gpioPin = z.coerce.number().int().nonnegative();

const envSchema = z.object({
  MARKOSHKA_TRANSPORT: z.enum(['serial', 'i2c', 'console']).default('serial'),
  MARKOSHKA_PORT: z.string().min(1).default('/dev/ttyUSB0'),
  MARKOSHKA_BAUD: z.coerce.number().int().positive().default(9600),
  MARKOSHKA_I2C_BUS: z.coerce.number().int().nonnegative().default(1),
  MARKOSHKA_ADDR: i2cAddress,
  MARKOSHKA_BUTTON_PIN: gpioPin.default(17),
  MARKOSHKA_WEATHER_PIN: gpioPin.default(27),
  MARKOSHKA_HOLD_MS: z.coerce.number().int().positive().default(1200),
  MARKOSHKA_CATALOGUE: z.string().min(1).optional(),
  OPENWEATHER_API_KEY: z.string().min(1).optional(),
  WEATHER_CITY: z.string().min(1).default('Moscow'),
  WEATHER_LAT: z.coerce.number().min(-90).max(90).default(47.2357),
  WEATHER_LON: z.coerce.number().min(-180).max(180).default(39.7015),
});

export interface WeatherConfig {
  apiKey?: string;
  city: string;
  latitude: number;
  longitude: number;
}

export interface DeviceConfig {
  transport: Transport;
  serial: { path: string; baudRate: number };
  i2c: { bus: number; address: number };
  buttons: { primaryPin: number; weatherPin: number; holdMs: number };
  weather: WeatherConfig;
  cataloguePath?: string;
}

/**
 * Read the device configuration from environment variables.
 * Unset and empty variables take their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeviceConfig {
  const provided = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(provided);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: parsed.error });
  }

  const values = parsed.data;
  return {
    transport: values.MARKOSHKA_TRANSPORT,
    serial: { path: values.MARKOSHKA_PORT, baudRate: values.MARKOSHKA_BAUD },
    i2c: { bus: values.MARKOSHKA_I2C_BUS, address: values.MARKOSHKA_ADDR },
    buttons: {
      primaryPin: values.MARKOSHKA_BUTTON_PIN,
      weatherPin: values.MARKOSHKA_WEATHER_PIN,
      holdMs: values.MARKOSHKA_HOLD_MS,
    },
    weather: {
      apiKey: values.OPENWEATHER_API_KEY,
      city: values.WEATHER_CITY,
      latitude: values.WEATHER_LAT,
      longitude: values.WEATHER_LON,
    },
    cataloguePath: values.MARKOSHKA_CATALOGUE,
  };
}

import fetch from 'node-fetch';
import { z } from 'zod';
import { logger } from '../logger.js';
import { describeError } from '../errors.js';
import type { WeatherConfig } from '../config.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import type { WeatherReading, WeatherSource } from './types.js';

const OPENWEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';
const OPEN_METEO_URL = 'https://api.open-meteo.com/v1/forecast';

export const WEATHER_CACHE_DURATION = 1000 * 60 * 60 * 24; // 24 hours
const REQUEST_TIMEOUT_MS = 5000;

const openWeatherSchema = z.object({
  name: z.string().optional(),
  main: z.object({
    temp: z.number(),
    humidity: z.number().optional(),
  }),
  wind: z.object({ speed: z.number().optional() }).optional(),
});

const openMeteoCurrentSchema = z.object({
  current_weather: z.object({
    temperature: z.number().optional(),
    windspeed: z.number().optional(),
  }),
});

const openMeteoHourlySchema = z.object({
  hourly: z.object({
    time: z.array(z.string()).optional(),
    relativehumidity_2m: z.array(z.number().nullable()),
  }),
});

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Current conditions from OpenWeatherMap when an API key is configured,
 * otherwise from Open-Meteo by coordinates. A reading is reused for 24
 * hours. Failures are logged and reported as no reading.
 */
export class WeatherClient implements WeatherSource {
  private cache: WeatherReading | null = null;

  constructor(
    private readonly config: WeatherConfig,
    private readonly clock: Clock = systemClock
  ) {}

  async fetch(): Promise<WeatherReading | null> {
    const now = this.clock.now();
    if (this.cache && now - this.cache.fetchedAt < WEATHER_CACHE_DURATION) {
      return this.cache;
    }

    try {
      const reading = this.config.apiKey
        ? await this.fetchOpenWeather(this.config.apiKey, now)
        : await this.fetchOpenMeteo(now);
      this.cache = reading;
      return reading;
    } catch (error) {
      logger.warn(`Weather fetch failed: ${describeError(error)}`);
      return null;
    }
  }

  private async fetchOpenWeather(apiKey: string, now: number): Promise<WeatherReading> {
    const url = new URL(OPENWEATHER_URL);
    url.search = new URLSearchParams({
      q: this.config.city,
      appid: apiKey,
      units: 'metric',
      lang: 'ru',
    }).toString();

    const data = openWeatherSchema.parse(await this.getJson(url));
    const windSpeed = data.wind?.speed;
    return {
      temperature: Math.round(data.main.temp),
      humidity: data.main.humidity,
      windSpeed: windSpeed === undefined ? undefined : roundTo(windSpeed, 1),
      locationName: data.name,
      fetchedAt: now,
    };
  }

  private async fetchOpenMeteo(now: number): Promise<WeatherReading> {
    const url = new URL(OPEN_METEO_URL);
    url.search = new URLSearchParams({
      latitude: String(this.config.latitude),
      longitude: String(this.config.longitude),
      current_weather: 'true',
      windspeed_unit: 'ms',
      timezone: 'UTC',
    }).toString();

    const { current_weather: current } = openMeteoCurrentSchema.parse(await this.getJson(url));
    return {
      temperature:
        current.temperature === undefined ? undefined : Math.round(current.temperature),
      humidity: await this.fetchOpenMeteoHumidity(now),
      windSpeed: current.windspeed === undefined ? undefined : roundTo(current.windspeed, 1),
      fetchedAt: now,
    };
  }

  /** current_weather carries no humidity; read the hourly series instead. */
  private async fetchOpenMeteoHumidity(now: number): Promise<number | undefined> {
    const url = new URL(OPEN_METEO_URL);
    url.search = new URLSearchParams({
      latitude: String(this.config.latitude),
      longitude: String(this.config.longitude),
      hourly: 'relativehumidity_2m',
      timezone: 'UTC',
    }).toString();

    try {
      const { hourly } = openMeteoHourlySchema.parse(await this.getJson(url));
      // Hourly timestamps look like 2024-05-01T13:00 (UTC)
      const currentHour = `${new Date(now).toISOString().slice(0, 13)}:00`;
      const index = hourly.time?.indexOf(currentHour) ?? -1;
      const value = hourly.relativehumidity_2m[index >= 0 ? index : 0];
      return value ?? undefined;
    } catch (error) {
      logger.debug(`Humidity unavailable: ${describeError(error)}`);
      return undefined;
    }
  }

  private async getJson(url: URL): Promise<unknown> {
    const response = await fetch(url.toString(), {
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    return response.json();
  }
}

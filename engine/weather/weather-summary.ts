import type { WeatherReading } from './types.js';

export const WEATHER_UNAVAILABLE = 'Погода недоступна';

const WEEKDAYS = ['Пн', 'Вт', 'Ср', 'Чт', 'Пт', 'Сб', 'Вс'];

function twoDigits(value: number): string {
  return String(value).padStart(2, '0');
}

function field(value: number | undefined, unit: string): string {
  return value === undefined ? '?' : `${value}${unit}`;
}

/**
 * Two-line weather screen: local time, date and weekday on top, then
 * temperature, humidity and wind. A missing value shows as a bare "?".
 * Each line must fit the display width unwrapped:
 * "-12° Вл:100% 12.5м/с" is exactly 20.
 */
export function formatWeatherSummary(reading: WeatherReading | null, now: Date): string {
  if (!reading) {
    return WEATHER_UNAVAILABLE;
  }

  // getDay() counts from Sunday
  const weekday = WEEKDAYS[(now.getDay() + 6) % 7];
  const firstLine =
    `${twoDigits(now.getHours())}:${twoDigits(now.getMinutes())} ` +
    `${twoDigits(now.getDate())}.${twoDigits(now.getMonth() + 1)} ${weekday}`;

  const secondLine =
    `${field(reading.temperature, '°')} ` +
    `Вл:${field(reading.humidity, '%')} ` +
    field(reading.windSpeed, 'м/с');

  return `${firstLine}\n${secondLine}`;
}

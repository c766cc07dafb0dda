export interface WeatherReading {
  /** °C, rounded */
  temperature?: number;
  /** relative humidity, % */
  humidity?: number;
  /** m/s, one decimal */
  windSpeed?: number;
  locationName?: string;
  fetchedAt: number;
}

/** Anything that can produce the current conditions; never rejects. */
export interface WeatherSource {
  fetch(): Promise<WeatherReading | null>;
}

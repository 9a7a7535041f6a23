export interface WeatherReading {
  city: string;
  temperature: number;
  condition: string;
  feelsLike?: number;
  humidity?: number;
  windSpeed?: number;
}

export class WeatherUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WeatherUnavailableError";
  }
}

export interface WeatherPort {
  /** Rejects with WeatherUnavailableError for any upstream or shape problem. */
  current(city: string, signal?: AbortSignal): Promise<WeatherReading>;
}

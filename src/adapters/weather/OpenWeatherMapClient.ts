import { z } from "zod";
import type { WeatherPort, WeatherReading } from "../../ports/weather/WeatherPort";
import { WeatherUnavailableError } from "../../ports/weather/WeatherPort";

export const DEFAULT_WEATHER_ENDPOINT = "https://api.openweathermap.org/data/2.5/weather";

export interface OpenWeatherMapOptions {
  apiKey?: string;
  endpoint?: string;
  units?: "metric" | "imperial" | "standard";
}

const responseSchema = z.object({
  name: z.string().optional(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number().optional(),
    humidity: z.number().optional(),
  }),
  weather: z.array(z.object({ description: z.string() })).min(1),
  wind: z.object({ speed: z.number().optional() }).optional(),
});

export class OpenWeatherMapClient implements WeatherPort {
  constructor(private readonly options: OpenWeatherMapOptions) {}

  async current(city: string, signal?: AbortSignal): Promise<WeatherReading> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new WeatherUnavailableError("WEATHER_API_KEY is not configured.");
    }

    const url = new URL(this.options.endpoint ?? DEFAULT_WEATHER_ENDPOINT);
    url.searchParams.set("q", city);
    url.searchParams.set("appid", apiKey);
    url.searchParams.set("units", this.options.units ?? "metric");

    let res: Awaited<ReturnType<typeof fetch>>;
    try {
      res = await fetch(url.toString(), { signal });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new WeatherUnavailableError(
        `Weather service unreachable: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    if (!res.ok) {
      throw new WeatherUnavailableError(`Weather service error: ${res.status} ${res.statusText}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new WeatherUnavailableError("Weather service returned a body that is not JSON.", {
        cause: err,
      });
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      throw new WeatherUnavailableError(
        "Weather service response is missing main.temp or weather[0].description."
      );
    }

    const data = parsed.data;
    return {
      city: data.name ?? city,
      temperature: data.main.temp,
      condition: data.weather[0].description,
      feelsLike: data.main.feels_like,
      humidity: data.main.humidity,
      windSpeed: data.wind?.speed,
    };
  }
}

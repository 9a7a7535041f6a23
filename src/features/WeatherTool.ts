import { z } from "zod";
import type {
  ToolContext,
  ToolData,
  ToolExecutionResult,
  ToolSpec,
} from "../ports/tools/ToolRegistryPort";
import { fail, succeed } from "../ports/tools/ToolRegistryPort";
import type { WeatherPort } from "../ports/weather/WeatherPort";
import { WeatherUnavailableError } from "../ports/weather/WeatherPort";

const parameters = z.strictObject({
  city: z.string().trim().min(1).describe('City name, e.g. "Chandigarh" or "Paris,FR".'),
});

export class WeatherTool implements ToolSpec<typeof parameters> {
  readonly name = "get_weather";
  readonly description =
    "Get the current weather for a city: temperature in °C and a short condition description, plus feels-like, humidity and wind when available.";
  readonly parameters = parameters;
  readonly effect = "network";

  constructor(private readonly weather: WeatherPort) {}

  async exec(args: z.infer<typeof parameters>, ctx: ToolContext): Promise<ToolExecutionResult> {
    try {
      const reading = await this.weather.current(args.city, ctx.signal);
      const data: Record<string, string | number> = {
        city: reading.city,
        temperature: reading.temperature,
        condition: reading.condition,
      };
      if (reading.feelsLike !== undefined) data.feels_like = reading.feelsLike;
      if (reading.humidity !== undefined) data.humidity = reading.humidity;
      if (reading.windSpeed !== undefined) data.wind_speed = reading.windSpeed;
      return succeed(data satisfies ToolData);
    } catch (err) {
      if (err instanceof WeatherUnavailableError) {
        ctx.logger.warn(`[tool] get_weather failed for ${args.city}`, { error: err.message });
        return fail("UpstreamFailure", err.message);
      }
      throw err;
    }
  }
}

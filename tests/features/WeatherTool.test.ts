import { WeatherTool } from '../../src/features/WeatherTool';
import type { WeatherPort } from '../../src/ports/weather/WeatherPort';
import { WeatherUnavailableError } from '../../src/ports/weather/WeatherPort';
import { fakeLogger } from '../helpers/fakes';

describe('WeatherTool', () => {
  const ctx = () => ({ signal: new AbortController().signal, logger: fakeLogger() });

  function makeTool(current: WeatherPort['current']) {
    const port = { current: jest.fn(current) };
    return { tool: new WeatherTool(port), port };
  }

  test('returns city, temperature and condition, plus optional extras', async () => {
    const { tool, port } = makeTool(async () => ({
      city: 'Chandigarh',
      temperature: 31.2,
      condition: 'haze',
      humidity: 40,
    }));
    const context = ctx();

    const result = await tool.exec({ city: 'Chandigarh' }, context);

    expect(result).toEqual({
      ok: true,
      value: { city: 'Chandigarh', temperature: 31.2, condition: 'haze', humidity: 40 },
    });
    expect(port.current).toHaveBeenCalledWith('Chandigarh', context.signal);
  });

  test('upstream problems become UpstreamFailure', async () => {
    const { tool } = makeTool(async () => {
      throw new WeatherUnavailableError('Weather service error: 500 Server Error');
    });
    expect(await tool.exec({ city: 'Paris' }, ctx())).toEqual({
      ok: false,
      code: 'UpstreamFailure',
      message: 'Weather service error: 500 Server Error',
    });
  });

  test('other errors propagate to the invoker', async () => {
    const { tool } = makeTool(async () => {
      throw new TypeError('unexpected');
    });
    await expect(tool.exec({ city: 'Paris' }, ctx())).rejects.toThrow('unexpected');
  });

  test('the city parameter is trimmed and must not be blank', () => {
    const { tool } = makeTool(async () => ({ city: 'x', temperature: 0, condition: 'clear' }));
    expect(tool.parameters.safeParse({ city: '  Oslo ' })).toEqual({ success: true, data: { city: 'Oslo' } });
    expect(tool.parameters.safeParse({ city: '   ' }).success).toBe(false);
  });
});

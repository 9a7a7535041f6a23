import { readEnv } from '../src/env';

describe('readEnv', () => {
  test('applies defaults when nothing is set', () => {
    expect(readEnv({}, [])).toEqual({
      openaiApiKey: undefined,
      openaiModel: 'gpt-4o-mini',
      openaiBaseUrl: undefined,
      weatherApiKey: undefined,
      userId: 'default-user',
      debugMode: false,
      examples: false,
    });
  });

  test('reads credentials and settings from the environment', () => {
    const env = readEnv(
      {
        OPENAI_API_KEY: 'test-secret',
        OPENAI_MODEL: 'gpt-test',
        OPENAI_BASE_URL: 'http://localhost:8080/v1',
        WEATHER_API_KEY: 'weather-secret',
        AGENT_USER_ID: 'sam',
        DEBUG_MODE: 'true',
      },
      []
    );
    expect(env).toMatchObject({
      openaiApiKey: 'test-secret',
      openaiModel: 'gpt-test',
      openaiBaseUrl: 'http://localhost:8080/v1',
      weatherApiKey: 'weather-secret',
      userId: 'sam',
      debugMode: true,
    });
  });

  test('blank values count as unset', () => {
    expect(readEnv({ OPENAI_MODEL: '  ', OPENAI_API_KEY: '' }, [])).toMatchObject({
      openaiModel: 'gpt-4o-mini',
      openaiApiKey: undefined,
    });
  });

  test('CLI flags set paths, user and modes', () => {
    const env = readEnv({}, ['--config', './conf/local.json', '--log-file', './run.log', '--user', 'kim', '--examples']);
    expect(env).toMatchObject({
      configPath: './conf/local.json',
      logFile: './run.log',
      userId: 'kim',
      examples: true,
    });
  });

  test('debug flags override the environment, last one wins', () => {
    expect(readEnv({ DEBUG_MODE: 'false' }, ['--debug-tools']).debugMode).toBe(true);
    expect(readEnv({ DEBUG_MODE: 'true' }, ['--no-debug-tools']).debugMode).toBe(false);
    expect(readEnv({}, ['--no-debug-tools', '--debug-tools']).debugMode).toBe(true);
  });

  test('a flag missing its value is ignored', () => {
    expect(readEnv({}, ['--config']).configPath).toBeUndefined();
  });
});

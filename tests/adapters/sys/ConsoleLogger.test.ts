import { ConsoleLogger } from '../../../src/adapters/sys/ConsoleLogger';

describe('ConsoleLogger', () => {
  let debugSpy: jest.SpyInstance;
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('debug is silent unless enabled', () => {
    new ConsoleLogger().debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ debug: true }).debug('hello', { a: 1 });
    expect(debugSpy).toHaveBeenCalledWith('hello {"a":1}');
  });

  test('info logs the bare message when there is no meta', () => {
    new ConsoleLogger().info('world');
    expect(infoSpy).toHaveBeenCalledWith('world');
  });

  test('child loggers nest their scope', () => {
    new ConsoleLogger({ scope: 'agent' }).child('tools').warn('careful');
    expect(warnSpy).toHaveBeenCalledWith('[agent:tools] careful');
  });

  test('errors in meta are reduced to name and message', () => {
    new ConsoleLogger().error('oops', { error: new TypeError('bad') });
    expect(errorSpy).toHaveBeenCalledWith('oops {"error":{"name":"TypeError","message":"bad"}}');
  });

  test('unserializable meta does not throw', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    new ConsoleLogger().info('loop', cyclic);
    expect(infoSpy).toHaveBeenCalledWith('loop [unserializable meta]');
  });
});

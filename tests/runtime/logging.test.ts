import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { initializeLogging } from '../../src/runtime/logging';

describe('initializeLogging', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'agent-logs-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  test('without a file it leaves the console alone', async () => {
    const before = console.log;
    const handle = initializeLogging();
    expect(handle.logPath).toBeUndefined();
    expect(console.log).toBe(before);
    await handle.shutdown();
  });

  test('mirrors console output into the file until shutdown', async () => {
    const infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    const logFile = path.join(dir, 'nested', 'agent.log');

    const handle = initializeLogging(logFile);
    console.info('hello', { n: 1 });
    await handle.shutdown();
    console.info('after shutdown');

    expect(infoSpy).toHaveBeenCalledWith('hello', { n: 1 });
    const lines = (await readFile(logFile, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/--- agent session started ---$/);
    expect(lines[1]).toMatch(/^\[.+\] INFO hello \{"n":1\}$/);
    expect(lines[2]).toMatch(/--- agent session ended ---$/);
  });

  test('shutdown is idempotent', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    const handle = initializeLogging(path.join(dir, 'twice.log'));
    await handle.shutdown();
    await expect(handle.shutdown()).resolves.toBeUndefined();
  });
});

import { DateOffsetTool, offsetDate } from '../../src/features/DateOffsetTool';
import { fixedClock } from '../helpers/fakes';

describe('offsetDate', () => {
  const jan31 = new Date(2024, 0, 31, 12).getTime();

  test('adds days across a month boundary', () => {
    expect(offsetDate(jan31, 7)).toBe('2024-02-07');
  });

  test('subtracts days', () => {
    expect(offsetDate(jan31, -3)).toBe('2024-01-28');
  });

  test('zero days is today', () => {
    expect(offsetDate(jan31, 0)).toBe('2024-01-31');
  });

  test('handles leap days and year boundaries', () => {
    expect(offsetDate(new Date(2024, 1, 28, 12).getTime(), 1)).toBe('2024-02-29');
    expect(offsetDate(new Date(2023, 11, 30, 12).getTime(), 3)).toBe('2024-01-02');
  });

  test('large offsets inside the four-digit years still format', () => {
    expect(offsetDate(jan31, 2_900_000)).toMatch(/^9\d{3}-\d{2}-\d{2}$/);
  });

  test.each([[1e9], [3_000_000], [-800_000]])('offset of %d days has no four-digit year', (days) => {
    expect(offsetDate(jan31, days)).toBeNull();
  });
});

describe('DateOffsetTool', () => {
  test('reads today from the injected clock', async () => {
    const tool = new DateOffsetTool(fixedClock(new Date(2024, 0, 31, 12).getTime()));
    expect(await tool.exec({ days: 7 })).toEqual({ ok: true, value: '2024-02-07' });
  });

  test('rejects offsets that leave the four-digit years', async () => {
    const tool = new DateOffsetTool(fixedClock(new Date(2024, 0, 31, 12).getTime()));
    expect(await tool.exec({ days: 3_000_000 })).toEqual({
      ok: false,
      code: 'InvalidArguments',
      message: 'Offset of 3000000 days falls outside the years 0000-9999.',
    });
  });
});

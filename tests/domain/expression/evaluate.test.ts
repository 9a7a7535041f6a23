import { evaluate } from '../../../src/domain/expression';
import type { EvalErrorKind } from '../../../src/domain/expression';

function valueOf(expression: string): number {
  const res = evaluate(expression);
  if (!res.ok) {
    throw new Error(`expected success for ${expression}, got ${res.error.kind}: ${res.error.message}`);
  }
  return res.value;
}

function errorKindOf(expression: string): EvalErrorKind {
  const res = evaluate(expression);
  if (res.ok) {
    throw new Error(`expected failure for ${expression}, got ${res.value}`);
  }
  return res.error.kind;
}

describe('evaluate', () => {
  test('computes the worked arithmetic example', () => {
    expect(valueOf('(234 * 12) + 98')).toBe(2906);
  });

  test('respects precedence and left-to-right order', () => {
    expect(valueOf('2 + 3 * 4')).toBe(14);
    expect(valueOf('10 - 4 - 3')).toBe(3);
    expect(valueOf('100 / 10 / 5')).toBe(2);
    expect(valueOf('2 * 3 ^ 2')).toBe(18);
    expect(valueOf('(2 + 3) * 4')).toBe(20);
  });

  test('exponentiation binds right to left', () => {
    expect(valueOf('2 ^ 3 ^ 2')).toBe(512);
    expect(valueOf('(2 ^ 3) ^ 2')).toBe(64);
  });

  test('accepts decimal literals in several spellings', () => {
    expect(valueOf('1.5 * 2')).toBe(3);
    expect(valueOf('.5 + .25')).toBe(0.75);
    expect(valueOf('12. / 4')).toBe(3);
    expect(valueOf('7 / 2')).toBe(3.5);
  });

  test('ignores surrounding and inner whitespace', () => {
    expect(valueOf('  ( 1+2 )*\t3 ')).toBe(9);
  });

  test('division by zero is an error, not Infinity', () => {
    expect(errorKindOf('1/0')).toBe('DivisionByZero');
    expect(errorKindOf('5 / (3 - 3)')).toBe('DivisionByZero');
    expect(errorKindOf('0 ^ (0 - 1)')).toBe('DivisionByZero');
  });

  test.each([
    ['__import__("os")'],
    ['sqrt(16)'],
    ['x + 1'],
    ['x = 5'],
    ['1; 2'],
    ['1 == 1'],
    ['3 < 4'],
    ['1 & 1'],
    ['"a" + "b"'],
    ['5 % 2'],
    ['1e5'],
    ['-5 + 2'],
    ['2 * -3'],
  ])('rejects %s as an unsupported construct', (expression) => {
    expect(errorKindOf(expression)).toBe('UnsupportedConstruct');
  });

  test('reports the offending position for unsupported names', () => {
    const res = evaluate('2 + abs(3)');
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.position).toBe(4);
      expect(res.error.message).toContain('function call "abs(...)"');
    }
  });

  test.each([[''], ['   '], ['1 +'], ['(1 + 2'], ['(1 + 2))'], ['()'], ['2 ** 3'], ['1.2.3'], ['4 5']])(
    'rejects malformed input %p as a parse error',
    (expression) => {
      expect(errorKindOf(expression)).toBe('ParseError');
    }
  );

  test('rejects inputs that are too long or nested too deeply', () => {
    expect(errorKindOf('1+'.repeat(600) + '1')).toBe('ParseError');
    expect(errorKindOf('('.repeat(70) + '1' + ')'.repeat(70))).toBe('ParseError');
    expect(valueOf('('.repeat(10) + '1' + ')'.repeat(10))).toBe(1);
  });

  test('overflow surfaces as a non-finite result', () => {
    expect(errorKindOf('10 ^ 400')).toBe('NonFiniteResult');
    expect(errorKindOf('(0 - 8) ^ 0.5')).toBe('NonFiniteResult');
  });

  test('a literal too large for a number is rejected', () => {
    expect(errorKindOf('9'.repeat(400))).toBe('NonFiniteResult');
    expect(errorKindOf(`${'9'.repeat(400)} - 1`)).toBe('NonFiniteResult');
  });
});

import { parseExpression, tokenize } from '../../../src/domain/expression';

describe('tokenize', () => {
  test('produces number, operator and paren tokens with positions', () => {
    expect(tokenize('(1 + 2.5)')).toEqual([
      { type: 'lparen', position: 0 },
      { type: 'number', value: 1, position: 1 },
      { type: 'operator', operator: '+', position: 3 },
      { type: 'number', value: 2.5, position: 5 },
      { type: 'rparen', position: 8 },
    ]);
  });
});

describe('parseExpression', () => {
  test('builds a tree with multiplication below addition', () => {
    expect(parseExpression('1 + 2 * 3')).toEqual({
      kind: 'binary',
      operator: '+',
      left: { kind: 'number', value: 1 },
      right: {
        kind: 'binary',
        operator: '*',
        left: { kind: 'number', value: 2 },
        right: { kind: 'number', value: 3 },
      },
    });
  });

  test('returns frozen nodes', () => {
    const tree = parseExpression('4 - 1');
    expect(Object.isFrozen(tree)).toBe(true);
  });
});

import { isFinal } from '../../src/shared/contracts';

describe('shared/contracts', () => {
  test('isFinal distinguishes final answers from tool requests', () => {
    expect(isFinal({ kind: 'final', text: 'done' })).toBe(true);
    expect(isFinal({ kind: 'tool_requests', requests: [] })).toBe(false);
  });
});

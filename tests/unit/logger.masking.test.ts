import { maskSensitiveData, redactToken } from '../../src/server/utils/logger';

describe('logger masking', () => {
  it('keeps the first 8 characters of a token', () => {
    expect(redactToken('tok_pp01_abcdefghijklmnop')).toBe('tok_pp01...');
    expect(redactToken('short')).toBe('[REDACTED]');
  });

  it('redacts sensitive keys at any depth and leaves the rest alone', () => {
    const masked = maskSensitiveData({
      matchId: 'lg_R1_M001',
      auth_token: 'tok_rref01_abcdefghijklmnop',
      params: {
        sender: 'referee:REF01',
        Authorization: 'Bearer test-secret',
        nested: [{ clientSecret: 12345 }],
      },
      token: null,
    });

    expect(masked).toEqual({
      matchId: 'lg_R1_M001',
      auth_token: 'tok_rref...',
      params: {
        sender: 'referee:REF01',
        Authorization: 'Bearer t...',
        nested: [{ clientSecret: '[REDACTED]' }],
      },
      token: null,
    });
  });

  it('stops at the depth limit', () => {
    expect(maskSensitiveData({ a: { b: { c: 1 } } }, 2)).toEqual({
      a: { b: '[MAX_DEPTH_EXCEEDED]' },
    });
  });
});

import { UnauthorizedException } from '@nestjs/common';
import { extractCallerId } from './caller-id.decorator';

describe('extractCallerId', () => {
  it('should return the trimmed header value', () => {
    expect(extractCallerId('  alice ')).toBe('alice');
  });

  it('should take the first value of a repeated header', () => {
    expect(extractCallerId(['bob', 'mallory'])).toBe('bob');
  });

  it('should reject a missing or blank header', () => {
    expect(() => extractCallerId(undefined)).toThrow(UnauthorizedException);
    expect(() => extractCallerId('   ')).toThrow('x-user-id header is required');
  });
});

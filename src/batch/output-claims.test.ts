import { describe, it, expect } from 'vitest';
import { OutputClaims } from './output-claims';

describe('OutputClaims', () => {
  it('gives a path to its first owner only', () => {
    const claims = new OutputClaims();

    expect(claims.claim('/out/x2/shapes/rail.nl2mat', 'group-1')).toBe(true);
    expect(claims.claim('/out/x2/shapes/rail.nl2mat', 'group-1')).toBe(true);
    expect(claims.claim('/out/x2/shapes/rail.nl2mat', 'group-2')).toBe(false);
    expect(claims.ownerOf('/out/x2/shapes/rail.nl2mat')).toBe('group-1');
    expect(claims.ownerOf('/out/x3/shapes/rail.nl2mat')).toBeUndefined();
    expect(claims.size).toBe(1);
  });
});

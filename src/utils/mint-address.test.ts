import { describe, it, expect } from 'vitest';
import { isValidMintAddress } from './mint-address.js';

describe('isValidMintAddress', () => {
  it('should accept real base58 public keys', () => {
    expect(isValidMintAddress('So11111111111111111111111111111111111111112')).toBe(true);
    expect(isValidMintAddress('EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v')).toBe(true);
  });

  it('should reject short, non-base58 or empty strings', () => {
    expect(isValidMintAddress('Abc123')).toBe(false);
    expect(isValidMintAddress('0OIl0OIl0OIl0OIl0OIl0OIl0OIl0OIl')).toBe(false);
    expect(isValidMintAddress('')).toBe(false);
  });
});

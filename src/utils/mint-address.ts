import { PublicKey } from '@solana/web3.js';

const BASE58_PATTERN = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

/**
 * True when the string decodes to a 32-byte Solana public key.
 */
export function isValidMintAddress(value: string): boolean {
  if (!BASE58_PATTERN.test(value)) return false;
  try {
    return new PublicKey(value).toBase58() === value;
  } catch {
    return false;
  }
}

/**
 * Pump.fun grinds its mint keypairs to end in "pump".
 */
export function isLaunchpadMint(address: string): boolean {
  return address.endsWith('pump');
}

import { formatUnits } from 'viem';

/** 1 NEAR = 10^24 yoctoNEAR */
export const NEAR_DECIMALS = 24;

const DISPLAY_DECIMALS = 4;
const DISPLAY_UNIT = 10n ** BigInt(NEAR_DECIMALS - DISPLAY_DECIMALS);

/**
 * Format a yoctoNEAR amount as "X.XXXX NEAR", rounded half up
 */
export function formatNear(yocto: bigint): string {
  const scaled = (yocto + DISPLAY_UNIT / 2n) / DISPLAY_UNIT;
  const [whole, fraction = ''] = formatUnits(scaled, DISPLAY_DECIMALS).split('.');
  return `${whole}.${fraction.padEnd(DISPLAY_DECIMALS, '0')} NEAR`;
}

/**
 * Format a nanosecond block timestamp to ISO string
 */
export function formatTimestamp(nanoseconds: string): string {
  if (!/^\d+$/.test(nanoseconds)) {
    return 'Invalid Timestamp';
  }
  const millis = Number(BigInt(nanoseconds) / 1_000_000n);
  const date = new Date(millis);
  if (Number.isNaN(date.getTime())) {
    return 'Invalid Timestamp';
  }
  return date.toISOString();
}

/**
 * Current wall-clock time for console output
 */
export function nowTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Shorten transaction hash for display
 */
export function shortenHash(hash: string): string {
  if (hash.length <= 10) return hash;
  return `${hash.slice(0, 10)}...`;
}

import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatBalanceLine, printTransactions } from './formatter.js';

describe('CLI formatter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format a balance line', () => {
    expect(formatBalanceLine('alice.near', 15n * 10n ** 23n, '2024-01-01T00:00:00.000Z')).toBe(
      '[2024-01-01T00:00:00.000Z] alice.near — 1.5000 NEAR'
    );
  });

  it('should print one block per transaction', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printTransactions('alice.near', [
      { hash: 'h1', from: 'alice.near', to: 'bob.near', amount: 0n, timestamp: '1' },
      { hash: 'h2', from: 'bob.near', to: 'alice.near', amount: 0n, timestamp: '2' },
    ]);

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.filter((line) => line.includes('Hash:'))).toHaveLength(2);
  });
});

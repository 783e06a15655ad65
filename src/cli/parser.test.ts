import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseCliArgs, parsePositiveInt } from './parser.js';

const argv = (...args: string[]) => ['node', 'near-monitor', ...args];

describe('CLI parser', () => {
  it('should parse balance', () => {
    expect(parseCliArgs(argv('balance', 'alice.near'))).toEqual({ kind: 'balance', accountId: 'alice.near' });
  });

  it('should parse txs', () => {
    expect(parseCliArgs(argv('txs', 'alice.near'))).toEqual({ kind: 'txs', accountId: 'alice.near' });
  });

  it('should default the monitor interval to ten seconds', () => {
    expect(parseCliArgs(argv('monitor', 'alice.near'))).toEqual({
      kind: 'monitor',
      accountId: 'alice.near',
      intervalSeconds: 10,
    });
  });

  it('should accept a monitor interval', () => {
    expect(parseCliArgs(argv('monitor', 'alice.near', '--interval', '30'))).toEqual({
      kind: 'monitor',
      accountId: 'alice.near',
      intervalSeconds: 30,
    });
  });

  it('should leave the bot interval to the environment unless given', () => {
    expect(parseCliArgs(argv('bot'))).toEqual({ kind: 'bot', intervalSeconds: undefined });
    expect(parseCliArgs(argv('bot', '-i', '120'))).toEqual({ kind: 'bot', intervalSeconds: 120 });
  });

  describe('parsePositiveInt', () => {
    it('should parse whole numbers', () => {
      expect(parsePositiveInt('15')).toBe(15);
    });

    it.each(['0', '-5', '1.5', 'abc', ''])('should reject %j', (value) => {
      expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
    });
  });
});

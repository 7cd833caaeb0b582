import { describe, it, expect, beforeEach } from 'vitest';
import { DedupCache, DEFAULT_COOLDOWN_MS, DEFAULT_RETENTION_MS } from '../src/dedup/dedup-cache.js';
import { contentFingerprint, normalizeForFingerprint } from '../src/dedup/fingerprint.js';

describe('contentFingerprint', () => {
  it('ignores case and surrounding or repeated whitespace', () => {
    expect(normalizeForFingerprint('  ETH   LONG\n')).toBe('eth long');
    expect(contentFingerprint('Hello  World ')).toBe(contentFingerprint('hello world'));
    expect(contentFingerprint('hello world!')).not.toBe(contentFingerprint('hello world'));
  });

  it('is a sha256 hex digest', () => {
    expect(contentFingerprint('abc')).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('DedupCache', () => {
  let cache: DedupCache;

  beforeEach(() => {
    cache = new DedupCache();
  });

  it('uses 24h retention and 5s cooldown by default', () => {
    expect(cache.retentionMs).toBe(DEFAULT_RETENTION_MS);
    expect(cache.cooldownMs).toBe(DEFAULT_COOLDOWN_MS);
    expect(DEFAULT_RETENTION_MS).toBe(86_400_000);
    expect(DEFAULT_COOLDOWN_MS).toBe(5_000);
  });

  it('rejects normalized duplicates', () => {
    expect(cache.admit('ETH LONG', null, 0).accepted).toBe(true);
    const verdict = cache.admit('  eth   long ', null, 10);
    expect(verdict).toMatchObject({ accepted: false, reason: 'duplicate' });
    expect(cache.has('Eth Long')).toBe(true);
  });

  it('checks the fingerprint before the symbol cooldown', () => {
    cache.admit('a', 'BTCUSDT', 0);
    expect(cache.admit('a', 'BTCUSDT', 1)).toMatchObject({ accepted: false, reason: 'duplicate' });
  });

  it('suppresses a second symbol signal inside the cooldown window', () => {
    expect(cache.admit('first', 'BTCUSDT', 0).accepted).toBe(true);
    expect(cache.admit('second', 'BTCUSDT', 1_000)).toMatchObject({ accepted: false, reason: 'cooldown' });
    expect(cache.admit('third', 'BTCUSDT', 5_000).accepted).toBe(true);
  });

  it('does not extend the cooldown with rejected messages', () => {
    cache.admit('first', 'BTCUSDT', 0);
    cache.admit('second', 'BTCUSDT', 4_000);
    expect(cache.admit('third', 'BTCUSDT', 5_000).accepted).toBe(true);
  });

  it('applies no cooldown when the symbol is null', () => {
    expect(cache.admit('a', null, 0).accepted).toBe(true);
    expect(cache.admit('b', null, 1).accepted).toBe(true);
    expect(cache.stats()).toEqual({ seen: 2, cooldowns: 0 });
  });

  it('forgets a fingerprint once retention has elapsed', () => {
    cache.admit('x', null, 0);
    expect(cache.admit('x', null, DEFAULT_RETENTION_MS - 1).accepted).toBe(false);
    expect(cache.admit('x', null, DEFAULT_RETENTION_MS).accepted).toBe(true);
  });

  it('sweeps expired entries and reports how many were removed', () => {
    cache.admit('a', 'BTCUSDT', 0);
    cache.admit('b', null, 1);
    expect(cache.stats()).toEqual({ seen: 2, cooldowns: 1 });

    expect(cache.sweep(5_000)).toBe(1);
    expect(cache.stats()).toEqual({ seen: 2, cooldowns: 0 });

    expect(cache.sweep(DEFAULT_RETENTION_MS + 1)).toBe(2);
    expect(cache.stats()).toEqual({ seen: 0, cooldowns: 0 });
  });

  it('honours custom windows and clears everything', () => {
    const short = new DedupCache({ retentionMs: 100, cooldownMs: 10 });
    short.admit('a', 'ETHUSDT', 0);
    expect(short.admit('b', 'ETHUSDT', 9).accepted).toBe(false);
    expect(short.admit('b', 'ETHUSDT', 10).accepted).toBe(true);
    expect(short.admit('a', null, 100).accepted).toBe(true);

    short.clear();
    expect(short.stats()).toEqual({ seen: 0, cooldowns: 0 });
  });
});

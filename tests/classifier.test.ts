import { describe, it, expect } from 'vitest';
import { classifySignal } from '../src/signal/classifier.js';

describe('classifySignal', () => {
  it('classifies a complete leveraged signal as open-signal', () => {
    const result = classifySignal('ETH/USDT LONG\nLeverage 30x\nEntries 4089\nTarget 1 4150\nSL 4020');
    expect(result).toEqual({
      kind: 'open-signal',
      signal: {
        symbol: 'ETHUSDT',
        direction: 'LONG',
        leverage: '30X',
        entryPrice: '4089',
        takeProfit: '4150',
        stopLoss: '4020',
      },
    });
  });

  it('gives cancellation precedence over a leverage mention', () => {
    expect(classifySignal('#BTCUSDT Manually Cancelled, was using Leverage 20x')).toEqual({
      kind: 'cancellation',
      symbol: 'BTCUSDT',
    });
  });

  it('reads the symbol after the cancel phrase', () => {
    expect(classifySignal('Manually Cancelled #ETHUSDT')).toEqual({ kind: 'cancellation', symbol: 'ETHUSDT' });
    expect(classifySignal('Manually Cancelled BTCUSDT')).toEqual({ kind: 'cancellation', symbol: 'BTCUSDT' });
    expect(classifySignal('Manually Cancelled ETH/USDT')).toEqual({ kind: 'cancellation', symbol: 'ETHUSDT' });
  });

  it('accepts lower-case marked tokens', () => {
    expect(classifySignal('manually cancelled $sol')).toEqual({ kind: 'cancellation', symbol: 'SOLUSDT' });
  });

  it('joins dash and underscore pairs in either order', () => {
    const expected = { kind: 'cancellation', symbol: 'ETHBTC' };
    expect(classifySignal('ETH-BTC Manually Cancelled')).toEqual(expected);
    expect(classifySignal('ETH_BTC manually cancelled')).toEqual(expected);
    expect(classifySignal('Manually Cancelled ETH-BTC')).toEqual(expected);
    expect(classifySignal('Manually Cancelled eth_btc')).toEqual(expected);
  });

  it('does not join a spaced dash into the pair', () => {
    expect(classifySignal('Manually Cancelled BTCUSDT - was stopped out')).toEqual({
      kind: 'cancellation',
      symbol: 'BTCUSDT',
    });
  });

  it('accepts a lower-case ticker that carries its quote', () => {
    expect(classifySignal('Manually Cancelled btcusdt')).toEqual({ kind: 'cancellation', symbol: 'BTCUSDT' });
    expect(classifySignal('ethusdc manually cancelled')).toEqual({ kind: 'cancellation', symbol: 'ETHUSDC' });
  });

  it('rejects a signal whose target label carries no value', () => {
    expect(classifySignal('ETH/USDT LONG Leverage 30x Entry 4089 Target 1 SL 4020')).toEqual({ kind: 'irrelevant' });
  });

  it('only recognises the exact cancel phrase', () => {
    expect(classifySignal('Manually Canceled #BTCUSDT')).toEqual({ kind: 'irrelevant' });
  });

  it('falls back to a pair elsewhere in the message', () => {
    expect(classifySignal('Manually cancelled: the BTC/USDT long')).toEqual({
      kind: 'cancellation',
      symbol: 'BTCUSDT',
    });
  });

  it('treats a cancel phrase without any symbol as irrelevant', () => {
    expect(classifySignal('Trade manually cancelled by admin')).toEqual({ kind: 'irrelevant' });
  });

  it('requires every field for an open signal', () => {
    expect(classifySignal('Leverage 20x')).toEqual({ kind: 'irrelevant' });
    expect(classifySignal('ETH/USDT LONG Leverage 30x Entry 4089 SL 4020')).toEqual({ kind: 'irrelevant' });
  });

  it('ignores complete signals that never mention leverage', () => {
    expect(classifySignal('ETH/USDT SHORT Entry 3000 Target 2900 SL 3100')).toEqual({ kind: 'irrelevant' });
  });

  it('treats chatter and empty input as irrelevant', () => {
    expect(classifySignal('Good morning traders')).toEqual({ kind: 'irrelevant' });
    expect(classifySignal('')).toEqual({ kind: 'irrelevant' });
    expect(classifySignal(null)).toEqual({ kind: 'irrelevant' });
  });
});

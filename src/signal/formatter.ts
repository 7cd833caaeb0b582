import type { Classification, Direction, ParsedSignal } from '../types/index.js';

export const DEFAULT_EXCHANGE_LABEL = 'Binance Futures';

export interface FormatOptions {
  readonly exchangeLabel?: string;
}

const DIRECTION_MARKER: Record<Direction, string> = {
  LONG: '🟢',
  SHORT: '🔴',
};

export function formatCloseCommand(symbol: string): string {
  return `/close #${symbol.toUpperCase().replace(/[^A-Z0-9]/g, '')}`;
}

/** 가격 문자열은 그대로 출력 (110200.50 → 110200.50) */
export function formatOpenSignal(signal: ParsedSignal, options: FormatOptions = {}): string {
  const exchange = options.exchangeLabel ?? DEFAULT_EXCHANGE_LABEL;
  return [
    `${DIRECTION_MARKER[signal.direction]} Action: ${signal.direction}`,
    `Symbol: #${signal.symbol}`,
    `Exchange: ${exchange}`,
    `Leverage: Cross (${signal.leverage})`,
    `Entry: ${signal.entryPrice}`,
    `Target 1: ${signal.takeProfit}`,
    `Stop Loss: ${signal.stopLoss}`,
  ].join('\n');
}

export function formatClassification(
  classification: Classification,
  options: FormatOptions = {},
): string | null {
  switch (classification.kind) {
    case 'cancellation':
      return formatCloseCommand(classification.symbol);
    case 'open-signal':
      return formatOpenSignal(classification.signal, options);
    case 'irrelevant':
      return null;
  }
}

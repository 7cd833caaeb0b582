export type Direction = 'LONG' | 'SHORT';

/** 가격 필드는 원문 그대로의 문자열 (반올림/재포맷 없음) */
export interface ParsedSignal {
  readonly symbol: string;       // BTCUSDT
  readonly direction: Direction;
  readonly leverage: string;     // 30X, 없으면 N/A
  readonly entryPrice: string;
  readonly takeProfit: string;
  readonly stopLoss: string;
}

export interface CancellationClassification {
  readonly kind: 'cancellation';
  readonly symbol: string;
}

export interface OpenSignalClassification {
  readonly kind: 'open-signal';
  readonly signal: ParsedSignal;
}

export interface IrrelevantClassification {
  readonly kind: 'irrelevant';
}

export type Classification =
  | CancellationClassification
  | OpenSignalClassification
  | IrrelevantClassification;

import type { Direction, ParsedSignal } from '../types/index.js';

export const DEFAULT_QUOTE = 'USDT';
export const LEVERAGE_NOT_AVAILABLE = 'N/A';

/** 티커에 이미 붙어 있으면 기본 호가 통화를 덧붙이지 않음 (긴 것부터 검사) */
const KNOWN_QUOTES = ['FDUSD', 'USDT', 'USDC', 'BUSD', 'USD'] as const;

/** 심볼 후보에서 제외할 문법 키워드 */
const GRAMMAR_KEYWORDS: ReadonlySet<string> = new Set([
  'BUY', 'LONG', 'SELL', 'SHORT',
  'LEVERAGE', 'CROSS', 'ISOLATED',
  'ENTRY', 'ENTRIES', 'TARGET', 'TARGETS', 'SL', 'TP', 'STOP', 'LOSS',
  'MANUALLY', 'CANCELLED', 'CANCELED', 'CLOSE', 'CLOSED',
  'SIGNAL', 'SIGNALS', 'ACTION', 'SYMBOL', 'EXCHANGE', 'NEW', 'UPDATE',
  'FUTURES', 'SPOT', 'PERP',
  ...KNOWN_QUOTES,
]);

const PRICE = String.raw`(\d+(?:\.\d+)?)`;
/** 키워드와 값 사이 허용 구분자: 공백, :, =, -, 마크다운 강조, 통화기호 */
const SEP = String.raw`[\s:=*_\-–—]*\$?\s*`;

const SLASH_PAIR_PATTERN = /(?<![A-Za-z0-9])[#$]?([A-Za-z0-9]{2,10})\s*\/\s*([A-Za-z]{2,10})(?![A-Za-z0-9])/g;
const MARKED_TOKEN_PATTERN = /(?<![A-Za-z0-9])[#$]([A-Za-z0-9]{2,20})(?![A-Za-z0-9])/g;
/** 대소문자 구분: 원문에서 대문자로 쓰인 토큰만 */
const BARE_TOKEN_PATTERN = /(?<![A-Za-z0-9#$/.])([A-Z][A-Z0-9]{1,19})(?![A-Za-z0-9/])/g;

const DIRECTION_PATTERN = /\b(BUY|LONG|SELL|SHORT)\b/i;

const LEVERAGE_KEYWORD_PATTERN =
  /\bleverage\b\s*[:-]?\s*(?:(?:cross|isolated)\s*)?\(?\s*[:-]?\s*(\d+)\s?x(?![a-z0-9])/i;
const LEVERAGE_TOKEN_PATTERN = /(?<![\w.])(\d+)\s?x(?![a-z0-9])/i;

const ENTRY_PATTERN = new RegExp(String.raw`\bentr(?:y|ies)\b(?:\s*(?:price|zone))?${SEP}${PRICE}`, 'i');
// "Target 1 4150" 의 1 은 라벨. "Target 150", "Target 1.5", "Target: 1" 은 값.
// 값 없는 라벨("Target 1 SL ...")은 불일치
const TARGET_LABEL = String.raw`\s*1(?!\d|\.\d)`;
const TARGET_PATTERN = new RegExp(
  String.raw`\btargets?(?![a-z])(?:${TARGET_LABEL}(?=${SEP}\d))?(?!${TARGET_LABEL})${SEP}${PRICE}`,
  'i',
);
const STOP_LOSS_PATTERN = new RegExp(String.raw`\b(?:sl|stop[\s-]?loss)\b${SEP}${PRICE}`, 'i');

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function isGrammarKeyword(token: string): boolean {
  const upper = token.toUpperCase();
  return GRAMMAR_KEYWORDS.has(upper) || /^(?:TP|SL)\d+$/.test(upper);
}

/** BTCUSDT, ethusdc 처럼 호가 통화가 붙은 티커인지 */
export function hasKnownQuote(token: string): boolean {
  const upper = token.toUpperCase();
  return KNOWN_QUOTES.some((q) => upper.endsWith(q) && upper.length - q.length >= 2);
}

/**
 * base(+quote) → 거래쌍 심볼 (BTC → BTCUSDT, ETH/BTC → ETHBTC, #btcusdt → BTCUSDT)
 * 문자가 하나도 없거나 2자 미만이면 null
 */
export function toPairSymbol(base: string, quote?: string): string | null {
  const b = base.toUpperCase().replace(/[^A-Z0-9]/g, '');
  const q = (quote ?? '').toUpperCase().replace(/[^A-Z0-9]/g, '');
  if (b.length < 2 || !/[A-Z]/.test(b)) return null;
  if (q) return `${b}${q}`;

  return hasKnownQuote(b) ? b : `${b}${DEFAULT_QUOTE}`;
}

/**
 * 거래쌍 추출. 우선순위: 슬래시 표기 → #/$ 마커 토큰 → 대문자 단독 토큰
 */
export function extractPair(text: string): string | null {
  for (const m of text.matchAll(SLASH_PAIR_PATTERN)) {
    const [, base = '', quote = ''] = m;
    if (isGrammarKeyword(base)) continue;
    const symbol = toPairSymbol(base, quote);
    if (symbol) return symbol;
  }

  for (const m of text.matchAll(MARKED_TOKEN_PATTERN)) {
    const token = m[1] ?? '';
    if (isGrammarKeyword(token)) continue;
    const symbol = toPairSymbol(token);
    if (symbol) return symbol;
  }

  for (const m of text.matchAll(BARE_TOKEN_PATTERN)) {
    const token = m[1] ?? '';
    if (isGrammarKeyword(token)) continue;
    const symbol = toPairSymbol(token);
    if (symbol) return symbol;
  }

  return null;
}

export function extractDirection(text: string): Direction | null {
  const m = DIRECTION_PATTERN.exec(text);
  if (!m?.[1]) return null;
  const keyword = m[1].toUpperCase();
  return keyword === 'BUY' || keyword === 'LONG' ? 'LONG' : 'SHORT';
}

/** 30x → 30X. "Leverage" 뒤 값 우선, 없으면 처음 나오는 NNx 토큰 */
export function extractLeverage(text: string): string | null {
  const m = LEVERAGE_KEYWORD_PATTERN.exec(text) ?? LEVERAGE_TOKEN_PATTERN.exec(text);
  return m?.[1] ? `${m[1]}X` : null;
}

export function extractEntryPrice(text: string): string | null {
  return ENTRY_PATTERN.exec(text)?.[1] ?? null;
}

export function extractTakeProfit(text: string): string | null {
  return TARGET_PATTERN.exec(text)?.[1] ?? null;
}

export function extractStopLoss(text: string): string | null {
  return STOP_LOSS_PATTERN.exec(text)?.[1] ?? null;
}

/**
 * 신호 필드 추출. 심볼·방향·진입·목표·손절이 모두 있어야 ParsedSignal
 * (레버리지는 선택, 없으면 N/A). 부분 일치는 null.
 */
export function extractSignal(text: string | null | undefined): ParsedSignal | null {
  if (!text) return null;
  const normalized = normalizeWhitespace(text);
  if (!normalized) return null;

  const symbol = extractPair(normalized);
  const direction = extractDirection(normalized);
  const entryPrice = extractEntryPrice(normalized);
  const takeProfit = extractTakeProfit(normalized);
  const stopLoss = extractStopLoss(normalized);

  if (!symbol || !direction || !entryPrice || !takeProfit || !stopLoss) {
    return null;
  }

  return {
    symbol,
    direction,
    leverage: extractLeverage(normalized) ?? LEVERAGE_NOT_AVAILABLE,
    entryPrice,
    takeProfit,
    stopLoss,
  };
}

import type { Classification } from '../types/index.js';
import {
  extractPair,
  extractSignal,
  hasKnownQuote,
  isGrammarKeyword,
  normalizeWhitespace,
  toPairSymbol,
} from './extractor.js';

const CANCEL_PHRASE = String.raw`\bmanually\s+cancelled\b`;
// 거래쌍 구분자: 슬래시는 앞뒤 공백 허용, - 와 _ 는 붙여 쓴 경우만 ("BTCUSDT - was" 방지)
const SYMBOL_TOKEN = String.raw`([#$]?)([A-Za-z0-9]{2,20}(?:\s*\/\s*[A-Za-z]{2,10}|[-_][A-Za-z]{2,10})?)`;
const CANCEL_SEP = String.raw`[\s:,\-–—]*`;

const CANCEL_PHRASE_PATTERN = new RegExp(CANCEL_PHRASE, 'i');
const PHRASE_THEN_SYMBOL_PATTERN = new RegExp(
  String.raw`${CANCEL_PHRASE}${CANCEL_SEP}${SYMBOL_TOKEN}(?![A-Za-z0-9])`,
  'gi',
);
const SYMBOL_THEN_PHRASE_PATTERN = new RegExp(
  String.raw`(?<![A-Za-z0-9#$/_-])${SYMBOL_TOKEN}${CANCEL_SEP}${CANCEL_PHRASE}`,
  'gi',
);
const LEVERAGE_KEYWORD_PATTERN = /leverage/i;

/**
 * 취소 문구 옆 토큰 → 심볼
 * 마커(#/$)나 구분자(/ - _) 표기는 대소문자 무관.
 * 맨 토큰은 원문이 대문자이거나 호가 통화로 끝나야 함 ("cancelled by admin" 방지, "btcusdt" 허용)
 */
function resolveCancellationToken(marker: string, token: string): string | null {
  const compact = token.replace(/\s+/g, '');
  const [base = '', quote] = compact.split(/[/_-]/);
  if (isGrammarKeyword(base)) return null;
  if (!marker && quote === undefined && base !== base.toUpperCase() && !hasKnownQuote(base)) return null;
  return toPairSymbol(base, quote);
}

function findCancellationSymbol(text: string): string | null {
  for (const pattern of [PHRASE_THEN_SYMBOL_PATTERN, SYMBOL_THEN_PHRASE_PATTERN]) {
    for (const m of text.matchAll(pattern)) {
      const symbol = resolveCancellationToken(m[1] ?? '', m[2] ?? '');
      if (symbol) return symbol;
    }
  }
  // 인접 토큰이 없으면 본문 전체에서 거래쌍 탐색
  return extractPair(text);
}

/**
 * 메시지 분류. 순서가 곧 우선순위 (먼저 맞는 것이 이김):
 *  1. 취소 문구 → cancellation (심볼을 못 찾으면 irrelevant, 2단계로 넘어가지 않음)
 *  2. "leverage" 포함 + 필드 추출 성공 → open-signal
 *  3. 그 외 → irrelevant
 */
export function classifySignal(text: string | null | undefined): Classification {
  if (!text) return { kind: 'irrelevant' };
  const normalized = normalizeWhitespace(text);

  if (CANCEL_PHRASE_PATTERN.test(normalized)) {
    const symbol = findCancellationSymbol(normalized);
    return symbol ? { kind: 'cancellation', symbol } : { kind: 'irrelevant' };
  }

  if (LEVERAGE_KEYWORD_PATTERN.test(normalized)) {
    const signal = extractSignal(normalized);
    return signal ? { kind: 'open-signal', signal } : { kind: 'irrelevant' };
  }

  return { kind: 'irrelevant' };
}

import { createChildLogger } from '../logger.js';
import { classifySignal } from '../signal/classifier.js';
import { formatClassification, type FormatOptions } from '../signal/formatter.js';
import { DedupCache, type DedupCacheOptions, type DedupStats } from '../dedup/dedup-cache.js';
import type { Classification, DropReason } from '../types/index.js';

const log = createChildLogger('pipeline');

export interface SignalPipelineOptions extends DedupCacheOptions, FormatOptions {
  /** 테스트용 시계 주입 */
  readonly now?: () => number;
}

export type PipelineDecision =
  | {
      readonly action: 'emit';
      readonly text: string;
      readonly classification: Classification;
    }
  | {
      readonly action: 'drop';
      readonly reason: DropReason;
      readonly classification: Classification;
    };

/** 쿨다운 키. 신규 신호와 취소 명령 모두 심볼 단위로 묶음 */
function symbolOf(classification: Classification): string | null {
  switch (classification.kind) {
    case 'cancellation':
      return classification.symbol;
    case 'open-signal':
      return classification.signal.symbol;
    case 'irrelevant':
      return null;
  }
}

/**
 * 분류 → 포맷 → 중복 게이트
 * 두 캐시 맵은 이 인스턴스가 단독 소유. 전부 동기 처리
 */
export class SignalPipeline {
  private readonly cache: DedupCache;
  private readonly format: FormatOptions;
  private readonly now: () => number;

  constructor(options: SignalPipelineOptions = {}) {
    this.cache = new DedupCache(options);
    this.format = { exchangeLabel: options.exchangeLabel };
    this.now = options.now ?? Date.now;
  }

  /** 전달할 텍스트, 또는 버릴 경우 null */
  process(text: string | null | undefined, arrivalTime?: number): string | null {
    const decision = this.evaluate(text, arrivalTime);
    return decision.action === 'emit' ? decision.text : null;
  }

  evaluate(text: string | null | undefined, arrivalTime?: number): PipelineDecision {
    const now = arrivalTime ?? this.now();

    if (!text || !text.trim()) {
      this.cache.sweep(now);
      return { action: 'drop', reason: 'empty', classification: { kind: 'irrelevant' } };
    }

    const classification = classifySignal(text);
    const candidate = formatClassification(classification, this.format);
    if (candidate === null) {
      this.cache.sweep(now);
      return { action: 'drop', reason: 'irrelevant', classification };
    }

    const symbol = symbolOf(classification);
    const verdict = this.cache.admit(text, symbol, now);
    if (!verdict.accepted) {
      log.debug({ reason: verdict.reason, symbol, fingerprint: verdict.fingerprint }, 'Candidate suppressed');
      return { action: 'drop', reason: verdict.reason, classification };
    }

    return { action: 'emit', text: candidate, classification };
  }

  stats(): DedupStats {
    return this.cache.stats();
  }

  reset(): void {
    this.cache.clear();
  }
}

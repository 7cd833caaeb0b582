import { contentFingerprint } from './fingerprint.js';

export const DEFAULT_RETENTION_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_COOLDOWN_MS = 5 * 1000;

export interface DedupCacheOptions {
  /** 동일 본문 억제 기간 */
  readonly retentionMs?: number;
  /** 같은 심볼 연속 신호 억제 기간 */
  readonly cooldownMs?: number;
}

export type DedupVerdict =
  | { readonly accepted: true; readonly fingerprint: string }
  | { readonly accepted: false; readonly fingerprint: string; readonly reason: 'duplicate' | 'cooldown' };

export interface DedupStats {
  readonly seen: number;
  readonly cooldowns: number;
}

/**
 * 중복 억제 캐시
 * - seen: 원문 지문 → 최초 수락 시각 (장기, 기본 24h)
 * - cooldowns: 심볼 → 마지막 수락 시각 (단기, 기본 5s)
 * 타이머 없음. 만료 정리는 메시지가 들어올 때마다 수행 (정리 빈도 = 트래픽)
 */
export class DedupCache {
  private readonly seen = new Map<string, number>();
  private readonly cooldowns = new Map<string, number>();
  readonly retentionMs: number;
  readonly cooldownMs: number;

  constructor(options: DedupCacheOptions = {}) {
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
  }

  /**
   * 정리 → 지문 조회 → 심볼 쿨다운 조회 → 수락 기록.
   * 동기 실행이라 조회와 기록 사이에 다른 메시지가 끼어들 수 없음
   */
  admit(rawText: string, symbol: string | null, now: number): DedupVerdict {
    const fingerprint = contentFingerprint(rawText);
    this.sweep(now);

    if (this.seen.has(fingerprint)) {
      return { accepted: false, fingerprint, reason: 'duplicate' };
    }

    if (symbol) {
      const last = this.cooldowns.get(symbol);
      if (last !== undefined && now - last < this.cooldownMs) {
        return { accepted: false, fingerprint, reason: 'cooldown' };
      }
    }

    this.seen.set(fingerprint, now);
    if (symbol) {
      this.cooldowns.set(symbol, now);
    }
    return { accepted: true, fingerprint };
  }

  /** 기간이 지난 항목 제거. 제거한 개수 반환 */
  sweep(now: number): number {
    let removed = 0;
    for (const [fingerprint, acceptedAt] of this.seen) {
      if (now - acceptedAt >= this.retentionMs) {
        this.seen.delete(fingerprint);
        removed++;
      }
    }
    for (const [symbol, acceptedAt] of this.cooldowns) {
      if (now - acceptedAt >= this.cooldownMs) {
        this.cooldowns.delete(symbol);
        removed++;
      }
    }
    return removed;
  }

  has(rawText: string): boolean {
    return this.seen.has(contentFingerprint(rawText));
  }

  stats(): DedupStats {
    return { seen: this.seen.size, cooldowns: this.cooldowns.size };
  }

  clear(): void {
    this.seen.clear();
    this.cooldowns.clear();
  }
}

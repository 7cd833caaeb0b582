import type { EventBus } from '../pipeline/event-bus.js';
import type { DropReason } from '../types/index.js';

export interface RelayStatsSnapshot {
  readonly startedAt: number;
  readonly received: number;
  readonly forwarded: number;
  readonly cancellations: number;
  readonly dropped: Readonly<Record<DropReason, number>>;
  readonly sendFailures: number;
  readonly lastReceivedAt: number | null;
  readonly lastForwardedAt: number | null;
}

/**
 * 상태 API / keep-alive가 읽는 누적 카운터. 이벤트 버스 구독으로만 갱신
 */
export class RelayStats {
  private readonly startedAt: number;
  private received = 0;
  private forwarded = 0;
  private cancellations = 0;
  private dropped: Record<DropReason, number> = { empty: 0, irrelevant: 0, duplicate: 0, cooldown: 0 };
  private sendFailures = 0;
  private lastReceivedAt: number | null = null;
  private lastForwardedAt: number | null = null;

  constructor(bus: EventBus, startedAt: number = Date.now()) {
    this.startedAt = startedAt;

    bus.on('MESSAGE_RECEIVED', (e) => {
      this.received++;
      this.lastReceivedAt = e.timestamp;
    });
    bus.on('MESSAGE_FORWARDED', (e) => {
      this.forwarded++;
      if (e.classification.kind === 'cancellation') this.cancellations++;
      this.lastForwardedAt = e.timestamp;
    });
    bus.on('MESSAGE_DROPPED', (e) => {
      this.dropped[e.reason]++;
    });
    bus.on('SEND_FAILED', () => {
      this.sendFailures++;
    });
  }

  snapshot(): RelayStatsSnapshot {
    return {
      startedAt: this.startedAt,
      received: this.received,
      forwarded: this.forwarded,
      cancellations: this.cancellations,
      dropped: { ...this.dropped },
      sendFailures: this.sendFailures,
      lastReceivedAt: this.lastReceivedAt,
      lastForwardedAt: this.lastForwardedAt,
    };
  }
}

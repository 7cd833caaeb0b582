import cron, { type ScheduledTask } from 'node-cron';
import { createChildLogger } from '../logger.js';
import type { RelayStats } from './relay-stats.js';

const log = createChildLogger('keep-alive');

export interface Poller {
  isRunning(): boolean;
  restart(): boolean;
}

/** 하트비트 1회: 상태 로그 + 폴러가 멈췄으면 재기동. 재기동했으면 true */
export function runHeartbeat(poller: Poller, stats: RelayStats, now: number = Date.now()): boolean {
  const snap = stats.snapshot();
  log.info(
    {
      uptimeSec: Math.floor((now - snap.startedAt) / 1000),
      received: snap.received,
      forwarded: snap.forwarded,
    },
    'Keep-alive ping',
  );

  if (poller.isRunning()) return false;

  log.warn('Poller not running, restarting');
  return poller.restart();
}

/**
 * 주기 하트비트 (기본 3분). 호스팅 인스턴스 유휴 종료 방지 + 폴러 감시
 */
export function startKeepAlive(poller: Poller, stats: RelayStats, expression: string): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid KEEP_ALIVE_CRON expression: ${expression}`);
  }
  const task = cron.schedule(expression, () => {
    try {
      runHeartbeat(poller, stats);
    } catch (err) {
      log.error({ err }, 'Keep-alive error');
    }
  });
  log.info({ expression }, 'Keep-alive scheduled');
  return task;
}

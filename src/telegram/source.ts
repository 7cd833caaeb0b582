import { createChildLogger } from '../logger.js';
import type { RawMessage } from '../types/index.js';
import { sleep, TelegramApiError, type BotApi } from './client.js';
import { updatesSchema, type TelegramChat, type TelegramMessage } from './schemas.js';

const log = createChildLogger('telegram-source');

export type MessageHandler = (message: RawMessage) => void | Promise<void>;

export interface TelegramSourceOptions {
  readonly api: BotApi;
  /** @username 또는 숫자 chat id (-100...) */
  readonly channel: string;
  readonly pollTimeoutSeconds?: number;
  readonly retryDelayMs?: number;
  /** 기동 전에 쌓인 업데이트는 건너뜀 (재시작 시 지난 신호 재전송 방지) */
  readonly skipBacklog?: boolean;
}

export function matchesChannel(chat: TelegramChat, channel: string): boolean {
  const wanted = channel.trim();
  if (/^-?\d+$/.test(wanted)) {
    return chat.id === Number(wanted);
  }
  const username = wanted.replace(/^@/, '').replace(/^https?:\/\/t\.me\//i, '').toLowerCase();
  return chat.username?.toLowerCase() === username;
}

export function toRawMessage(post: TelegramMessage): RawMessage {
  return {
    id: post.message_id,
    text: post.text ?? post.caption,
    chatId: post.chat.id,
    date: post.date,
  };
}

/**
 * getUpdates 롱폴링 소스
 * - 소스 채널 게시물(channel_post / message)만 핸들러로 전달
 * - 업데이트 하나 처리 실패해도 offset은 전진 (같은 업데이트 무한 재처리 방지)
 * - 폴링 실패 시 retryDelayMs 대기 후 계속
 */
export class TelegramSource {
  private readonly api: BotApi;
  private readonly channel: string;
  private readonly pollTimeoutSeconds: number;
  private readonly retryDelayMs: number;
  private readonly skipBacklog: boolean;
  private offset = 0;
  private running = false;
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private handler: MessageHandler | null = null;

  constructor(options: TelegramSourceOptions) {
    this.api = options.api;
    this.channel = options.channel;
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 25;
    this.retryDelayMs = options.retryDelayMs ?? 5000;
    this.skipBacklog = options.skipBacklog ?? true;
  }

  get nextOffset(): number {
    return this.offset;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(handler: MessageHandler): void {
    if (this.running) return;
    this.handler = handler;
    this.running = true;
    this.abort = new AbortController();
    this.loop = this.run(handler, this.abort.signal);
    log.info({ channel: this.channel }, 'Polling started');
  }

  /** keep-alive에서 호출 — 마지막 핸들러로 재기동 */
  restart(): boolean {
    if (this.running || !this.handler) return false;
    this.start(this.handler);
    return true;
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.abort?.abort();
    await this.loop;
    this.loop = null;
    log.info('Polling stopped');
  }

  /** 대기 중인 업데이트를 소비하지 않고 건너뜀 */
  async skipPending(signal?: AbortSignal): Promise<void> {
    const updates = await this.api.call('getUpdates', { offset: -1, timeout: 0 }, updatesSchema, { signal });
    const last = updates[updates.length - 1];
    if (last) {
      this.offset = last.update_id + 1;
      log.info({ offset: this.offset }, 'Skipped pending updates');
    }
  }

  /** 1회 폴링. 핸들러로 전달한 메시지 수 반환 */
  async pollOnce(handler: MessageHandler, signal?: AbortSignal): Promise<number> {
    const updates = await this.api.call(
      'getUpdates',
      {
        offset: this.offset,
        timeout: this.pollTimeoutSeconds,
        allowed_updates: ['channel_post', 'message'],
      },
      updatesSchema,
      { timeoutMs: (this.pollTimeoutSeconds + 10) * 1000, signal },
    );

    let delivered = 0;
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);
      const post = update.channel_post ?? update.message;
      if (!post || !matchesChannel(post.chat, this.channel)) continue;

      try {
        await handler(toRawMessage(post));
        delivered++;
      } catch (err) {
        log.error({ err, updateId: update.update_id }, 'Message handler failed');
      }
    }
    return delivered;
  }

  private async run(handler: MessageHandler, signal: AbortSignal): Promise<void> {
    if (this.skipBacklog) {
      try {
        await this.skipPending(signal);
      } catch (err) {
        if (!signal.aborted) log.warn({ err }, 'Could not skip pending updates');
      }
    }

    while (this.running) {
      try {
        await this.pollOnce(handler, signal);
      } catch (err) {
        if (signal.aborted) break;
        if (err instanceof TelegramApiError && (err.errorCode === 401 || err.errorCode === 404)) {
          // 토큰 오류는 재시도 무의미 — keep-alive가 주기적으로 재기동 시도
          log.error({ err }, 'Polling halted');
          break;
        }
        log.warn({ err }, 'Polling failed, backing off');
        await sleep(this.retryDelayMs, signal);
      }
    }
    this.running = false;
  }
}

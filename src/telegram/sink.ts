import { createChildLogger } from '../logger.js';
import type { BotApi } from './client.js';
import { messageSchema } from './schemas.js';

const log = createChildLogger('telegram-sink');

export type SendFailureHandler = (text: string, err: unknown) => void;

export interface TelegramSinkOptions {
  readonly api: BotApi;
  readonly chatId: string;
  /** 메시지 간 최소 간격 */
  readonly intervalMs?: number;
  readonly onFailure?: SendFailureHandler;
}

/**
 * 타깃 채널 전송 큐
 * - 큐 + 초당 1건 제한 (rate limit 준수)
 * - 전송 실패 시 로그만 남기고 다음 메시지 진행
 */
export class TelegramSink {
  private readonly api: BotApi;
  private readonly chatId: string;
  private readonly intervalMs: number;
  private readonly onFailure?: SendFailureHandler;
  private readonly queue: string[] = [];
  private processing = false;
  private drained: Promise<void> = Promise.resolve();

  constructor(options: TelegramSinkOptions) {
    this.api = options.api;
    this.chatId = options.chatId;
    this.intervalMs = options.intervalMs ?? 1000;
    this.onFailure = options.onFailure;
  }

  send(text: string): void {
    this.queue.push(text);
    if (!this.processing) {
      this.drained = this.processQueue();
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  /** 큐가 빌 때까지 대기 (종료 시 사용) */
  flush(): Promise<void> {
    return this.drained;
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    let msg = this.queue.shift();
    while (msg !== undefined) {
      try {
        await this.api.call(
          'sendMessage',
          { chat_id: this.chatId, text: msg, disable_web_page_preview: true },
          messageSchema,
        );
        log.debug({ chatId: this.chatId }, 'Message delivered');
      } catch (err) {
        log.warn({ err }, 'Telegram send failed');
        this.onFailure?.(msg, err);
      }
      msg = this.queue.shift();
      if (msg !== undefined) {
        await new Promise((r) => setTimeout(r, this.intervalMs));
      }
    }
    this.processing = false;
  }
}

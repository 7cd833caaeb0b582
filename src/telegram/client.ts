import { request as undiciRequest } from 'undici';
import type { z } from 'zod';
import { createChildLogger } from '../logger.js';
import { apiResponseSchema } from './schemas.js';

const log = createChildLogger('telegram-client');

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_RETRIES = 3;
const RETRY_BASE_MS = 1000;

export interface CallOptions {
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

/** 소스/싱크가 의존하는 Bot API 호출 인터페이스 (테스트에서 가짜로 대체) */
export interface BotApi {
  call<T>(
    method: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T>,
    options?: CallOptions,
  ): Promise<T>;
}

export class TelegramApiError extends Error {
  constructor(
    message: string,
    readonly method: string,
    readonly errorCode?: number,
  ) {
    super(message);
    this.name = 'TelegramApiError';
  }
}

export interface TelegramBotClientOptions {
  readonly token: string;
  readonly baseUrl?: string;
  readonly maxRetries?: number;
  readonly retryBaseMs?: number;
  readonly timeoutMs?: number;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** 401 = 토큰 오류, 404 = 봇 없음. 재시도해도 소용없음 */
function isAuthError(status: number): boolean {
  return status === 401 || status === 404;
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

/**
 * Telegram Bot API 클라이언트 — POST JSON, 429/5xx/네트워크 오류 재시도(지수 백오프, retry_after 우선),
 * 응답은 zod 검증. 토큰은 로그에 남기지 않음.
 */
export class TelegramBotClient implements BotApi {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly timeoutMs: number;

  constructor(options: TelegramBotClientOptions) {
    this.token = options.token;
    this.baseUrl = options.baseUrl ?? 'https://api.telegram.org';
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseMs = options.retryBaseMs ?? RETRY_BASE_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async call<T>(
    method: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T>,
    options: CallOptions = {},
  ): Promise<T> {
    const url = new URL(`/bot${this.token}/${method}`, this.baseUrl);
    const timeout = options.timeoutMs ?? this.timeoutMs;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const res = await undiciRequest(url.toString(), {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          body: JSON.stringify(params),
          bodyTimeout: timeout,
          headersTimeout: timeout,
          signal: options.signal,
        });
        const raw = parseJson(await res.body.text());
        const envelope = apiResponseSchema.safeParse(raw);

        if (isAuthError(res.statusCode)) {
          log.error({ statusCode: res.statusCode, method }, 'Bot API auth error — check TELEGRAM_BOT_TOKEN');
          throw new TelegramApiError(`Telegram auth error: ${res.statusCode}`, method, res.statusCode);
        }

        if (isRetryableStatus(res.statusCode)) {
          const retryAfter = envelope.success ? envelope.data.parameters?.retry_after : undefined;
          lastError = new TelegramApiError(`Telegram HTTP ${res.statusCode}`, method, res.statusCode);
          if (attempt < this.maxRetries) {
            const delay = retryAfter !== undefined ? retryAfter * 1000 : this.backoff(attempt);
            log.warn({ statusCode: res.statusCode, method, attempt, delay }, 'Retryable error, backing off');
            await sleep(delay, options.signal);
            continue;
          }
          throw lastError;
        }

        if (!envelope.success) {
          throw new TelegramApiError(`Telegram response validation failed: ${envelope.error.message}`, method);
        }
        if (!envelope.data.ok) {
          const description = envelope.data.description ?? `HTTP ${res.statusCode}`;
          log.warn({ method, errorCode: envelope.data.error_code, description }, 'Bot API request rejected');
          throw new TelegramApiError(description, method, envelope.data.error_code);
        }

        const result = schema.safeParse(envelope.data.result);
        if (!result.success) {
          throw new TelegramApiError(`Telegram result validation failed: ${result.error.message}`, method);
        }
        return result.data;
      } catch (err) {
        if (err instanceof TelegramApiError || options.signal?.aborted) throw err;
        lastError = err instanceof Error ? err : new Error(String(err));
        if (attempt < this.maxRetries) {
          const delay = this.backoff(attempt);
          log.warn({ method, attempt, delay, err: lastError.message }, 'Request failed, retrying');
          await sleep(delay, options.signal);
          continue;
        }
      }
    }
    throw lastError ?? new TelegramApiError('Telegram request failed after retries', method);
  }

  private backoff(attempt: number): number {
    return this.retryBaseMs * Math.pow(2, attempt);
  }
}

/** signal이 abort되면 즉시 resolve (종료 시 대기 중인 백오프를 끊음) */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

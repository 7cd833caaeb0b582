import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v.trim() !== '' ? Number(v) : fallback;
}

const configSchema = z.object({
  dedup: z.object({
    /** 동일 본문 억제 기간 (시간) */
    retentionHours: z.number().positive(),
    /** 같은 심볼 연속 신호 억제 기간 (초) */
    cooldownSeconds: z.number().nonnegative(),
  }),

  format: z.object({
    exchangeLabel: z.string().min(1),
  }),

  telegram: z.object({
    botToken: z.string(),
    /** @username 또는 숫자 chat id */
    sourceChannel: z.string(),
    targetChannel: z.string(),
    apiBaseUrl: z.string().url(),
    pollTimeoutSeconds: z.number().int().nonnegative(),
    maxRetries: z.number().int().nonnegative(),
    /** 초당 1건 제한 */
    sendIntervalMs: z.number().int().nonnegative(),
  }),

  keepAlive: z.object({
    cron: z.string().min(1),
  }),

  log: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  }),

  /** 헬스체크/상태 API 포트 */
  apiServerPort: z.number().int().positive(),
});

export type RelayConfig = z.infer<typeof configSchema>;

export const config: RelayConfig = configSchema.parse({
  dedup: {
    retentionHours: envNum('DEDUP_RETENTION_HOURS', 24),
    cooldownSeconds: envNum('SYMBOL_COOLDOWN_SECONDS', 5),
  },

  format: {
    exchangeLabel: env('SIGNAL_EXCHANGE_LABEL', 'Binance Futures'),
  },

  telegram: {
    botToken: env('TELEGRAM_BOT_TOKEN', ''),
    sourceChannel: env('SOURCE_CHANNEL', ''),
    targetChannel: env('TARGET_CHANNEL', ''),
    apiBaseUrl: env('TELEGRAM_API_BASE_URL', 'https://api.telegram.org'),
    pollTimeoutSeconds: envNum('TELEGRAM_POLL_TIMEOUT_SECONDS', 25),
    maxRetries: envNum('TELEGRAM_MAX_RETRIES', 3),
    sendIntervalMs: envNum('TELEGRAM_SEND_INTERVAL_MS', 1000),
  },

  keepAlive: {
    cron: env('KEEP_ALIVE_CRON', '*/3 * * * *'),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },

  apiServerPort: envNum('PORT', 10000),
});

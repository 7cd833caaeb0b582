import { config } from './config.js';
import { createChildLogger } from './logger.js';
import { SignalPipeline } from './pipeline/signal-pipeline.js';
import { EventBus } from './pipeline/event-bus.js';
import { SignalRelay } from './relay/relay.js';
import { RelayStats } from './relay/relay-stats.js';
import { startKeepAlive } from './relay/keep-alive.js';
import { TelegramBotClient } from './telegram/client.js';
import { TelegramSource } from './telegram/source.js';
import { TelegramSink } from './telegram/sink.js';
import { startApiServer } from './api-server.js';

const log = createChildLogger('main');

async function main(): Promise<void> {
  const { telegram } = config;
  if (!telegram.botToken || !telegram.sourceChannel || !telegram.targetChannel) {
    log.error('TELEGRAM_BOT_TOKEN, SOURCE_CHANNEL and TARGET_CHANNEL are required');
    process.exit(1);
  }

  log.info(
    {
      source: telegram.sourceChannel,
      target: telegram.targetChannel,
      retentionHours: config.dedup.retentionHours,
      cooldownSeconds: config.dedup.cooldownSeconds,
    },
    'Starting signal relay',
  );

  // ── 코어 ──
  const pipeline = new SignalPipeline({
    retentionMs: config.dedup.retentionHours * 60 * 60 * 1000,
    cooldownMs: config.dedup.cooldownSeconds * 1000,
    exchangeLabel: config.format.exchangeLabel,
  });
  const bus = new EventBus();
  const stats = new RelayStats(bus);

  // ── Bot API ──
  const api = new TelegramBotClient({
    token: telegram.botToken,
    baseUrl: telegram.apiBaseUrl,
    maxRetries: telegram.maxRetries,
  });
  const sink = new TelegramSink({
    api,
    chatId: telegram.targetChannel,
    intervalMs: telegram.sendIntervalMs,
    onFailure: (text, err) => {
      bus.emit({
        type: 'SEND_FAILED',
        timestamp: Date.now(),
        text,
        error: err instanceof Error ? err.message : String(err),
      });
    },
  });
  const source = new TelegramSource({
    api,
    channel: telegram.sourceChannel,
    pollTimeoutSeconds: telegram.pollTimeoutSeconds,
  });
  const relay = new SignalRelay(pipeline, sink, bus);

  source.start((message) => {
    relay.handle(message);
  });

  const server = startApiServer(
    {
      stats,
      dedup: pipeline,
      sourceChannel: telegram.sourceChannel,
      targetChannel: telegram.targetChannel,
      polling: () => source.isRunning(),
    },
    config.apiServerPort,
  );
  const keepAlive = startKeepAlive(source, stats, config.keepAlive.cron);

  // ── Graceful shutdown ──
  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, 'Shutting down');
    keepAlive.stop();
    await source.stop();
    await sink.flush();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    log.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  log.info('Relay running. Waiting for channel posts...');
}

main().catch((err) => {
  log.fatal({ err }, 'Fatal error');
  process.exit(1);
});

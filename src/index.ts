export * from './types/index.js';
export {
  extractSignal,
  extractPair,
  extractDirection,
  extractLeverage,
  extractEntryPrice,
  extractTakeProfit,
  extractStopLoss,
  toPairSymbol,
  normalizeWhitespace,
  DEFAULT_QUOTE,
  LEVERAGE_NOT_AVAILABLE,
} from './signal/extractor.js';
export { classifySignal } from './signal/classifier.js';
export {
  formatClassification,
  formatOpenSignal,
  formatCloseCommand,
  DEFAULT_EXCHANGE_LABEL,
  type FormatOptions,
} from './signal/formatter.js';
export { contentFingerprint } from './dedup/fingerprint.js';
export {
  DedupCache,
  DEFAULT_RETENTION_MS,
  DEFAULT_COOLDOWN_MS,
  type DedupCacheOptions,
  type DedupVerdict,
  type DedupStats,
} from './dedup/dedup-cache.js';
export {
  SignalPipeline,
  type SignalPipelineOptions,
  type PipelineDecision,
} from './pipeline/signal-pipeline.js';
export { EventBus } from './pipeline/event-bus.js';
export { SignalRelay, type MessageSink } from './relay/relay.js';
export { RelayStats } from './relay/relay-stats.js';
export { TelegramBotClient, TelegramApiError, type BotApi } from './telegram/client.js';
export { TelegramSource } from './telegram/source.js';
export { TelegramSink } from './telegram/sink.js';

import { createChildLogger } from '../logger.js';
import type { EventBus } from '../pipeline/event-bus.js';
import type { PipelineDecision, SignalPipeline } from '../pipeline/signal-pipeline.js';
import type { RawMessage } from '../types/index.js';

const log = createChildLogger('relay');

export interface MessageSink {
  send(text: string): void;
}

/**
 * 소스 메시지 1건 → 파이프라인 판정 → 싱크 전달
 * 판정은 동기이므로 같은 채널 메시지는 도착 순서대로 게이트를 통과
 */
export class SignalRelay {
  constructor(
    private readonly pipeline: SignalPipeline,
    private readonly sink: MessageSink,
    private readonly bus: EventBus,
    private readonly now: () => number = Date.now,
  ) {}

  handle(message: RawMessage): PipelineDecision {
    const ts = this.now();
    this.bus.emit({ type: 'MESSAGE_RECEIVED', timestamp: ts, message });

    const decision = this.pipeline.evaluate(message.text, ts);
    if (decision.action === 'drop') {
      log.info({ messageId: message.id, reason: decision.reason }, 'Skipped message');
      this.bus.emit({ type: 'MESSAGE_DROPPED', timestamp: ts, messageId: message.id, reason: decision.reason });
      return decision;
    }

    this.sink.send(decision.text);
    log.info(
      {
        messageId: message.id,
        kind: decision.classification.kind,
        original: (message.text ?? '').slice(0, 50),
      },
      'Forwarded message',
    );
    this.bus.emit({
      type: 'MESSAGE_FORWARDED',
      timestamp: ts,
      messageId: message.id,
      text: decision.text,
      classification: decision.classification,
    });
    return decision;
  }
}

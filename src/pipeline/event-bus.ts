import type { RelayEvent, RelayEventType } from '../types/index.js';

export type EventOf<T extends RelayEventType> = Extract<RelayEvent, { type: T }>;
type EventHandler = (event: RelayEvent) => void;

function isEventOf<T extends RelayEventType>(event: RelayEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

/**
 * 타입드 릴레이 이벤트 버스 — 최근 maxLog개만 보관
 */
export class EventBus {
  private handlers: Map<RelayEventType, EventHandler[]> = new Map();
  private log: RelayEvent[] = [];

  constructor(private readonly maxLog: number = 500) {}

  on<T extends RelayEventType>(type: T, handler: (event: EventOf<T>) => void): void {
    const list = this.handlers.get(type) ?? [];
    list.push((event) => {
      if (isEventOf(event, type)) handler(event);
    });
    this.handlers.set(type, list);
  }

  emit(event: RelayEvent): void {
    this.log.push(event);
    if (this.log.length > this.maxLog) {
      this.log = this.log.slice(-this.maxLog);
    }
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const h of handlers) {
        h(event);
      }
    }
  }

  getLog(): readonly RelayEvent[] {
    return this.log;
  }

  clearLog(): void {
    this.log = [];
  }

  reset(): void {
    this.handlers.clear();
    this.log = [];
  }
}

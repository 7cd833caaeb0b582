import type { Classification } from './signal.js';
import type { RawMessage } from './message.js';

export type DropReason = 'empty' | 'irrelevant' | 'duplicate' | 'cooldown';

export type RelayEventType =
  | 'MESSAGE_RECEIVED'
  | 'MESSAGE_FORWARDED'
  | 'MESSAGE_DROPPED'
  | 'SEND_FAILED';

export interface BaseEvent {
  readonly type: RelayEventType;
  readonly timestamp: number;
}

export interface MessageReceivedEvent extends BaseEvent {
  readonly type: 'MESSAGE_RECEIVED';
  readonly message: RawMessage;
}

export interface MessageForwardedEvent extends BaseEvent {
  readonly type: 'MESSAGE_FORWARDED';
  readonly messageId: number;
  readonly text: string;
  readonly classification: Classification;
}

export interface MessageDroppedEvent extends BaseEvent {
  readonly type: 'MESSAGE_DROPPED';
  readonly messageId: number;
  readonly reason: DropReason;
}

export interface SendFailedEvent extends BaseEvent {
  readonly type: 'SEND_FAILED';
  readonly text: string;
  readonly error: string;
}

export type RelayEvent =
  | MessageReceivedEvent
  | MessageForwardedEvent
  | MessageDroppedEvent
  | SendFailedEvent;

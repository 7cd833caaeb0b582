export type {
  Direction,
  ParsedSignal,
  CancellationClassification,
  OpenSignalClassification,
  IrrelevantClassification,
  Classification,
} from './signal.js';
export type { RawMessage } from './message.js';
export type {
  DropReason,
  RelayEventType,
  BaseEvent,
  MessageReceivedEvent,
  MessageForwardedEvent,
  MessageDroppedEvent,
  SendFailedEvent,
  RelayEvent,
} from './event.js';

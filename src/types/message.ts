/** 소스 채널에서 들어온 원본 메시지 */
export interface RawMessage {
  readonly id: number;                     // 채널 내 message_id
  readonly text: string | null | undefined;
  readonly chatId?: number;
  readonly date?: number;                  // unix seconds
}

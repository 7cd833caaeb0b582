import { z } from 'zod';

// ─── 공통 응답 봉투 ─────────────────────────────────────────────────────────

export const responseParametersSchema = z.object({
  retry_after: z.number().optional(),
  migrate_to_chat_id: z.number().optional(),
});

export const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  parameters: responseParametersSchema.optional(),
});
export type ApiResponse = z.infer<typeof apiResponseSchema>;

// ─── 메시지 / 업데이트 ──────────────────────────────────────────────────────

export const chatSchema = z.object({
  id: z.number(),
  type: z.string(),
  title: z.string().optional(),
  username: z.string().optional(),
});
export type TelegramChat = z.infer<typeof chatSchema>;

export const messageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  chat: chatSchema,
  text: z.string().optional(),
  caption: z.string().optional(),
});
export type TelegramMessage = z.infer<typeof messageSchema>;

export const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
  channel_post: messageSchema.optional(),
});
export type TelegramUpdate = z.infer<typeof updateSchema>;

export const updatesSchema = z.array(updateSchema);

import { z } from 'zod';

/**
 * The subset of the Telegram `Update` object the admission gate reads.
 * Fields not listed here are stripped during parsing.
 */

export const ChatSchema = z.object({
  id: z.number().int(),
  type: z.string(),
  title: z.string().optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
});

export const UserSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean(),
  first_name: z.string(),
  username: z.string().optional(),
});

export const AudioSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  duration: z.number().optional(),
  performer: z.string().optional(),
  title: z.string().optional(),
  mime_type: z.string().optional(),
});

export const MessageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int(),
  chat: ChatSchema,
  from: UserSchema.optional(),
  text: z.string().optional(),
  audio: AudioSchema.optional(),
});

export const UpdateSchema = z.object({
  update_id: z.number().int(),
  message: MessageSchema.optional(),
});

export type TelegramAudio = z.infer<typeof AudioSchema>;
export type TelegramMessage = z.infer<typeof MessageSchema>;

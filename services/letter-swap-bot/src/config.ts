import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  // лимит Telegram на длину сообщения
  MAX_TEXT_LENGTH: z.coerce.number().int().positive().default(4096),
});

export interface LetterSwapConfig {
  telegramBotToken: string;
  maxTextLength: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LetterSwapConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return {
    telegramBotToken: parsed.data.TELEGRAM_BOT_TOKEN,
    maxTextLength: parsed.data.MAX_TEXT_LENGTH,
  };
}

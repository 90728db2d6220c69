/**
 * Telegram Bot API delivery
 */

import { z } from 'zod'
import { ErrorUtils } from '@/shared/errors/index.js'
import { defaultFetch, readErrorBody, type HttpFetch } from '@/shared/http/client.js'
import { logger } from '@/shared/logger/index.js'

const TELEGRAM_API_BASE = 'https://api.telegram.org'
const TELEGRAM_TIMEOUT_MS = 10000

const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
})

export function formatRankingMessage(topic: string, ranking: string): string {
  return `🚀 *Paper Digest - ${topic}*\n\n${ranking}\n\n---\nGenerated automatically by paper-digest-rag`
}

export class TelegramSender {
  constructor(
    private botToken: string | undefined,
    private httpFetch: HttpFetch = defaultFetch,
    private timeoutMs: number = TELEGRAM_TIMEOUT_MS
  ) {}

  /**
   * Send a Markdown message. Every failure is logged and reported as false.
   */
  async sendMessage(chatId: string, text: string): Promise<boolean> {
    if (!this.botToken) {
      logger.warn('TELEGRAM_BOT_TOKEN not configured, message not sent')
      return false
    }

    try {
      const response = await this.httpFetch(`${TELEGRAM_API_BASE}/bot${this.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: chatId, text, parse_mode: 'Markdown' }),
        timeout: this.timeoutMs,
      })

      if (!response.ok) {
        logger.warn(`Telegram HTTP error ${response.status}`, {
          status: response.status,
          body: await readErrorBody(response),
        })
        return false
      }

      const result = TelegramResponseSchema.safeParse(await response.json())
      if (!result.success || !result.data.ok) {
        logger.warn('Telegram API error', {
          description: result.success ? result.data.description ?? 'Unknown error' : 'Unexpected response format',
        })
        return false
      }

      logger.info('✅ Message sent to Telegram', { chatId })
      return true
    } catch (error) {
      logger.warn('Error sending Telegram message', { error: ErrorUtils.describe(error) })
      return false
    }
  }

  async sendRanking(chatId: string, ranking: string, topic: string): Promise<boolean> {
    return this.sendMessage(chatId, formatRankingMessage(topic, ranking))
  }
}

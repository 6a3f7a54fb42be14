import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { z } from 'zod'

export interface NotificationSink {
  readonly kind: string
  send(text: string): Promise<void>
  sendPhoto(filepath: string, caption: string): Promise<void>
}

export class ConsoleNotifier implements NotificationSink {
  readonly kind = 'console'

  async send(text: string) {
    console.log(`[notify] ${text}`)
  }

  async sendPhoto(filepath: string, caption: string) {
    console.log(`[notify] ${caption} (${filepath})`)
  }
}

const telegramEnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
})

const telegramUpdateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      message_id: z.number(),
      chat: z.object({ id: z.number() }),
      text: z.string().optional(),
    })
    .optional(),
})

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type TelegramClientOptions = {
  token: string
  apiBaseUrl?: string
  fetch?: FetchLike
}

/** Minimal Bot API client over fetch. */
export class TelegramClient {
  private readonly baseUrl: string
  private readonly fetchImpl: FetchLike

  constructor(options: TelegramClientOptions) {
    this.baseUrl = `${options.apiBaseUrl ?? 'https://api.telegram.org'}/bot${options.token}`
    this.fetchImpl = options.fetch ?? fetch
  }

  async sendMessage(chatId: string, text: string) {
    await this.call('sendMessage', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text }),
    })
  }

  async sendPhoto(chatId: string, filepath: string, caption: string) {
    const photo = await readFile(filepath)
    const form = new FormData()
    form.set('chat_id', chatId)
    form.set('caption', caption)
    form.set('photo', new Blob([photo], { type: 'image/jpeg' }), basename(filepath))
    await this.call('sendPhoto', { method: 'POST', body: form })
  }

  async getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const result = await this.call('getUpdates', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ offset, timeout: timeoutSec, allowed_updates: ['message'] }),
      signal,
    })

    const updates = z.array(telegramUpdateSchema).safeParse(result)
    if (!updates.success) {
      throw new Error('TELEGRAM_INVALID_RESPONSE: getUpdates result is not a list of updates')
    }
    return updates.data
  }

  private async call(method: string, init: RequestInit) {
    const response = await this.fetchImpl(`${this.baseUrl}/${method}`, init)

    let payload: unknown
    try {
      payload = await response.json()
    } catch {
      throw new Error(`TELEGRAM_REQUEST_FAILED: ${method} returned ${response.status} without JSON`)
    }

    const envelope = telegramEnvelopeSchema.safeParse(payload)
    if (!envelope.success || !envelope.data.ok) {
      const description = envelope.success ? envelope.data.description : undefined
      throw new Error(`TELEGRAM_REQUEST_FAILED: ${method} ${description ?? `status ${response.status}`}`)
    }
    return envelope.data.result
  }
}

export class TelegramNotifier implements NotificationSink {
  readonly kind = 'telegram'

  constructor(
    private readonly client: TelegramClient,
    private readonly chatId: string,
  ) {}

  send(text: string) {
    return this.client.sendMessage(this.chatId, text)
  }

  sendPhoto(filepath: string, caption: string) {
    return this.client.sendPhoto(this.chatId, filepath, caption)
  }
}

import { beforeEach, describe, expect, it, vi } from 'vitest'

import { sendDiscordNotification } from '../../core/notify/send-discord-notification'
import { logger } from '../../core/logging/logger'

vi.mock('../../core/logging/logger')

describe('sendDiscordNotification', () => {
  beforeEach(() => {
    vi.restoreAllMocks()
    vi.clearAllMocks()
  })

  it('does nothing without a webhook URL', async () => {
    let spy = vi.spyOn(globalThis, 'fetch')

    await sendDiscordNotification('hello', undefined)
    await sendDiscordNotification('hello', '')

    expect(spy).not.toHaveBeenCalled()
  })

  it('posts the message as Discord content', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response(null, { status: 204 }))

    await sendDiscordNotification('hello', 'https://discord.test/webhook')

    let [url, init] = spy.mock.calls[0]!
    expect(url).toBe('https://discord.test/webhook')
    expect(init?.method).toBe('POST')
    expect(init?.body).toBe('{"content":"hello"}')
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' })
    expect(logger.info).toHaveBeenCalledWith(
      'Successfully sent Discord notification.',
    )
  })

  it('logs and resolves on a non-success status', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('nope', {
        statusText: 'Internal Server Error',
        status: 500,
      }),
    )

    await expect(
      sendDiscordNotification('hello', 'https://discord.test/webhook'),
    ).resolves.toBeUndefined()
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to send Discord notification: 500 Internal Server Error',
    )
    expect(logger.info).not.toHaveBeenCalled()
  })

  it('logs and resolves when the webhook is unreachable', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(
      new TypeError('fetch failed'),
    )

    await expect(
      sendDiscordNotification('hello', 'https://discord.test/webhook', {
        timeout: 100,
      }),
    ).resolves.toBeUndefined()
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to send Discord notification: fetch failed',
    )
  })

  it('logs and resolves on an invalid URL', async () => {
    await expect(
      sendDiscordNotification('hello', 'not a url'),
    ).resolves.toBeUndefined()
    expect(logger.error).toHaveBeenCalledOnce()
  })
})

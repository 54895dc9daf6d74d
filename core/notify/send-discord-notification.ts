import { defaultClientConfig } from '../api/default-client-config'
import { logger } from '../logging/logger'

/**
 * Post a message to a Discord webhook.
 *
 * Best effort: an empty URL is a no-op, and a network error, timeout or
 * non-2xx status is logged and never rethrown.
 *
 * @param message - Message content.
 * @param webhookUrl - Discord webhook URL.
 * @param options - Delivery options.
 * @param options.timeout - Request timeout in milliseconds.
 */
export async function sendDiscordNotification(
  message: string,
  webhookUrl: undefined | string | null,
  options: { timeout?: number } = {},
): Promise<void> {
  if (!webhookUrl) {
    return
  }

  let timeout = options.timeout ?? defaultClientConfig.timeout

  try {
    let response = await fetch(webhookUrl, {
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ content: message }),
      signal: AbortSignal.timeout(timeout),
      method: 'POST',
    })

    if (!response.ok) {
      logger.error(
        `Failed to send Discord notification: ${response.status} ${response.statusText}`.trim(),
      )
      return
    }

    logger.info('Successfully sent Discord notification.')
  } catch (error) {
    logger.error(
      `Failed to send Discord notification: ${error instanceof Error ? error.message : String(error)}`,
    )
  }
}

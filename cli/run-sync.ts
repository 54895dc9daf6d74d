import pc from 'picocolors'

import type { CLIOptions } from './resolve-options'

import { sendDiscordNotification } from '../core/notify/send-discord-notification'
import { resolveOptions, resolveWebhookUrl } from './resolve-options'
import { syncRelease } from '../core/sync/sync-release'
import { printOutcome } from './print-outcome'

/**
 * Run one sync from raw CLI options and report the result.
 *
 * Errors outside the sync workflow (unusable options, unexpected exceptions)
 * are printed and sent to the webhook when one is configured.
 *
 * @param options - Raw CLI options.
 * @param environment - Process environment.
 * @returns Process exit code.
 */
export async function runSync(
  options: CLIOptions,
  environment: NodeJS.ProcessEnv = process.env,
): Promise<0 | 1> {
  try {
    let outcome = await syncRelease(resolveOptions(options, environment))
    printOutcome(outcome)
    return outcome.exitCode
  } catch (error) {
    let message = error instanceof Error ? error.message : String(error)
    console.error(pc.redBright('\nError:'), message)
    await sendDiscordNotification(
      `ERROR: Operation failed: ${message}`,
      resolveWebhookUrl(options, environment),
    )
    return 1
  }
}

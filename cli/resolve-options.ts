import type { SyncOptions } from '../types/sync-options'

/** Raw CLI options as parsed by cac. */
export interface CLIOptions {
  /** Discord webhook URL for notifications. */
  discordWebhook?: string

  /** Repository that receives the release. */
  localRepo?: string

  /** Upstream repository to follow. */
  targetRepo?: string

  /** Branch the new tag is created from. */
  baseBranch?: string

  /** Request timeout in milliseconds. */
  timeout?: number | string

  /** GitHub REST API base URL. */
  apiUrl?: string

  /** Compare without creating the release. */
  dryRun?: boolean

  /** GitHub token. */
  auth?: string
}

/**
 * Merge CLI options with environment fallbacks into sync options.
 *
 * The token falls back to `GITHUB_TOKEN`, then `GH_TOKEN`. The webhook falls
 * back to `DISCORD_WEBHOOK_URL`. A missing token or repository resolves to an
 * empty string and is rejected later by input validation, so the failure is
 * notified like any other malformed input.
 *
 * @param options - Raw CLI options.
 * @param environment - Process environment.
 * @returns Sync options.
 */
export function resolveOptions(
  options: CLIOptions,
  environment: NodeJS.ProcessEnv = process.env,
): SyncOptions {
  let targetRepository = options.targetRepo?.trim() ?? ''
  let localRepository = options.localRepo?.trim() ?? ''

  let token =
    firstNonEmpty(
      options.auth,
      environment['GITHUB_TOKEN'],
      environment['GH_TOKEN'],
    ) ?? ''

  let webhookUrl = resolveWebhookUrl(options, environment)

  return {
    timeout: parseTimeout(options.timeout),
    baseBranch: options.baseBranch?.trim() || 'main',
    apiUrl: firstNonEmpty(options.apiUrl),
    dryRun: options.dryRun ?? false,
    targetRepository,
    localRepository,
    webhookUrl,
    token,
  }
}

/**
 * Discord webhook from the CLI flag or `DISCORD_WEBHOOK_URL`.
 *
 * @param options - Raw CLI options.
 * @param environment - Process environment.
 * @returns Webhook URL or undefined when none is configured.
 */
export function resolveWebhookUrl(
  options: Pick<CLIOptions, 'discordWebhook'>,
  environment: NodeJS.ProcessEnv = process.env,
): undefined | string {
  return firstNonEmpty(
    options.discordWebhook,
    environment['DISCORD_WEBHOOK_URL'],
  )
}

/**
 * Parse the timeout option.
 *
 * @param value - Raw option value.
 * @returns Timeout in milliseconds, undefined when not set.
 */
function parseTimeout(value: undefined | string | number): number | undefined {
  if (value === undefined || value === '') {
    return undefined
  }
  let parsed = typeof value === 'number' ? value : Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(
      `Invalid timeout "${value}". Expected a positive integer of milliseconds.`,
    )
  }
  return parsed
}

/**
 * Pick the first value that is non-empty after trimming.
 *
 * @param values - Candidate values in priority order.
 * @returns Trimmed value or undefined.
 */
function firstNonEmpty(
  ...values: (undefined | string)[]
): undefined | string {
  for (let value of values) {
    if (value && value.trim() !== '') {
      return value.trim()
    }
  }
  return undefined
}

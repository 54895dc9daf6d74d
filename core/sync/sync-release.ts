import type { SyncOutcome } from '../../types/sync-outcome'
import type { SyncOptions } from '../../types/sync-options'

import { sendDiscordNotification } from '../notify/send-discord-notification'
import { createGitHubClient } from '../api/create-github-client'
import { validateInputs, validateTag } from './validate-inputs'
import { buildReleaseBody } from './build-release-body'
import { needsUpdate } from '../versions/needs-update'
import { SyncError } from '../errors/sync-error'
import { logger } from '../logging/logger'

/**
 * Mirror the newest tag of the target repository as a release of the local
 * repository.
 *
 * Steps run strictly in order: validate inputs, fetch and check the target
 * tag, fetch and check the local tag, compare, create the release. Every
 * terminal state is announced through the webhook. Expected failures are
 * returned as a `failed` outcome; notification failures never change it.
 *
 * @param options - Sync options.
 * @returns Terminal state of the run.
 */
export async function syncRelease(options: SyncOptions): Promise<SyncOutcome> {
  let {
    targetRepository,
    localRepository,
    dryRun = false,
    webhookUrl,
    baseBranch,
    timeout,
  } = options

  let notify = (message: string): Promise<void> =>
    sendDiscordNotification(message, webhookUrl, { timeout })

  let targetTag: string | null = null
  let localTag: string | null = null

  try {
    validateInputs(options)

    let client = createGitHubClient({
      baseUrl: options.apiUrl,
      token: options.token,
      timeout,
    })

    logger.info(`Fetching latest tag from target repo: ${targetRepository}`)
    targetTag = await client.getLatestTag(targetRepository)
    validateTag(targetTag, 'Target')
    logger.info(`Found target tag: ${targetTag}`)

    logger.info(`Fetching latest tag from local repo: ${localRepository}`)
    localTag = await client.getLatestTag(localRepository)
    validateTag(localTag, 'Local')
    logger.info(`Found local tag: ${localTag}`)

    if (!needsUpdate(targetTag, localTag)) {
      let message = `Tags are identical (${targetTag}). No update needed for '${localRepository}'.`
      logger.info(message)
      await notify(message)
      return { status: 'up-to-date', exitCode: 0, targetTag, localTag }
    }

    let updateMessage =
      `Update needed for '${localRepository}'. ` +
      `Newest tag from '${targetRepository}' is ${targetTag}.`
    logger.warn(updateMessage)
    await notify(updateMessage)

    if (dryRun) {
      let message = `Dry run: release '${targetTag}' was not created in '${localRepository}'.`
      logger.info(message)
      await notify(message)
      return { status: 'dry-run', exitCode: 0, targetTag, localTag }
    }

    logger.info(`Creating release '${targetTag}' in '${localRepository}'...`)
    let release = await client.createRelease({
      body: buildReleaseBody(targetRepository, targetTag),
      repository: localRepository,
      tag: targetTag,
      baseBranch,
    })

    let successMessage = `Successfully created release '${targetTag}' in '${localRepository}'.`
    logger.success(successMessage)
    await notify(successMessage)

    return {
      releaseUrl: release.url,
      status: 'released',
      exitCode: 0,
      targetTag,
      localTag,
    }
  } catch (error) {
    if (!(error instanceof SyncError)) {
      throw error
    }

    let message = `Operation failed: ${error.message}`
    logger.error(message)
    await notify(`ERROR: ${message}`)

    return {
      error: { kind: error.kind, message: error.message },
      status: 'failed',
      exitCode: 1,
      targetTag,
      localTag,
    }
  }
}

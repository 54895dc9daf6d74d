import type { components } from '@octokit/openapi-types'

import type { GitHubClientConfig } from '../../types/github-client-config'
import type { ReleaseRequest } from '../../types/release-request'
import type { ReleaseResult } from '../../types/release-result'

import { ReleaseCreationError } from '../errors/release-creation-error'
import { TransportError } from '../errors/transport-error'
import { makeRequest } from './make-request'

type Release = components['schemas']['release']

/**
 * Create a release whose name equals its tag.
 *
 * Anything but `201 Created` is reported as a `ReleaseCreationError` with
 * the status and body returned by GitHub. A `201` with an unreadable body
 * still counts as created. Failures without a response stay
 * `TransportError`.
 *
 * @param config - Client config.
 * @param request - Release parameters.
 * @returns Created release.
 */
export async function createRelease(
  config: GitHubClientConfig,
  request: ReleaseRequest,
): Promise<ReleaseResult> {
  let { baseBranch = 'main', repository, body, tag } = request

  let response: { status: number; data: unknown }
  try {
    response = await makeRequest(config, `/repos/${repository}/releases`, {
      body: JSON.stringify({
        target_commitish: baseBranch,
        tag_name: tag,
        name: tag,
        body,
      }),
      method: 'POST',
    })
  } catch (error) {
    /** Created, but the body could not be parsed. */
    if (error instanceof TransportError && error.status === 201) {
      return { url: null, id: null, tag }
    }
    if (error instanceof TransportError && error.status !== null) {
      throw new ReleaseCreationError(error.status, error.body ?? '')
    }
    throw error
  }

  if (response.status !== 201) {
    throw new ReleaseCreationError(
      response.status,
      JSON.stringify(response.data),
    )
  }

  let release = (response.data ?? {}) as Partial<Release>

  return {
    tag: release.tag_name ?? tag,
    url: release.html_url ?? null,
    id: release.id ?? null,
  }
}

import type { components } from '@octokit/openapi-types'

import type { GitHubClientConfig } from '../../types/github-client-config'

import { TransportError } from '../errors/transport-error'
import { NotFoundError } from '../errors/not-found-error'
import { makeRequest } from './make-request'

type GitReference = components['schemas']['git-ref']

/**
 * Fetch the newest tag of a repository.
 *
 * GitHub returns matching refs oldest first, so the last entry is the newest
 * tag. Its `refs/tags/` prefix is stripped.
 *
 * @param config - Client config.
 * @param repository - Repository in `owner/name` form.
 * @returns Tag name.
 */
export async function getLatestTag(
  config: GitHubClientConfig,
  repository: string,
): Promise<string> {
  let { data } = await makeRequest(
    config,
    `/repos/${repository}/git/matching-refs/tags`,
  )

  if (!Array.isArray(data)) {
    throw new TransportError(
      `Unexpected tag list for repository '${repository}'.`,
    )
  }

  let references = data as Partial<GitReference>[]
  let latest = references.at(-1)

  if (!latest) {
    throw new NotFoundError(`No tags found for repository '${repository}'.`)
  }

  if (typeof latest.ref !== 'string') {
    throw new TransportError(
      `Unexpected tag reference for repository '${repository}'.`,
    )
  }

  return latest.ref.replace(/^refs\/tags\//u, '')
}

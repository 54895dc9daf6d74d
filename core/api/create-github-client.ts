import type { GitHubClientConfig } from '../../types/github-client-config'
import type { GitHubClient } from '../../types/github-client'

import { defaultClientConfig } from './default-client-config'
import { createRelease } from './create-release'
import { getLatestTag } from './get-latest-tag'

/**
 * Create a functional GitHub API client bound to one frozen config.
 *
 * @param options - Token plus optional overrides of the defaults.
 * @returns Client with bound methods.
 */
export function createGitHubClient(
  options: Partial<GitHubClientConfig> & { token: string },
): GitHubClient {
  let config: GitHubClientConfig = Object.freeze({
    apiVersion: options.apiVersion ?? defaultClientConfig.apiVersion,
    userAgent: options.userAgent ?? defaultClientConfig.userAgent,
    timeout: options.timeout ?? defaultClientConfig.timeout,
    baseUrl: (options.baseUrl ?? defaultClientConfig.baseUrl).replace(
      /\/+$/u,
      '',
    ),
    token: options.token,
  })

  return {
    createRelease: request => createRelease(config, request),
    getLatestTag: repository => getLatestTag(config, repository),
  }
}

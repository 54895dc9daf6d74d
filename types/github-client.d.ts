import type { ReleaseRequest } from './release-request'
import type { ReleaseResult } from './release-result'

/**
 * Public API surface for talking to GitHub during a sync run.
 *
 * Methods are thin wrappers around lower-level functions bound to one frozen
 * client config (auth, base URL, timeout).
 */
export interface GitHubClient {
  /** Create a release named after the tag. */
  createRelease(request: ReleaseRequest): Promise<ReleaseResult>

  /** Name of the newest tag of a repository (`owner/name`). */
  getLatestTag(repository: string): Promise<string>
}

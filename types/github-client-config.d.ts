/**
 * Immutable settings shared by every request of a single run.
 *
 * Built once by `createGitHubClient` and frozen afterwards.
 */
export interface GitHubClientConfig {
  /** Value of the `X-GitHub-Api-Version` header. */
  readonly apiVersion: string

  /** Value of the `User-Agent` header. */
  readonly userAgent: string

  /** Upper bound for a single request, in milliseconds. */
  readonly timeout: number

  /** GitHub REST API base URL. */
  readonly baseUrl: string

  /** Bearer token sent with every request. */
  readonly token: string
}

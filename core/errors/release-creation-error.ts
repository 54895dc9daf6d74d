import { SyncError } from './sync-error'

/** GitHub refused to create the release. */
export class ReleaseCreationError extends SyncError {
  public readonly kind = 'release-creation'

  /** HTTP status returned by GitHub. */
  public readonly status: number

  /** Raw response body returned by GitHub. */
  public readonly body: string

  /**
   * Creates a new ReleaseCreationError.
   *
   * @param status - HTTP status returned by GitHub.
   * @param body - Raw response body.
   */
  public constructor(status: number, body: string) {
    super(`Failed to create release: ${status} ${body}`.trim())
    this.name = 'ReleaseCreationError'
    this.status = status
    this.body = body
  }
}

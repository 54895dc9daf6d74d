import { SyncError } from './sync-error'

/** Repository has no tags. */
export class NotFoundError extends SyncError {
  public readonly kind = 'not-found'

  /**
   * Creates a new NotFoundError.
   *
   * @param message - What was missing.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}

import { SyncError } from './sync-error'

/** Malformed token, repository reference or tag. */
export class ValidationError extends SyncError {
  public readonly kind = 'validation'

  /**
   * Creates a new ValidationError.
   *
   * @param message - What was rejected.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

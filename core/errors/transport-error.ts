import { SyncError } from './sync-error'

/** Failed to reach GitHub or GitHub answered with a non-success status. */
export class TransportError extends SyncError {
  public readonly kind = 'transport'

  /** HTTP status, absent when no response was received. */
  public readonly status: number | null

  /** Raw response body, absent when no response was received. */
  public readonly body: string | null

  /**
   * Creates a new TransportError.
   *
   * @param message - Human-readable description.
   * @param details - Response status and body, when a response arrived.
   * @param details.status - HTTP status code.
   * @param details.body - Raw response body.
   */
  public constructor(
    message: string,
    details: { status?: number; body?: string } = {},
  ) {
    super(message)
    this.name = 'TransportError'
    this.status = details.status ?? null
    this.body = details.body ?? null
  }
}

import type { SyncErrorKind } from '../../types/sync-error-kind'

/** Base class for every expected failure of a sync run. */
export abstract class SyncError extends Error {
  public abstract readonly kind: SyncErrorKind
}

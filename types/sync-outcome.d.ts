import type { SyncErrorKind } from './sync-error-kind'

/** Terminal state of a sync run. */
export type SyncStatus = 'up-to-date' | 'released' | 'dry-run' | 'failed'

/** Result of a sync run, including what the process should exit with. */
export interface SyncOutcome {
  /** Failure details when `status` is `failed`. */
  error?: {
    kind: SyncErrorKind
    message: string
  }

  /** Newest tag of the target repository, when it was fetched. */
  targetTag: string | null

  /** Newest tag of the local repository, when it was fetched. */
  localTag: string | null

  /** URL of the created release. */
  releaseUrl?: string | null

  /** 0 for every successful terminal state, 1 otherwise. */
  exitCode: 0 | 1

  status: SyncStatus
}

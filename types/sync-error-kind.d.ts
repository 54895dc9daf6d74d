/** Machine-checkable category of a failed run. */
export type SyncErrorKind =
  | 'release-creation'
  | 'validation'
  | 'not-found'
  | 'transport'

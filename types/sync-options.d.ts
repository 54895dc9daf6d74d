/** Input of a single sync run. */
export interface SyncOptions {
  /** Repository that receives the mirrored release. */
  localRepository: string

  /** Upstream repository whose newest tag is mirrored. */
  targetRepository: string

  /** Discord webhook for notifications, skipped when empty. */
  webhookUrl?: string

  /** Branch used as `target_commitish` for the new release. */
  baseBranch?: string

  /** GitHub REST API base URL override. */
  apiUrl?: string

  /** Compare and report without creating the release. */
  dryRun?: boolean

  /** Request timeout in milliseconds. */
  timeout?: number

  /** GitHub token. */
  token: string
}

/** Everything needed to create a release in a repository. */
export interface ReleaseRequest {
  /** Repository in `owner/name` form. */
  repository: string

  /** Branch the tag is created from when it does not exist yet. */
  baseBranch?: string

  /** Release description. */
  body: string

  /** Tag name, also used as the release name. */
  tag: string
}

/** Release reported back by GitHub after creation. */
export interface ReleaseResult {
  /** HTML URL of the release page, null when GitHub omits it. */
  url: string | null

  /** Numeric release ID. */
  id: number | null

  /** Tag name of the created release. */
  tag: string
}

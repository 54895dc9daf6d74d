/**
 * Description of a mirrored release pointing at the upstream release page.
 *
 * @param targetRepository - Upstream repository in `owner/name` form.
 * @param tag - Mirrored tag.
 * @returns Release body.
 */
export function buildReleaseBody(targetRepository: string, tag: string): string {
  return (
    'This release was automatically generated.\n' +
    'It mirrors the upstream changes from ' +
    `https://github.com/${targetRepository}/releases/tag/${tag}`
  )
}

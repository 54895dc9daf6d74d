/**
 * Check whether a value has the shape of a GitHub personal access token.
 *
 * Accepted shapes:
 *
 * - Classic: `ghp_` followed by 36 alphanumerics.
 * - Fine-grained: `github_pat_`, 22 alphanumerics, `_`, 59 alphanumerics.
 *
 * Any other shape, including OAuth and app installation tokens, is rejected.
 *
 * @param value - Raw token.
 * @returns True when the token matches one of the accepted shapes.
 */
export function isValidToken(value: undefined | string | null): boolean {
  return (
    typeof value === 'string' &&
    /^(?:ghp_[a-zA-Z0-9]{36}|github_pat_[a-zA-Z0-9]{22}_[a-zA-Z0-9]{59})$/u.test(
      value,
    )
  )
}

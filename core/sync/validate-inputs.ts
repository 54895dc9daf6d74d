import type { SyncOptions } from '../../types/sync-options'

import { isValidRepository } from '../validation/is-valid-repository'
import { ValidationError } from '../errors/validation-error'
import { isValidToken } from '../validation/is-valid-token'
import { isValidTag } from '../validation/is-valid-tag'

/**
 * Reject a run whose token or repository references are missing or
 * malformed.
 *
 * @param options - Sync options.
 * @throws {ValidationError} On the first malformed value.
 */
export function validateInputs(
  options: Pick<SyncOptions, 'targetRepository' | 'localRepository' | 'token'>,
): void {
  if (!isValidToken(options.token)) {
    throw new ValidationError('Invalid GitHub authentication token format.')
  }
  if (!options.targetRepository) {
    throw new ValidationError('Missing target repository.')
  }
  if (!options.localRepository) {
    throw new ValidationError('Missing local repository.')
  }
  if (!isValidRepository(options.targetRepository)) {
    throw new ValidationError(
      `Invalid repository format: '${options.targetRepository}'`,
    )
  }
  if (!isValidRepository(options.localRepository)) {
    throw new ValidationError(
      `Invalid repository format: '${options.localRepository}'`,
    )
  }
}

/**
 * Reject a tag outside the `YYYY.MM[.patch]` scheme.
 *
 * @param tag - Fetched tag.
 * @param label - Which repository the tag came from, used in the message.
 * @throws {ValidationError} When the tag does not match.
 */
export function validateTag(tag: string, label: 'Target' | 'Local'): void {
  if (!isValidTag(tag)) {
    throw new ValidationError(
      `${label} tag '${tag}' does not match expected format.`,
    )
  }
}

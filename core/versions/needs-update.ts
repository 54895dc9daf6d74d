/**
 * Decide whether the local repository has to follow the target tag.
 *
 * Any difference counts, including a target tag that looks older than the
 * local one. Tags are not ordered.
 *
 * @param targetTag - Newest tag of the target repository.
 * @param localTag - Newest tag of the local repository.
 * @returns True when the tags differ.
 */
export function needsUpdate(targetTag: string, localTag: string): boolean {
  return targetTag !== localTag
}

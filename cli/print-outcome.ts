import pc from 'picocolors'

import type { SyncOutcome } from '../types/sync-outcome'

/**
 * Prints a one-line summary of a finished run.
 *
 * @param outcome - Terminal state of the run.
 */
export function printOutcome(outcome: SyncOutcome): void {
  switch (outcome.status) {
    case 'up-to-date':
      console.info(
        pc.green(`\n✨ Already at ${outcome.targetTag ?? 'the latest tag'}\n`),
      )
      break
    case 'released':
      console.info(
        pc.green(`\n✓ Released ${outcome.targetTag ?? ''}`.trimEnd()),
        outcome.releaseUrl ? pc.gray(outcome.releaseUrl) : '',
      )
      break
    case 'dry-run':
      console.info(
        pc.yellow(
          `\n📋 Dry Run - ${outcome.targetTag ?? ''} would be released\n`,
        ),
      )
      break
    case 'failed':
      console.error(
        pc.redBright('\nError:'),
        outcome.error ? `[${outcome.error.kind}] ${outcome.error.message}` : '',
      )
      break
  }
}

import pc from 'picocolors'
import cac from 'cac'

import type { CLIOptions } from './resolve-options'

import { version } from '../package.json'
import { runSync } from './run-sync'

/** Run the CLI. */
export function run(): void {
  let cli = cac('upstream-release')

  cli
    .help()
    .version(version)
    .option('--auth <token>', 'GitHub token (default: $GITHUB_TOKEN)')
    .option('--target-repo <owner/name>', 'Upstream repository to follow')
    .option('--local-repo <owner/name>', 'Repository that receives releases')
    .option(
      '--discord-webhook <url>',
      'Discord webhook for notifications (default: $DISCORD_WEBHOOK_URL)',
    )
    .option('--base-branch <branch>', 'Branch for new tags (default: main)')
    .option('--api-url <url>', 'GitHub API URL (default: api.github.com)')
    .option('--timeout <ms>', 'Request timeout in milliseconds')
    .option('--dry-run', 'Compare tags without creating a release')
    .command('', 'Mirror the newest upstream tag as a local release')
    .action(async (options: CLIOptions) => {
      console.info(pc.cyan('\n🔁 Upstream Release\n'))

      process.exitCode = await runSync(options)
    })

  cli.parse()
}

import { createSpinner } from 'nanospinner'
import { resolve } from 'node:path'
import pc from 'picocolors'
import cac from 'cac'

import type { CLIOptions } from './resolve-options'

import { createChangeRequestPublisher } from '../core/publish/create-change-request-publisher'
import { createVersionChecker } from '../core/version-checker/create-version-checker'
import { parseExcludePatterns } from '../core/filters/create-exclude-filter'
import { createUpdateManager } from '../core/update/create-update-manager'
import { GitHubRateLimitError } from '../core/errors/github-rate-limit-error'
import { createGitHubClient } from '../core/api/create-github-client'
import { isGitHubTokenFormat } from '../core/api/is-github-token-format'
import { runPipeline } from '../core/pipeline/run-pipeline'
import { ConfigurationError } from './configuration-error'
import { createCliLogger } from './create-cli-logger'
import { resolveOptions } from './resolve-options'
import { printSummary } from './print-summary'
import { printPreview } from './print-preview'
import { version } from '../package.json'

/** Run the CLI. */
export function run(): void {
  let cli = cac('actions-pinner')

  cli
    .help()
    .version(version)
    .option('--repo <path>', 'Local repository root (default: .)')
    .option(
      '--workflows-path <path>',
      'Workflows directory (default: $WORKFLOWS_PATH or .github/workflows)',
    )
    .option(
      '--owner <owner>',
      'Repository owner (default: $GITHUB_REPOSITORY)',
    )
    .option(
      '--repo-name <name>',
      'Repository name (default: $GITHUB_REPOSITORY)',
    )
    .option(
      '--token <token>',
      'GitHub token (default: $GITHUB_TOKEN, $GH_TOKEN or gh auth token)',
    )
    .option('--dry-run', 'Preview changes without applying them')
    .option('--stage', 'Rewrite local files instead of opening a pull request')
    .option('--concurrency <n>', 'Parallel version checks (default: 4)')
    .option('--timeout <seconds>', 'Per-request timeout (default: 30)')
    .option('--branch <name>', 'Branch for the pull request')
    .option('--exclude <regex>', 'Exclude actions by regex (repeatable)')
    .option('--stable-only', 'Ignore pre-release tags')
    .command('', 'Pin GitHub Actions to the commits of their latest releases')
    .action(async (flags: CLIOptions) => {
      console.info(pc.cyan('\n📌 Actions Pinner\n'))

      let logger = createCliLogger()
      let spinner = createSpinner('Checking GitHub Actions...')

      try {
        let options = resolveOptions(flags)
        let rootPath = resolve(options.rootPath)
        if (options.token && !isGitHubTokenFormat(options.token)) {
          logger.warn('GitHub token does not match a known token format')
        }
        let client = createGitHubClient({
          timeout: options.timeout,
          token: options.token,
        })
        let versionChecker = createVersionChecker({
          stableOnly: options.stableOnly,
          client,
        })
        let repository =
          options.owner && options.repo
            ? `${options.owner}/${options.repo}`
            : undefined
        let publisher =
          options.owner && options.repo
            ? createChangeRequestPublisher({
                workflowsPath: options.workflowsPath,
                owner: options.owner,
                repo: options.repo,
                rootPath,
                client,
                logger,
              })
            : undefined

        spinner.start()
        let result = await runPipeline({
          updateManager: createUpdateManager({
            versionChecker,
            rootPath,
            logger,
          }),
          exclude: parseExcludePatterns(options.exclude, logger),
          getRateLimitStatus: () => client.getRateLimitStatus(),
          workflowsPath: options.workflowsPath,
          concurrency: options.concurrency,
          branch: options.branch,
          mode: options.mode,
          versionChecker,
          repository,
          publisher,
          rootPath,
          logger,
        })

        if (result.fatal) {
          spinner.error('Failed')
        } else {
          spinner.success(
            `Found ${pc.yellow(result.updates.length)} updates in ` +
              `${pc.yellow(result.files.length)} workflows`,
          )
        }

        if (result.mode === 'preview' && result.updates.length > 0) {
          printPreview(result.updates)
        }

        printSummary(result)

        let rateLimited = result.errors.find(
          error => error.cause instanceof GitHubRateLimitError,
        )
        if (rateLimited?.cause instanceof GitHubRateLimitError) {
          console.error(pc.yellow('\n⚠️ Rate Limit Exceeded\n'))
          console.error(rateLimited.cause.message)
          console.error(
            pc.gray('\nExample: GITHUB_TOKEN=<token> actions-pinner\n'),
          )
        }

        if (result.fatal) {
          process.exit(1)
        }
      } catch (error) {
        spinner.error('Failed')

        if (error instanceof ConfigurationError) {
          console.error(pc.redBright('\nConfiguration error:'), error.message)
        } else {
          console.error(
            pc.redBright('\nError:'),
            error instanceof Error ? error.message : String(error),
          )
        }
        process.exit(1)
      }
    })

  cli.parse()
}

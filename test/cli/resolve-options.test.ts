import { describe, expect, it } from 'vitest'

import { ConfigurationError } from '../../cli/configuration-error'
import { resolveOptions } from '../../cli/resolve-options'

let noToken = (): undefined => undefined

describe('resolveOptions', () => {
  it('applies defaults for a dry run', () => {
    expect(resolveOptions({ dryRun: true }, {}, noToken)).toEqual({
      workflowsPath: '.github/workflows',
      stableOnly: false,
      branch: undefined,
      owner: undefined,
      token: undefined,
      repo: undefined,
      mode: 'preview',
      timeout: 30_000,
      concurrency: 4,
      rootPath: '.',
      exclude: [],
    })
  })

  it('reads the repository from GITHUB_REPOSITORY', () => {
    let options = resolveOptions(
      {},
      { GITHUB_REPOSITORY: 'octo/app' },
      noToken,
    )

    expect(options).toMatchObject({
      mode: 'publish',
      owner: 'octo',
      repo: 'app',
    })
  })

  it('prefers flags over the environment', () => {
    let options = resolveOptions(
      { repoName: 'tools', owner: 'me', token: 'test-secret' },
      { GITHUB_REPOSITORY: 'octo/app', GITHUB_TOKEN: 'other' },
      () => 'from-env',
    )

    expect(options).toMatchObject({
      token: 'test-secret',
      repo: 'tools',
      owner: 'me',
    })
  })

  it('resolves the token from the environment', () => {
    let options = resolveOptions({ stage: true }, {}, () => 'test-secret')

    expect(options.token).toBe('test-secret')
    expect(options.mode).toBe('stage')
  })

  it('splits exclude lists and converts numbers', () => {
    let options = resolveOptions(
      {
        exclude: ['actions/.*, github/codeql', 'octo/tool'],
        concurrency: '2.7',
        timeout: '5',
        dryRun: true,
      },
      {},
      noToken,
    )

    expect(options.exclude).toEqual([
      'actions/.*',
      'github/codeql',
      'octo/tool',
    ])
    expect(options.concurrency).toBe(2)
    expect(options.timeout).toBe(5000)
  })

  it('rejects conflicting modes', () => {
    expect(() =>
      resolveOptions({ dryRun: true, stage: true }, {}, noToken),
    ).toThrow(new ConfigurationError('--dry-run and --stage cannot be combined'))
  })

  it('requires a repository to publish', () => {
    expect(() => resolveOptions({ owner: 'octo' }, {}, noToken)).toThrow(
      ConfigurationError,
    )
  })

  it('rejects invalid numbers', () => {
    expect(() =>
      resolveOptions({ concurrency: 'many', dryRun: true }, {}, noToken),
    ).toThrow('--concurrency must be a positive number')
    expect(() =>
      resolveOptions({ timeout: 0, dryRun: true }, {}, noToken),
    ).toThrow('--timeout must be a positive number')
  })
})

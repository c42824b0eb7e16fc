import { relative, resolve, sep } from 'node:path'

import type { PipelineOptions } from '../../types/pipeline-options'
import type { ActionReference } from '../../types/action-reference'
import type { PipelineResult } from '../../types/pipeline-result'
import type { Update } from '../../types/update'

import { parseActionReferences } from '../scanner/parse-action-references'
import { mapWithConcurrency } from '../concurrency/map-with-concurrency'
import { createExcludeFilter } from '../filters/create-exclude-filter'
import { ResolutionError } from '../errors/resolution-error'
import { DiscoveryError } from '../errors/discovery-error'
import { scanWorkflows } from '../scanner/scan-workflows'
import { PublishError } from '../errors/publish-error'
import { ParseError } from '../errors/parse-error'

/**
 * Run one scan → resolve → update pass over a repository.
 *
 * Unreadable files and failed lookups are logged and skipped. Discovery
 * failures, failed local edits in `stage` mode and publish failures end the
 * run and are reported as `fatal`. Once `signal` aborts, every reference not
 * yet checked fails with the abort reason as its cause and the updates found
 * so far are kept.
 *
 * @param options - Explicit run configuration.
 * @returns Summary of the run.
 */
export async function runPipeline(
  options: PipelineOptions,
): Promise<PipelineResult> {
  let {
    logger = console,
    versionChecker,
    updateManager,
    workflowsPath,
    getRateLimitStatus,
    exclude = [],
    concurrency,
    repository,
    publisher,
    rootPath,
    signal,
    branch,
    mode,
  } = options

  /**
   * Check one reference and build its update.
   *
   * @param reference - Scanned reference.
   * @returns Update, or null when the reference is current.
   */
  async function resolveUpdate(
    reference: ActionReference,
  ): Promise<Update | null> {
    try {
      signal?.throwIfAborted()
      let availability = await versionChecker.isUpdateAvailable(reference, {
        signal,
      })
      if (!availability.available) {
        return null
      }
      return await updateManager.createUpdate(
        reference.file,
        reference,
        availability.latestVersion,
        availability.latestHash,
        { signal },
      )
    } catch (error) {
      if (error instanceof ResolutionError) {
        throw error
      }
      throw new ResolutionError(reference, 'cannot check for updates', error)
    }
  }

  let result: PipelineResult = {
    references: [],
    updates: [],
    fatal: null,
    errors: [],
    files: [],
    mode,
  }

  let root = resolve(rootPath, workflowsPath)
  try {
    result.files = await scanWorkflows(root)
  } catch (error) {
    if (error instanceof DiscoveryError) {
      logger.error(error.message)
      result.fatal = error
      return result
    }
    throw error
  }

  let keep = createExcludeFilter(exclude)
  for (let file of result.files) {
    try {
      let references = await parseActionReferences(file, { repository })
      result.references.push(...references.filter(keep))
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error
      }
      logger.warn(error.message)
      result.errors.push(error)
    }
  }

  let limit = getRateLimitStatus
    ? Math.max(1, Math.min(concurrency, getRateLimitStatus().remaining))
    : concurrency
  let settled = await mapWithConcurrency(
    result.references,
    limit,
    resolveUpdate,
  )

  for (let outcome of settled) {
    if (outcome.status === 'fulfilled') {
      if (outcome.value) {
        result.updates.push(outcome.value)
      }
      continue
    }
    let error =
      outcome.reason instanceof Error
        ? outcome.reason
        : new Error(String(outcome.reason))
    logger.warn(error.message)
    result.errors.push(error)
  }

  if (mode === 'preview' || result.updates.length === 0) {
    return result
  }

  if (mode === 'stage') {
    result.apply = await updateManager.applyUpdates(result.updates, {
      atomic: true,
      signal,
    })
    for (let failure of result.apply.failures) {
      logger.error(failure.message)
    }
    if (result.apply.failures.length > 0) {
      result.fatal = new AggregateError(
        result.apply.failures,
        `${result.apply.failures.length} update(s) could not be applied`,
      )
    }
    return result
  }

  if (!publisher) {
    throw new Error('A publisher is required in publish mode')
  }

  let repositoryWorkflowsPath = relative(resolve(rootPath), root)
  if (repositoryWorkflowsPath && !repositoryWorkflowsPath.startsWith('..')) {
    publisher.setWorkflowsPath(repositoryWorkflowsPath.split(sep).join('/'))
  }

  try {
    result.publish = await publisher.createPR(result.updates, {
      signal,
      branch,
    })
  } catch (error) {
    if (!(error instanceof PublishError)) {
      throw error
    }
    logger.error(error.message)
    result.fatal = error
  }

  return result
}

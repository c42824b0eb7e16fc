import type {
  UpdateManager,
  RenderResult,
  ApplyOptions,
  ApplyResult,
} from '../../types/update-manager'
import type { VersionChecker } from '../../types/version-checker'
import type { ApplyErrorCode } from '../errors/apply-error'
import type { Logger } from '../../types/logger'
import type { Update } from '../../types/update'

import { isMissingPathError } from '../fs/is-missing-path-error'
import { checkConfinedFile } from '../fs/check-confined-file'
import { renderUpdatedContent } from './render-updated-content'
import { verifyYamlIntegrity } from './verify-yaml-integrity'
import { writeFileAtomic } from '../fs/write-file-atomic'
import { readTextFile } from '../fs/read-text-file'
import { ApplyError } from '../errors/apply-error'
import { createFileLock } from './create-file-lock'
import { createUpdate } from './create-update'

/** Options for `createUpdateManager`. */
export interface UpdateManagerOptions {
  /** Resolves the current commit of a reference. */
  versionChecker: Pick<VersionChecker, 'getCommitHash'>

  /** Files outside this directory are never read or written. */
  rootPath?: string

  /** Defaults to `console`. */
  logger?: Logger
}

/** Rendered file waiting to be written. */
interface PlannedFile {
  render: RenderResult
  original: string
  file: string
}

/**
 * Create an update manager for the local working tree.
 *
 * @param options - Commit resolver and logger.
 * @returns Update manager.
 */
export function createUpdateManager(
  options: UpdateManagerOptions,
): UpdateManager {
  let { logger = console, versionChecker, rootPath } = options
  let lock = createFileLock()

  /**
   * Fail every update of a file with the same reason.
   *
   * @param updates - Updates for the file.
   * @param code - Failure category.
   * @param message - Failure description.
   * @param cause - Underlying error.
   * @returns One error per update.
   */
  function failAll(
    updates: Update[],
    code: ApplyErrorCode,
    message: string,
    cause?: unknown,
  ): ApplyError[] {
    return updates.map(update => new ApplyError(update, code, message, cause))
  }

  /**
   * Fail updates that were not attempted because the run was cancelled.
   *
   * @param updates - Updates left undone.
   * @param signal - Aborted signal.
   * @returns One error per update.
   */
  function cancelled(updates: Update[], signal: AbortSignal): ApplyError[] {
    return failAll(updates, 'cancelled', 'cancelled', signal.reason)
  }

  /**
   * Read and render one file. Failures are reported per update.
   *
   * @param file - File path.
   * @param updates - Updates for the file.
   * @returns Plan, or the failures that prevent one.
   */
  async function planFile(
    file: string,
    updates: Update[],
  ): Promise<{ failures: ApplyError[] } | PlannedFile> {
    let original: string
    try {
      if (rootPath !== undefined) {
        let violation = await checkConfinedFile(file, rootPath)
        if (violation) {
          return {
            failures: failAll(updates, violation.code, violation.message),
          }
        }
      }
      original = await readTextFile(file)
    } catch (error) {
      return {
        failures: isMissingPathError(error)
          ? failAll(updates, 'missing-file', 'file no longer exists', error)
          : failAll(updates, 'write-failed', 'cannot read file', error),
      }
    }

    let render = renderUpdatedContent(original, updates)
    if (
      render.applied.length > 0 &&
      !verifyYamlIntegrity(original, render.content)
    ) {
      return {
        failures: [
          ...render.failures,
          ...render.applied.map(
            update =>
              new ApplyError(
                update,
                'invalid-yaml',
                'edit would leave the file unparsable',
              ),
          ),
        ],
      }
    }

    return { original, render, file }
  }

  /**
   * Write a planned file if its content changed.
   *
   * @param plan - Rendered file.
   * @param result - Accumulated result.
   */
  async function writePlan(
    plan: PlannedFile,
    result: ApplyResult,
  ): Promise<void> {
    let { original, render, file } = plan
    result.skipped.push(...render.skipped)

    if (render.content === original) {
      return
    }

    try {
      await writeFileAtomic(file, render.content)
      result.applied.push(...render.applied)
      result.files.push(file)
    } catch (error) {
      result.failures.push(
        ...failAll(render.applied, 'write-failed', 'cannot write file', error),
      )
    }
  }

  /**
   * Plan and write one file unless the run was cancelled.
   *
   * @param file - File path.
   * @param updates - Updates for the file.
   * @param result - Accumulated result.
   * @param signal - Cancellation signal.
   */
  async function applyFile(
    file: string,
    updates: Update[],
    result: ApplyResult,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    if (signal?.aborted) {
      result.failures.push(...cancelled(updates, signal))
      return
    }
    let plan = await planFile(file, updates)
    if ('failures' in plan) {
      result.failures.push(...plan.failures)
      return
    }
    result.failures.push(...plan.render.failures)
    await writePlan(plan, result)
  }

  return {
    applyUpdates: async (updates, applyOptions: ApplyOptions = {}) => {
      let { atomic = false, signal } = applyOptions
      let result: ApplyResult = {
        failures: [],
        skipped: [],
        applied: [],
        files: [],
      }

      let groups = new Map<string, Update[]>()
      for (let update of updates) {
        let group = groups.get(update.file) ?? []
        group.push(update)
        groups.set(update.file, group)
      }

      if (!atomic) {
        let entries = [...groups]
        let settled = await Promise.allSettled(
          entries.map(([file, fileUpdates]) =>
            lock(file, () => applyFile(file, fileUpdates, result, signal)),
          ),
        )
        for (let [index, outcome] of settled.entries()) {
          let entry = entries[index]
          if (outcome.status === 'rejected' && entry) {
            result.failures.push(
              ...failAll(
                entry[1],
                'write-failed',
                'cannot update file',
                outcome.reason,
              ),
            )
          }
        }
        return result
      }

      let plans: PlannedFile[] = []
      for (let [file, fileUpdates] of groups) {
        if (signal?.aborted) {
          result.failures.push(...cancelled(fileUpdates, signal))
          continue
        }
        let plan = await lock(file, () => planFile(file, fileUpdates))
        if ('failures' in plan) {
          result.failures.push(...plan.failures)
        } else if (plan.render.failures.length > 0) {
          result.failures.push(...plan.render.failures)
        } else {
          plans.push(plan)
        }
      }

      if (result.failures.length > 0) {
        logger.warn(
          `Not writing ${plans.length} file(s): ` +
            `${result.failures.length} update(s) failed`,
        )
        return result
      }

      for (let plan of plans) {
        if (signal?.aborted) {
          result.failures.push(...cancelled(plan.render.applied, signal))
          continue
        }
        await lock(plan.file, () => writePlan(plan, result))
      }

      return result
    },

    createUpdate: async (
      file,
      reference,
      newVersion,
      newHash,
      requestOptions = {},
    ) => {
      let oldHash = await versionChecker.getCommitHash(
        reference,
        reference.version,
        requestOptions,
      )
      return createUpdate({ newVersion, reference, oldHash, newHash, file })
    },
  }
}

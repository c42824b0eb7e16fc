export type {
  ChangeRequestPublisher,
  PublishOptions,
  PublishResult,
} from '../types/change-request-publisher'
export type {
  UpdateManager,
  RenderResult,
  ApplyOptions,
  ApplyResult,
} from '../types/update-manager'
export type {
  UpdateAvailability,
  VersionChecker,
  LatestVersion,
} from '../types/version-checker'
export type {
  PullRequestInfo,
  TreeEntryInput,
  TreeEntry,
  TagListOptions,
  GitHubClient,
  CommitInfo,
} from '../types/github-client'
export type { PipelineOptions } from '../types/pipeline-options'
export type { ActionReference } from '../types/action-reference'
export type { RequestOptions } from '../types/request-options'
export type { PipelineResult } from '../types/pipeline-result'
export type { PublishState } from '../types/publish-state'
export type { Annotation } from '../types/annotation'
export type { RunMode } from '../types/run-mode'
export type { TagInfo } from '../types/tag-info'
export type { Logger } from '../types/logger'
export type { Update } from '../types/update'

export { createChangeRequestPublisher } from './publish/create-change-request-publisher'
export { createVersionChecker } from './version-checker/create-version-checker'
export { extractActionReferences } from './scanner/extract-action-references'
export { parseActionReferences } from './scanner/parse-action-references'
export { renderUpdatedContent } from './update/render-updated-content'
export { createUpdateManager } from './update/create-update-manager'
export { GitHubRateLimitError } from './errors/github-rate-limit-error'
export { GitHubNetworkError } from './errors/github-network-error'
export { createGitHubClient } from './api/create-github-client'
export { ResolutionError } from './errors/resolution-error'
export { DiscoveryError } from './errors/discovery-error'
export { GitHubApiError } from './errors/github-api-error'
export { scanWorkflows } from './scanner/scan-workflows'
export { PublishError } from './errors/publish-error'
export { runPipeline } from './pipeline/run-pipeline'
export { ApplyError } from './errors/apply-error'
export { ParseError } from './errors/parse-error'

/**
 * issue-desk - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { GitHubClient, parseRepoRef, PAGE_SIZE } from './lib/github-client';
export { FieldMapper, DEFAULT_LOCAL_ATTRIBUTES, displayName } from './lib/field-mapper';
export { AnnotationStore, repositoryKey } from './lib/annotation-store';
export { reconcile, upstreamOf, localOf, withUpstream, replaceUpstream, updateLocal } from './lib/reconciler';
export { projectStatus, statusCategory, sortIssues, compareIssues, CATEGORY_PRIORITY } from './lib/status-projection';
export type { StatusCategory, StatusProjection } from './lib/status-projection';
export { IssueService, impliedState } from './lib/issue-service';
export type { ManualStatusResult } from './lib/issue-service';
export { describeChanges, formatChanges, hasChanges, diffBody } from './lib/change-reporter';
export { ConfigManager, defaultConfig, defaultConfigDirectory } from './lib/config';
export { ConsoleLogger, logger } from './lib/logger';
export type { Logger } from './lib/logger';
export { GitHubClientError, IssueNotFoundError } from './lib/errors';

export * from './lib/types';

/**
 * Orchestrates fetches, reconciliation and user mutations for one or more
 * repositories. The cache file is the only persistent state; every mutation
 * reads it, applies the change and writes the whole list back.
 */

import { AnnotationStore, REPOSITORIES_FILE, repositoryKey } from './annotation-store';
import { errorMessage, IssueNotFoundError } from './errors';
import { GitHubClient } from './github-client';
import { Logger, logger as defaultLogger } from './logger';
import { reconcile, replaceUpstream, updateLocal } from './reconciler';
import {
  CommentRecord,
  CommentResult,
  IssueMutationResult,
  IssueRecord,
  IssueState,
  IssueStateFilter,
  LocalAttributes,
  ManualStatus,
  RefreshResult,
  RepoRef,
  RepositoryListResult,
  RepositoryRecord,
} from './types';

export interface ManualStatusResult extends RefreshResult {
  /** Set when the implied close/reopen on GitHub failed; the local status is applied anyway */
  remoteError?: Error;
  /** Set when the follow-up refresh failed; issues is then the cached list with the new status */
  refreshError?: Error;
}

/**
 * Upstream state implied by a manual status, or null when none is implied
 */
export function impliedState(status: ManualStatus): IssueState | null {
  switch (status) {
    case 'red':
    case 'yellow':
      return 'open';
    case 'lightGreen':
    case 'darkGreen':
      return 'closed';
    case 'none':
      return null;
  }
}

export class IssueService {
  private github: GitHubClient;
  private store: AnnotationStore;
  private logger: Logger;
  private generations = new Map<string, number>();
  private queues = new Map<string, Promise<void>>();

  constructor(github: GitHubClient, store: AnnotationStore, logger: Logger = defaultLogger) {
    this.github = github;
    this.store = store;
    this.logger = logger;
  }

  /**
   * Cached issues to show before any network call completes
   */
  async seed(repo: RepoRef): Promise<IssueRecord[]> {
    return (await this.store.load(repositoryKey(repo))) ?? [];
  }

  /**
   * Find a cached issue by its number
   */
  async findByNumber(repo: RepoRef, issueNumber: number): Promise<IssueRecord | undefined> {
    const issues = await this.seed(repo);
    return issues.find((issue) => issue.number === issueNumber);
  }

  /**
   * Fetch issues, merge them with the cached annotations and persist the result.
   *
   * If another refresh or a local mutation for the same repository starts
   * before this one finishes, the result is returned with stale=true and not
   * saved.
   */
  async refresh(repo: RepoRef, state: IssueStateFilter = 'all'): Promise<RefreshResult> {
    const key = repositoryKey(repo);
    const generation = this.bumpGeneration(key);

    const fetched = await this.github.listIssues(repo, state);

    return this.withKeyLock(key, async () => {
      const cached = (await this.store.load(key)) ?? [];
      const issues = reconcile(fetched, cached);

      if (this.generations.get(key) !== generation) {
        this.logger.debug(`Discarding superseded refresh of ${repo.owner}/${repo.name}`);
        return { issues, stale: true };
      }

      const saved = await this.store.save(key, issues);
      this.logger.debug(`Refreshed ${issues.length} issue(s) for ${repo.owner}/${repo.name}`);

      return saved.ok ? { issues, stale: false } : { issues, stale: false, saveError: saved.error };
    });
  }

  /**
   * Edit private notes. Local only.
   */
  async setNote(repo: RepoRef, issueId: number, notes: string | null): Promise<IssueMutationResult> {
    const privateNotes = notes === null || notes.trim() === '' ? null : notes;
    return this.updateLocalAttributes(repo, issueId, { privateNotes });
  }

  /**
   * Toggle the archive flag. Local only.
   */
  async setArchived(repo: RepoRef, issueId: number, isArchived: boolean): Promise<IssueMutationResult> {
    return this.updateLocalAttributes(repo, issueId, { isArchived });
  }

  /**
   * Set the manual status. A status that implies a different upstream state
   * closes or reopens the issue first; that call is best-effort. The local
   * status is applied either way, then the repository is refreshed. A failed
   * refresh is reported in the result, since the status is already saved.
   */
  async setManualStatus(repo: RepoRef, issueId: number, status: ManualStatus): Promise<ManualStatusResult> {
    const issue = await this.requireCached(repo, issueId);
    const target = impliedState(status);

    let remoteError: Error | undefined;
    if (target && issue.state !== target) {
      try {
        if (target === 'closed') {
          await this.github.closeIssue(repo, issue.number);
        } else {
          await this.github.reopenIssue(repo, issue.number);
        }
      } catch (error) {
        remoteError = toError(error);
        this.logger.warn(`Could not ${target === 'closed' ? 'close' : 'reopen'} #${issue.number}: ${errorMessage(error)}`);
      }
    }

    const local = await this.updateLocalAttributes(repo, issueId, { manualStatus: status });

    let result: ManualStatusResult;
    try {
      result = await this.refresh(repo);
    } catch (error) {
      this.logger.warn(`Status saved but refresh failed: ${errorMessage(error)}`);
      result = { issues: await this.seed(repo), stale: false, refreshError: toError(error) };
    }

    if (local.saveError && !result.saveError) {
      result = { ...result, saveError: local.saveError };
    }
    return remoteError ? { ...result, remoteError } : result;
  }

  /**
   * Close or reopen an issue on GitHub, then re-fetch it and replace only its
   * upstream attributes.
   */
  async setOpenState(repo: RepoRef, issueId: number, open: boolean): Promise<IssueMutationResult> {
    const issue = await this.requireCached(repo, issueId);

    if (open) {
      await this.github.reopenIssue(repo, issue.number);
    } else {
      await this.github.closeIssue(repo, issue.number);
    }

    const fresh = await this.github.getIssue(repo, issue.number);
    return this.applyUpstream(repo, fresh);
  }

  /**
   * Create an issue on GitHub and add it to the cache with default annotations
   */
  async createIssue(repo: RepoRef, title: string, body?: string): Promise<IssueMutationResult> {
    const created = await this.github.createIssue(repo, title, body);
    const key = repositoryKey(repo);

    return this.withKeyLock(key, async () => {
      this.bumpGeneration(key);
      const cached = (await this.store.load(key)) ?? [];
      const saved = await this.store.save(key, [...cached.filter((issue) => issue.id !== created.id), created]);
      return saved.ok ? { issue: created } : { issue: created, saveError: saved.error };
    });
  }

  /**
   * Update title and/or body on GitHub, keeping local attributes
   */
  async editIssue(
    repo: RepoRef,
    issueId: number,
    changes: { title?: string; body?: string }
  ): Promise<IssueMutationResult> {
    const issue = await this.requireCached(repo, issueId);
    const updated = await this.github.updateIssue(repo, issue.number, changes);
    return this.applyUpstream(repo, updated);
  }

  async listComments(repo: RepoRef, issueNumber: number): Promise<CommentRecord[]> {
    return this.github.listComments(repo, issueNumber);
  }

  /**
   * Post a comment, then refresh the cached issue so its comment count is current
   */
  async addComment(repo: RepoRef, issueNumber: number, body: string): Promise<CommentResult> {
    const comment = await this.github.createComment(repo, issueNumber, body);

    const cachedIssue = await this.findByNumber(repo, issueNumber);
    if (!cachedIssue) {
      return { comment };
    }

    const fresh = await this.github.getIssue(repo, issueNumber);
    const { saveError } = await this.applyUpstream(repo, fresh);
    return saveError ? { comment, saveError } : { comment };
  }

  /**
   * Fetch the user's repositories and cache the list
   */
  async listRepositories(username: string): Promise<RepositoryListResult> {
    const repositories = await this.github.listRepositories(username);
    const saved = await this.withKeyLock(REPOSITORIES_FILE, () => this.store.saveRepositories(repositories));
    return saved.ok ? { repositories } : { repositories, saveError: saved.error };
  }

  async seedRepositories(): Promise<RepositoryRecord[]> {
    return (await this.store.loadRepositories()) ?? [];
  }

  private bumpGeneration(key: string): number {
    const next = (this.generations.get(key) ?? 0) + 1;
    this.generations.set(key, next);
    return next;
  }

  /**
   * Run a load-modify-save on one cache file after every earlier one for the
   * same key has finished
   */
  private async withKeyLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(key, settled);

    try {
      return await run;
    } finally {
      if (this.queues.get(key) === settled) {
        this.queues.delete(key);
      }
    }
  }

  private async requireCached(repo: RepoRef, issueId: number): Promise<IssueRecord> {
    const issues = await this.seed(repo);
    const issue = issues.find((candidate) => candidate.id === issueId);
    if (!issue) {
      throw new IssueNotFoundError(repositoryKey(repo), issueId);
    }
    return issue;
  }

  private async updateLocalAttributes(
    repo: RepoRef,
    issueId: number,
    changes: Partial<LocalAttributes>
  ): Promise<IssueMutationResult> {
    const key = repositoryKey(repo);

    return this.withKeyLock(key, async () => {
      // Local edits must not be overwritten by a refresh that fetched earlier
      this.bumpGeneration(key);

      const cached = (await this.store.load(key)) ?? [];
      const updated = updateLocal(cached, issueId, changes);
      const issue = updated.find((candidate) => candidate.id === issueId);
      if (!issue) {
        throw new IssueNotFoundError(key, issueId);
      }

      const saved = await this.store.save(key, updated);
      return saved.ok ? { issue } : { issue, saveError: saved.error };
    });
  }

  private async applyUpstream(repo: RepoRef, fresh: IssueRecord): Promise<IssueMutationResult> {
    const key = repositoryKey(repo);

    return this.withKeyLock(key, async () => {
      this.bumpGeneration(key);

      const cached = (await this.store.load(key)) ?? [];
      const updated = replaceUpstream(cached, fresh);
      const saved = await this.store.save(key, updated);

      const issue = updated.find((candidate) => candidate.id === fresh.id) ?? fresh;
      return saved.ok ? { issue } : { issue, saveError: saved.error };
    });
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * GitHub API client wrapper using Octokit
 */

import { Octokit } from '@octokit/rest';
import { errorMessage, GitHubClientError } from './errors';
import { FieldMapper } from './field-mapper';
import {
  AppConfig,
  CommentRecord,
  IssueRecord,
  IssueState,
  IssueStateFilter,
  RepoRef,
  RepositoryRecord,
} from './types';

// Single page only; nothing is paginated past this
export const PAGE_SIZE = 100;

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Parse "owner/name" into a repository reference
 */
export function parseRepoRef(fullName: string): RepoRef {
  const parts = fullName.split('/');
  if (parts.length !== 2 || !NAME_PATTERN.test(parts[0]) || !NAME_PATTERN.test(parts[1])) {
    throw new GitHubClientError(
      'invalid-request',
      `Invalid repo format: ${fullName}. Expected "owner/repo"`
    );
  }
  return { owner: parts[0], name: parts[1] };
}

export class GitHubClient {
  private octokit: Octokit;
  private token: string;
  private mapper: FieldMapper;

  constructor(credentials: AppConfig['github'], mapper: FieldMapper = new FieldMapper()) {
    this.token = credentials.token;
    this.mapper = mapper;
    this.octokit = new Octokit({
      auth: credentials.token || undefined,
      log: {
        debug: () => {},
        info: () => {},
        warn: () => {},
        error: () => {},
      },
    });
  }

  /**
   * List repositories owned by a user, most recently updated first
   */
  async listRepositories(username: string): Promise<RepositoryRecord[]> {
    if (!NAME_PATTERN.test(username)) {
      throw new GitHubClientError('invalid-request', `Invalid GitHub username: "${username}"`);
    }

    return this.request(`list repositories for ${username}`, async () => {
      const { data } = await this.octokit.repos.listForUser({
        username,
        per_page: PAGE_SIZE,
        sort: 'updated',
      });
      return this.decode('repository list', () => data.map((repo) => this.mapper.repositoryFromGitHub(repo)));
    });
  }

  /**
   * List issues for a repository; pull requests are filtered out
   */
  async listIssues(repo: RepoRef, state: IssueStateFilter = 'all'): Promise<IssueRecord[]> {
    this.validateRepo(repo);

    return this.request(`list issues for ${repo.owner}/${repo.name}`, async () => {
      const { data } = await this.octokit.issues.listForRepo({
        owner: repo.owner,
        repo: repo.name,
        state,
        per_page: PAGE_SIZE,
      });
      return this.decode('issue list', () =>
        data
          .filter((issue) => !issue.pull_request)
          .map((issue) => this.mapper.issueFromGitHub(issue))
      );
    });
  }

  /**
   * Get a single issue by number
   */
  async getIssue(repo: RepoRef, issueNumber: number): Promise<IssueRecord> {
    this.validateRepo(repo);

    return this.request(`get issue #${issueNumber}`, async () => {
      const { data } = await this.octokit.issues.get({
        owner: repo.owner,
        repo: repo.name,
        issue_number: issueNumber,
      });
      return this.decode('issue', () => this.mapper.issueFromGitHub(data));
    });
  }

  /**
   * Create a new issue
   */
  async createIssue(repo: RepoRef, title: string, body?: string): Promise<IssueRecord> {
    this.validateRepo(repo);
    if (!title.trim()) {
      throw new GitHubClientError('invalid-request', 'Issue title must not be empty');
    }

    return this.request(`create issue in ${repo.owner}/${repo.name}`, async () => {
      const { data } = await this.octokit.issues.create({
        owner: repo.owner,
        repo: repo.name,
        title,
        body,
      });
      return this.decode('issue', () => this.mapper.issueFromGitHub(data));
    });
  }

  /**
   * Update an existing issue
   */
  async updateIssue(
    repo: RepoRef,
    issueNumber: number,
    updates: {
      title?: string;
      body?: string;
      state?: IssueState;
    }
  ): Promise<IssueRecord> {
    this.validateRepo(repo);

    return this.request(`update issue #${issueNumber}`, async () => {
      const { data } = await this.octokit.issues.update({
        owner: repo.owner,
        repo: repo.name,
        issue_number: issueNumber,
        ...updates,
      });
      return this.decode('issue', () => this.mapper.issueFromGitHub(data));
    });
  }

  /**
   * Close an issue
   */
  async closeIssue(repo: RepoRef, issueNumber: number): Promise<IssueRecord> {
    return this.updateIssue(repo, issueNumber, { state: 'closed' });
  }

  /**
   * Reopen an issue
   */
  async reopenIssue(repo: RepoRef, issueNumber: number): Promise<IssueRecord> {
    return this.updateIssue(repo, issueNumber, { state: 'open' });
  }

  async listComments(repo: RepoRef, issueNumber: number): Promise<CommentRecord[]> {
    this.validateRepo(repo);

    return this.request(`list comments on #${issueNumber}`, async () => {
      const { data } = await this.octokit.issues.listComments({
        owner: repo.owner,
        repo: repo.name,
        issue_number: issueNumber,
        per_page: PAGE_SIZE,
      });
      return this.decode('comment list', () => data.map((comment) => this.mapper.commentFromGitHub(comment)));
    });
  }

  async createComment(repo: RepoRef, issueNumber: number, body: string): Promise<CommentRecord> {
    this.validateRepo(repo);
    if (!body.trim()) {
      throw new GitHubClientError('invalid-request', 'Comment body must not be empty');
    }

    return this.request(`comment on #${issueNumber}`, async () => {
      const { data } = await this.octokit.issues.createComment({
        owner: repo.owner,
        repo: repo.name,
        issue_number: issueNumber,
        body,
      });
      return this.decode('comment', () => this.mapper.commentFromGitHub(data));
    });
  }

  /**
   * Verify the configured token is accepted by GitHub
   */
  async verifyAccess(): Promise<boolean> {
    if (!this.token) return false;

    try {
      await this.octokit.users.getAuthenticated();
      return true;
    } catch (error) {
      return false;
    }
  }

  private validateRepo(repo: RepoRef): void {
    if (!NAME_PATTERN.test(repo.owner) || !NAME_PATTERN.test(repo.name)) {
      throw new GitHubClientError(
        'invalid-request',
        `Invalid repository "${repo.owner}/${repo.name}"`
      );
    }
  }

  /**
   * Run an API call, translating every failure into a GitHubClientError
   */
  private async request<T>(action: string, call: () => Promise<T>): Promise<T> {
    if (!this.token) {
      throw GitHubClientError.missingCredential();
    }

    try {
      return await call();
    } catch (error) {
      if (error instanceof GitHubClientError) {
        throw error;
      }
      if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        throw GitHubClientError.http(error.status, `${action}: ${errorMessage(error)}`, error);
      }
      if (error instanceof SyntaxError) {
        throw new GitHubClientError('decode', `Could not read GitHub response (${action}): ${error.message}`, {
          cause: error,
        });
      }
      throw new GitHubClientError('http', `GitHub request failed (${action}): ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Map a response payload, reporting shape mismatches as decode failures
   */
  private decode<T>(action: string, map: () => T): T {
    try {
      return map();
    } catch (error) {
      if (error instanceof GitHubClientError) {
        throw error;
      }
      throw new GitHubClientError('decode', `Unexpected GitHub response (${action}): ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

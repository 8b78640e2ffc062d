/**
 * JSON-file cache of annotated issues, one file per repository
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { ZodType, ZodTypeDef } from 'zod';
import { StoredIssueListSchema, StoredRepositoryListSchema } from './cache-schema';
import { errorMessage } from './errors';
import { Logger, logger as defaultLogger } from './logger';
import { AppConfig, IssueRecord, RepoRef, RepositoryRecord, SaveResult } from './types';

export const REPOSITORIES_FILE = 'repositories.json';

let tempCounter = 0;

/**
 * Cache key for a repository. Derived from the short name only, so a renamed
 * repository starts with an empty cache.
 */
export function repositoryKey(repo: Pick<RepoRef, 'name'>): string {
  return repo.name.replace(/[^A-Za-z0-9._-]/g, '_');
}

/**
 * Issue record with keys in a fixed order: upstream fields, then local fields
 */
function serializeIssue(issue: IssueRecord): IssueRecord {
  return {
    id: issue.id,
    number: issue.number,
    title: issue.title,
    body: issue.body,
    state: issue.state,
    author: { login: issue.author.login, avatarUrl: issue.author.avatarUrl },
    labels: issue.labels.map((label) => ({ name: label.name, color: label.color })),
    comments: issue.comments,
    createdAt: issue.createdAt,
    updatedAt: issue.updatedAt,
    closedAt: issue.closedAt,
    htmlUrl: issue.htmlUrl,
    privateNotes: issue.privateNotes,
    isArchived: issue.isArchived,
    manualStatus: issue.manualStatus,
  };
}

function serializeRepository(repo: RepositoryRecord): RepositoryRecord {
  return {
    id: repo.id,
    name: repo.name,
    fullName: repo.fullName,
    owner: repo.owner,
    description: repo.description,
    htmlUrl: repo.htmlUrl,
    cloneUrl: repo.cloneUrl,
    sshUrl: repo.sshUrl,
    homepage: repo.homepage,
    language: repo.language,
    forksCount: repo.forksCount,
    stargazersCount: repo.stargazersCount,
    watchersCount: repo.watchersCount,
    size: repo.size,
    defaultBranch: repo.defaultBranch,
    openIssuesCount: repo.openIssuesCount,
    isPrivate: repo.isPrivate,
    isFork: repo.isFork,
    isArchived: repo.isArchived,
    hasWiki: repo.hasWiki,
    hasPages: repo.hasPages,
    createdAt: repo.createdAt,
    updatedAt: repo.updatedAt,
    pushedAt: repo.pushedAt,
  };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class AnnotationStore {
  private dataDirectory: string;
  private logger: Logger;
  private pendingWrites = new Map<string, Promise<SaveResult>>();

  constructor(paths: AppConfig['paths'], logger: Logger = defaultLogger) {
    this.dataDirectory = paths.dataDirectory;
    this.logger = logger;
  }

  /**
   * Path of the cache file for a repository key
   */
  issueFilePath(key: string): string {
    return path.join(this.dataDirectory, `issues-${key}.json`);
  }

  get repositoriesFilePath(): string {
    return path.join(this.dataDirectory, REPOSITORIES_FILE);
  }

  /**
   * Load cached issues. Returns null when there is no usable cache.
   */
  async load(key: string): Promise<IssueRecord[] | null> {
    return this.readList(this.issueFilePath(key), StoredIssueListSchema);
  }

  /**
   * Overwrite the cache for a repository key. Never throws.
   */
  async save(key: string, records: readonly IssueRecord[]): Promise<SaveResult> {
    return this.writeList(this.issueFilePath(key), records.map(serializeIssue));
  }

  async loadRepositories(): Promise<RepositoryRecord[] | null> {
    return this.readList(this.repositoriesFilePath, StoredRepositoryListSchema);
  }

  async saveRepositories(repos: readonly RepositoryRecord[]): Promise<SaveResult> {
    return this.writeList(this.repositoriesFilePath, repos.map(serializeRepository));
  }

  private async readList<T>(filePath: string, schema: ZodType<T[], ZodTypeDef, unknown>): Promise<T[] | null> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug(`No cache at ${filePath}`);
      } else {
        this.logger.warn(`Ignoring unreadable cache ${filePath}: ${errorMessage(error)}`);
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable cache ${filePath}: ${errorMessage(error)}`);
      return null;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.logger.warn(`Ignoring invalid cache ${filePath}: ${issue.path.join('.')} ${issue.message}`);
      return null;
    }

    return parsed.data;
  }

  /**
   * Queue a write behind any write to the same file that is still running
   */
  private writeList(filePath: string, items: unknown[]): Promise<SaveResult> {
    const previous = this.pendingWrites.get(filePath);
    const next = previous
      ? previous.then(() => this.replaceFile(filePath, items))
      : this.replaceFile(filePath, items);
    this.pendingWrites.set(filePath, next);

    return next.finally(() => {
      if (this.pendingWrites.get(filePath) === next) {
        this.pendingWrites.delete(filePath);
      }
    });
  }

  /**
   * Write to a uniquely named temporary sibling, then rename over the target
   */
  private async replaceFile(filePath: string, items: unknown[]): Promise<SaveResult> {
    tempCounter += 1;
    const tempPath = `${filePath}.${process.pid}.${tempCounter}.tmp`;

    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(items, null, 2) + '\n', 'utf-8');
      await rename(tempPath, filePath);
      this.logger.debug(`Cache saved to ${filePath}`);
      return { ok: true, path: filePath };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`Failed to save cache ${filePath}: ${cause.message}`);
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) =>
        this.logger.debug(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`)
      );
      return { ok: false, path: filePath, error: cause };
    }
  }
}

/**
 * Translates GitHub REST payloads (snake_case) into the internal camelCase model
 */

import { GitHubClientError } from './errors';
import {
  CommentRecord,
  IssueLabel,
  IssueRecord,
  IssueState,
  LocalAttributes,
  RepositoryRecord,
  UpstreamAttributes,
  UserRef,
} from './types';

export interface GitHubUserPayload {
  login: string;
  avatar_url: string;
}

export interface GitHubIssuePayload {
  id: number;
  number: number;
  title: string;
  body?: string | null;
  state: string;
  html_url: string;
  user: GitHubUserPayload | null;
  labels: Array<string | { name?: string; color?: string | null }>;
  comments: number;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
  pull_request?: unknown;
}

export interface GitHubRepositoryPayload {
  id: number;
  name: string;
  full_name: string;
  owner: GitHubUserPayload;
  description: string | null;
  html_url: string;
  clone_url?: string;
  ssh_url?: string;
  homepage?: string | null;
  language?: string | null;
  forks_count?: number;
  stargazers_count?: number;
  watchers_count?: number;
  size?: number;
  default_branch?: string;
  open_issues_count?: number;
  private: boolean;
  fork: boolean;
  archived?: boolean;
  has_wiki?: boolean;
  has_pages?: boolean;
  created_at?: string | null;
  updated_at?: string | null;
  pushed_at?: string | null;
}

export interface GitHubCommentPayload {
  id: number;
  body?: string;
  user: GitHubUserPayload | null;
  created_at: string;
  updated_at: string;
}

// GitHub shows deleted accounts as "ghost"
const GHOST_USER: UserRef = { login: 'ghost', avatarUrl: '' };

export const DEFAULT_LOCAL_ATTRIBUTES: Readonly<LocalAttributes> = Object.freeze({
  privateNotes: null,
  isArchived: false,
  manualStatus: 'none',
});

export class FieldMapper {
  /**
   * Convert a GitHub issue payload to an issue record with default local attributes
   */
  issueFromGitHub(payload: GitHubIssuePayload): IssueRecord {
    return {
      ...this.upstreamFromGitHub(payload),
      ...DEFAULT_LOCAL_ATTRIBUTES,
    };
  }

  /**
   * Extract upstream attributes from a GitHub issue payload
   */
  upstreamFromGitHub(payload: GitHubIssuePayload): UpstreamAttributes {
    return {
      id: payload.id,
      number: payload.number,
      title: payload.title,
      body: payload.body ?? null,
      state: this.parseState(payload.state, `issue #${payload.number}`),
      author: this.userFromGitHub(payload.user),
      labels: this.parseLabels(payload.labels),
      comments: payload.comments,
      createdAt: payload.created_at,
      updatedAt: payload.updated_at,
      closedAt: payload.closed_at ?? null,
      htmlUrl: payload.html_url,
    };
  }

  repositoryFromGitHub(payload: GitHubRepositoryPayload): RepositoryRecord {
    return {
      id: payload.id,
      name: payload.name,
      fullName: payload.full_name,
      owner: payload.owner.login,
      description: payload.description,
      htmlUrl: payload.html_url,
      cloneUrl: payload.clone_url ?? `${payload.html_url}.git`,
      sshUrl: payload.ssh_url ?? `git@github.com:${payload.full_name}.git`,
      homepage: payload.homepage || null,
      language: payload.language ?? null,
      forksCount: payload.forks_count ?? 0,
      stargazersCount: payload.stargazers_count ?? 0,
      watchersCount: payload.watchers_count ?? 0,
      size: payload.size ?? 0,
      defaultBranch: payload.default_branch ?? 'main',
      openIssuesCount: payload.open_issues_count ?? 0,
      isPrivate: payload.private,
      isFork: payload.fork,
      isArchived: payload.archived ?? false,
      hasWiki: payload.has_wiki ?? false,
      hasPages: payload.has_pages ?? false,
      createdAt: this.requireTimestamp(payload.created_at, `repository ${payload.full_name}`),
      updatedAt: this.requireTimestamp(payload.updated_at, `repository ${payload.full_name}`),
      pushedAt: payload.pushed_at ?? null,
    };
  }

  commentFromGitHub(payload: GitHubCommentPayload): CommentRecord {
    return {
      id: payload.id,
      body: payload.body ?? '',
      author: this.userFromGitHub(payload.user),
      createdAt: payload.created_at,
      updatedAt: payload.updated_at,
    };
  }

  private userFromGitHub(user: GitHubUserPayload | null): UserRef {
    if (!user) return { ...GHOST_USER };
    return { login: user.login, avatarUrl: user.avatar_url };
  }

  /**
   * Labels come back either as bare names or as objects; unnamed entries are dropped
   */
  private parseLabels(labels: GitHubIssuePayload['labels']): IssueLabel[] {
    const result: IssueLabel[] = [];
    for (const label of labels) {
      if (typeof label === 'string') {
        result.push({ name: label, color: '' });
      } else if (label.name) {
        result.push({ name: label.name, color: label.color ?? '' });
      }
    }
    return result;
  }

  private parseState(state: string, context: string): IssueState {
    if (state === 'open' || state === 'closed') {
      return state;
    }
    throw new GitHubClientError('decode', `Unexpected state "${state}" on ${context}`);
  }

  private requireTimestamp(value: string | null | undefined, context: string): string {
    if (!value) {
      throw new GitHubClientError('decode', `Missing timestamp on ${context}`);
    }
    return value;
  }
}

/**
 * Human-friendly repository name: separators become spaces, words capitalised
 */
export function displayName(repo: Pick<RepositoryRecord, 'name'>): string {
  return repo.name
    .replace(/[-_]/g, ' ')
    .split(' ')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

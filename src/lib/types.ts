/**
 * Shared types for the issue annotation system
 */

export type IssueState = 'open' | 'closed';

export type IssueStateFilter = IssueState | 'all';

/** Manual status tag; 'none' means the status is derived automatically */
export type ManualStatus = 'none' | 'red' | 'yellow' | 'lightGreen' | 'darkGreen';

export const MANUAL_STATUSES: readonly ManualStatus[] = [
  'none',
  'red',
  'yellow',
  'lightGreen',
  'darkGreen',
];

export interface UserRef {
  login: string;
  avatarUrl: string;
}

export interface IssueLabel {
  name: string;
  color: string;
}

/**
 * Issue fields whose single source of truth is GitHub.
 * Overwritten wholesale on every fetch.
 */
export interface UpstreamAttributes {
  id: number;
  number: number;
  title: string;
  body: string | null;
  state: IssueState;
  author: UserRef;
  labels: IssueLabel[];
  comments: number;
  createdAt: string;
  updatedAt: string;
  closedAt: string | null;
  htmlUrl: string;
}

/**
 * Issue fields that exist only in the local cache.
 */
export interface LocalAttributes {
  privateNotes: string | null;
  isArchived: boolean;
  manualStatus: ManualStatus;
}

export type IssueRecord = UpstreamAttributes & LocalAttributes;

export interface RepositoryRecord {
  id: number;
  name: string;
  fullName: string;
  owner: string;
  description: string | null;
  htmlUrl: string;
  cloneUrl: string;
  sshUrl: string;
  homepage: string | null;
  language: string | null;
  forksCount: number;
  stargazersCount: number;
  watchersCount: number;
  size: number;
  defaultBranch: string;
  openIssuesCount: number;
  isPrivate: boolean;
  isFork: boolean;
  isArchived: boolean;
  hasWiki: boolean;
  hasPages: boolean;
  createdAt: string;
  updatedAt: string;
  pushedAt: string | null;
}

export interface CommentRecord {
  id: number;
  body: string;
  author: UserRef;
  createdAt: string;
  updatedAt: string;
}

/** owner/name pair identifying a repository on GitHub */
export interface RepoRef {
  owner: string;
  name: string;
}

export interface AppConfig {
  github: {
    token: string;
    username: string;
  };
  paths: {
    dataDirectory: string;
  };
  settings: {
    theme: 'dark' | 'light';
    refreshInterval: number;
  };
}

export type SaveResult =
  | { ok: true; path: string }
  | { ok: false; path: string; error: Error };

export interface RefreshResult {
  issues: IssueRecord[];
  /** True when a newer refresh for the same repository superseded this one */
  stale: boolean;
  saveError?: Error;
}

/**
 * Outcome of a change to one cached issue. saveError is set when the change
 * was made but the cache could not be written.
 */
export interface IssueMutationResult {
  issue: IssueRecord;
  saveError?: Error;
}

export interface CommentResult {
  comment: CommentRecord;
  saveError?: Error;
}

export interface RepositoryListResult {
  repositories: RepositoryRecord[];
  saveError?: Error;
}

export type SortDirection = 'asc' | 'desc';

import { GitHubIssuePayload } from '../src/lib/field-mapper';
import { Logger } from '../src/lib/logger';
import { IssueRecord, RepoRef } from '../src/lib/types';

export const REPO: RepoRef = { owner: 'octo-user', name: 'notes-app' };

export function makeIssue(overrides: Partial<IssueRecord> = {}): IssueRecord {
  return {
    id: 1001,
    number: 1,
    title: 'Sample issue',
    body: 'Body text',
    state: 'open',
    author: { login: 'octo-user', avatarUrl: 'https://example.com/avatar.png' },
    labels: [],
    comments: 0,
    createdAt: '2025-01-10T00:00:00Z',
    updatedAt: '2025-01-11T00:00:00Z',
    closedAt: null,
    htmlUrl: 'https://github.com/octo-user/notes-app/issues/1',
    privateNotes: null,
    isArchived: false,
    manualStatus: 'none',
    ...overrides,
  };
}

export function makeIssuePayload(overrides: Partial<GitHubIssuePayload> = {}): GitHubIssuePayload {
  return {
    id: 1001,
    number: 1,
    title: 'Sample issue',
    body: 'Body text',
    state: 'open',
    html_url: 'https://github.com/octo-user/notes-app/issues/1',
    user: { login: 'octo-user', avatar_url: 'https://example.com/avatar.png' },
    labels: [],
    comments: 0,
    created_at: '2025-01-10T00:00:00Z',
    updated_at: '2025-01-11T00:00:00Z',
    closed_at: null,
    ...overrides,
  };
}

export function makeLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    success: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    dim: jest.fn(),
  };
}

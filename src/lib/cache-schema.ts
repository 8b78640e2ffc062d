/**
 * Schemas for the on-disk cache files
 */

import { z } from 'zod';

const timestamp = z.string().datetime({ offset: true });

export const ManualStatusSchema = z.enum(['none', 'red', 'yellow', 'lightGreen', 'darkGreen']);

export const UserRefSchema = z.object({
  login: z.string(),
  avatarUrl: z.string(),
});

export const IssueLabelSchema = z.object({
  name: z.string(),
  color: z.string(),
});

export const StoredIssueSchema = z.object({
  id: z.number().int(),
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable(),
  state: z.enum(['open', 'closed']),
  author: UserRefSchema,
  labels: z.array(IssueLabelSchema),
  comments: z.number().int().nonnegative(),
  createdAt: timestamp,
  updatedAt: timestamp,
  closedAt: timestamp.nullable(),
  htmlUrl: z.string(),

  // Local fields; older files may lack them
  privateNotes: z.string().nullable().default(null),
  isArchived: z.boolean().default(false),
  manualStatus: ManualStatusSchema.default('none'),
});

export const StoredIssueListSchema = z.array(StoredIssueSchema);

export const StoredRepositorySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  fullName: z.string(),
  owner: z.string(),
  description: z.string().nullable(),
  htmlUrl: z.string(),
  cloneUrl: z.string(),
  sshUrl: z.string(),
  homepage: z.string().nullable(),
  language: z.string().nullable(),
  forksCount: z.number().int(),
  stargazersCount: z.number().int(),
  watchersCount: z.number().int(),
  size: z.number().int(),
  defaultBranch: z.string(),
  openIssuesCount: z.number().int(),
  isPrivate: z.boolean(),
  isFork: z.boolean(),
  isArchived: z.boolean(),
  hasWiki: z.boolean(),
  hasPages: z.boolean(),
  createdAt: timestamp,
  updatedAt: timestamp,
  pushedAt: timestamp.nullable(),
});

export const StoredRepositoryListSchema = z.array(StoredRepositorySchema);

import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { AnnotationStore } from '../../src/lib/annotation-store';
import { GitHubClientError, IssueNotFoundError } from '../../src/lib/errors';
import { GitHubClient } from '../../src/lib/github-client';
import { impliedState, IssueService } from '../../src/lib/issue-service';
import { projectStatus } from '../../src/lib/status-projection';
import { IssueMutationResult, IssueRecord } from '../../src/lib/types';
import { makeIssue, makeLogger, REPO } from '../fixtures';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('IssueService', () => {
  let dataDirectory: string;
  let store: AnnotationStore;
  let mockGitHub: jest.Mocked<GitHubClient>;
  let logger: ReturnType<typeof makeLogger>;
  let service: IssueService;

  beforeEach(async () => {
    dataDirectory = await mkdtemp(path.join(os.tmpdir(), 'issue-desk-service-'));
    logger = makeLogger();
    store = new AnnotationStore({ dataDirectory }, logger);

    mockGitHub = {
      listIssues: jest.fn(),
      getIssue: jest.fn(),
      createIssue: jest.fn(),
      updateIssue: jest.fn(),
      closeIssue: jest.fn(),
      reopenIssue: jest.fn(),
      listComments: jest.fn(),
      createComment: jest.fn(),
      listRepositories: jest.fn(),
      verifyAccess: jest.fn(),
    } as unknown as jest.Mocked<GitHubClient>;

    service = new IssueService(mockGitHub, store, logger);
  });

  afterEach(async () => {
    await rm(dataDirectory, { recursive: true, force: true });
  });

  async function seedCache(issues: IssueRecord[]): Promise<void> {
    await store.save('notes-app', issues);
  }

  describe('impliedState', () => {
    it('should map manual statuses to upstream states', () => {
      expect(impliedState('red')).toBe('open');
      expect(impliedState('yellow')).toBe('open');
      expect(impliedState('lightGreen')).toBe('closed');
      expect(impliedState('darkGreen')).toBe('closed');
      expect(impliedState('none')).toBeNull();
    });
  });

  describe('seed', () => {
    it('should return an empty list without a cache', async () => {
      await expect(service.seed(REPO)).resolves.toEqual([]);
      expect(mockGitHub.listIssues).not.toHaveBeenCalled();
    });

    it('should return the cached list', async () => {
      await seedCache([makeIssue({ id: 1, privateNotes: 'cached' })]);

      const issues = await service.seed(REPO);

      expect(issues.map((issue) => issue.privateNotes)).toEqual(['cached']);
    });
  });

  describe('refresh', () => {
    it('should merge fetched issues with cached annotations and save them', async () => {
      await seedCache([makeIssue({ id: 1, title: 'Old', privateNotes: 'keep' }), makeIssue({ id: 9 })]);
      mockGitHub.listIssues.mockResolvedValue([makeIssue({ id: 1, title: 'New' }), makeIssue({ id: 2, number: 2 })]);

      const result = await service.refresh(REPO);

      expect(result.stale).toBe(false);
      expect(result.saveError).toBeUndefined();
      expect(result.issues.map((issue) => [issue.id, issue.title, issue.privateNotes])).toEqual([
        [1, 'New', 'keep'],
        [2, 'Sample issue', null],
      ]);
      await expect(store.load('notes-app')).resolves.toEqual(result.issues);
      expect(mockGitHub.listIssues).toHaveBeenCalledWith(REPO, 'all');
    });

    it('should leave the cache untouched when the fetch fails', async () => {
      const cached = [makeIssue({ id: 1, privateNotes: 'safe' })];
      await seedCache(cached);
      mockGitHub.listIssues.mockRejectedValue(GitHubClientError.http(500, 'Server Error'));

      await expect(service.refresh(REPO)).rejects.toMatchObject({ kind: 'http', status: 500 });
      await expect(store.load('notes-app')).resolves.toEqual(cached);
    });

    it('should report a failed save alongside the merged issues', async () => {
      const saveError = new Error('disk full');
      jest.spyOn(store, 'save').mockResolvedValue({ ok: false, path: 'issues-notes-app.json', error: saveError });
      mockGitHub.listIssues.mockResolvedValue([makeIssue({ id: 1 })]);

      const result = await service.refresh(REPO);

      expect(result.issues).toHaveLength(1);
      expect(result.saveError).toBe(saveError);
    });

    it('should discard a refresh superseded by a newer one', async () => {
      const slow = deferred<IssueRecord[]>();
      mockGitHub.listIssues
        .mockReturnValueOnce(slow.promise)
        .mockResolvedValueOnce([makeIssue({ id: 1, title: 'Newest' })]);

      const first = service.refresh(REPO);
      const second = await service.refresh(REPO);
      slow.resolve([makeIssue({ id: 1, title: 'Outdated' })]);
      const firstResult = await first;

      expect(second.stale).toBe(false);
      expect(firstResult.stale).toBe(true);
      const saved = await store.load('notes-app');
      expect(saved?.map((issue) => issue.title)).toEqual(['Newest']);
    });

    it('should not let an in-flight refresh overwrite a note edited meanwhile', async () => {
      await seedCache([makeIssue({ id: 1 })]);
      const slow = deferred<IssueRecord[]>();
      mockGitHub.listIssues.mockReturnValueOnce(slow.promise);

      const pending = service.refresh(REPO);
      await service.setNote(REPO, 1, 'written during refresh');
      slow.resolve([makeIssue({ id: 1, title: 'Fetched' })]);
      const result = await pending;

      expect(result.stale).toBe(true);
      const saved = await store.load('notes-app');
      expect(saved?.[0].privateNotes).toBe('written during refresh');
    });

    it('should keep a note edited while the refreshed list is being saved', async () => {
      await seedCache([makeIssue({ id: 1 })]);
      mockGitHub.listIssues.mockResolvedValue([makeIssue({ id: 1, title: 'Fetched' })]);
      const saveIssues = store.save.bind(store);
      const edits: Promise<IssueMutationResult>[] = [];
      jest.spyOn(store, 'save').mockImplementationOnce(async (key, records) => {
        edits.push(service.setNote(REPO, 1, 'mine'));
        return saveIssues(key, records);
      });

      const result = await service.refresh(REPO);
      const [edited] = await Promise.all(edits);

      expect(result.stale).toBe(false);
      expect(edited.issue.privateNotes).toBe('mine');
      const saved = await store.load('notes-app');
      expect(saved?.[0]).toMatchObject({ title: 'Fetched', privateNotes: 'mine' });
    });
  });

  describe('local annotations', () => {
    beforeEach(async () => {
      await seedCache([makeIssue({ id: 1 }), makeIssue({ id: 2, number: 2 })]);
    });

    it('should save a note', async () => {
      const { issue, saveError } = await service.setNote(REPO, 2, 'follow up');

      expect(issue.privateNotes).toBe('follow up');
      expect(saveError).toBeUndefined();
      const saved = await store.load('notes-app');
      expect(saved?.map((record) => record.privateNotes)).toEqual([null, 'follow up']);
      expect(mockGitHub.updateIssue).not.toHaveBeenCalled();
    });

    it('should clear a blank note', async () => {
      await service.setNote(REPO, 1, 'temporary');

      const { issue } = await service.setNote(REPO, 1, '   ');

      expect(issue.privateNotes).toBeNull();
    });

    it('should toggle the archive flag', async () => {
      const { issue: archived } = await service.setArchived(REPO, 1, true);
      expect(archived.isArchived).toBe(true);
      expect(projectStatus(archived).category).toBe('darkGreen');

      const { issue: restored } = await service.setArchived(REPO, 1, false);
      expect(restored.isArchived).toBe(false);
    });

    it('should report a note that could not be saved', async () => {
      const saveError = new Error('disk full');
      jest
        .spyOn(store, 'save')
        .mockResolvedValueOnce({ ok: false, path: store.issueFilePath('notes-app'), error: saveError });

      const result = await service.setNote(REPO, 1, 'unsaved');

      expect(result.issue.privateNotes).toBe('unsaved');
      expect(result.saveError).toBe(saveError);
      const saved = await store.load('notes-app');
      expect(saved?.[0].privateNotes).toBeNull();
    });

    it('should reject an issue that is not cached', async () => {
      await expect(service.setNote(REPO, 404, 'x')).rejects.toBeInstanceOf(IssueNotFoundError);
    });
  });

  describe('setManualStatus', () => {
    it('should close an open issue for a green status, then refresh', async () => {
      await seedCache([makeIssue({ id: 1, number: 5, state: 'open' })]);
      mockGitHub.closeIssue.mockResolvedValue(makeIssue({ id: 1, number: 5, state: 'closed' }));
      mockGitHub.listIssues.mockResolvedValue([makeIssue({ id: 1, number: 5, state: 'closed' })]);

      const result = await service.setManualStatus(REPO, 1, 'lightGreen');

      expect(mockGitHub.closeIssue).toHaveBeenCalledWith(REPO, 5);
      expect(mockGitHub.reopenIssue).not.toHaveBeenCalled();
      expect(result.remoteError).toBeUndefined();
      expect(result.issues[0]).toMatchObject({ state: 'closed', manualStatus: 'lightGreen' });
    });

    it('should reopen a closed issue for a red status', async () => {
      await seedCache([makeIssue({ id: 1, number: 5, state: 'closed' })]);
      mockGitHub.reopenIssue.mockResolvedValue(makeIssue({ id: 1, number: 5 }));
      mockGitHub.listIssues.mockResolvedValue([makeIssue({ id: 1, number: 5 })]);

      await service.setManualStatus(REPO, 1, 'red');

      expect(mockGitHub.reopenIssue).toHaveBeenCalledWith(REPO, 5);
    });

    it('should not call GitHub when the state already matches', async () => {
      await seedCache([makeIssue({ id: 1, state: 'open' })]);
      mockGitHub.listIssues.mockResolvedValue([makeIssue({ id: 1, state: 'open' })]);

      await service.setManualStatus(REPO, 1, 'yellow');
      await service.setManualStatus(REPO, 1, 'none');

      expect(mockGitHub.closeIssue).not.toHaveBeenCalled();
      expect(mockGitHub.reopenIssue).not.toHaveBeenCalled();
    });

    it('should apply the status locally when the remote change fails', async () => {
      await seedCache([makeIssue({ id: 1, number: 5, state: 'open' })]);
      mockGitHub.closeIssue.mockRejectedValue(new Error('boom'));
      mockGitHub.listIssues.mockResolvedValue([makeIssue({ id: 1, number: 5, state: 'open' })]);

      const result = await service.setManualStatus(REPO, 1, 'darkGreen');

      expect(result.remoteError?.message).toBe('boom');
      expect(result.issues[0]).toMatchObject({ state: 'open', manualStatus: 'darkGreen' });
      expect(projectStatus(result.issues[0]).category).toBe('darkGreen');
      expect(logger.warn).toHaveBeenCalledWith('Could not close #5: boom');
    });
  });

  describe('setManualStatus when the refresh fails', () => {
    it('should return the locally applied status with the refresh error', async () => {
      await seedCache([makeIssue({ id: 1, number: 5, state: 'open' })]);
      mockGitHub.listIssues.mockRejectedValue(GitHubClientError.http(502, 'Bad Gateway'));

      const result = await service.setManualStatus(REPO, 1, 'yellow');

      expect(result.refreshError).toMatchObject({ kind: 'http', status: 502 });
      expect(result.stale).toBe(false);
      expect(result.issues[0]).toMatchObject({ id: 1, manualStatus: 'yellow' });
      expect(logger.warn).toHaveBeenCalledWith('Status saved but refresh failed: GitHub API error: HTTP 502 (Bad Gateway)');
    });
  });

  describe('setOpenState', () => {
    it('should replace upstream attributes and keep annotations', async () => {
      await seedCache([makeIssue({ id: 1, number: 3, privateNotes: 'mine', manualStatus: 'yellow' })]);
      mockGitHub.closeIssue.mockResolvedValue(makeIssue({ id: 1, number: 3, state: 'closed' }));
      mockGitHub.getIssue.mockResolvedValue(
        makeIssue({ id: 1, number: 3, state: 'closed', closedAt: '2025-02-01T00:00:00Z' })
      );

      const { issue } = await service.setOpenState(REPO, 1, false);

      expect(mockGitHub.closeIssue).toHaveBeenCalledWith(REPO, 3);
      expect(mockGitHub.getIssue).toHaveBeenCalledWith(REPO, 3);
      expect(issue).toMatchObject({ state: 'closed', privateNotes: 'mine', manualStatus: 'yellow' });
    });

    it('should propagate a failed remote call and leave the cache alone', async () => {
      const cached = [makeIssue({ id: 1, state: 'closed' })];
      await seedCache(cached);
      mockGitHub.reopenIssue.mockRejectedValue(GitHubClientError.http(403, 'Forbidden'));

      await expect(service.setOpenState(REPO, 1, true)).rejects.toMatchObject({ status: 403 });
      await expect(store.load('notes-app')).resolves.toEqual(cached);
    });
  });

  describe('createIssue / editIssue', () => {
    it('should append a created issue with default annotations', async () => {
      await seedCache([makeIssue({ id: 1 })]);
      mockGitHub.createIssue.mockResolvedValue(makeIssue({ id: 2, number: 2, title: 'Created' }));

      const { issue: created } = await service.createIssue(REPO, 'Created', 'Details');

      expect(mockGitHub.createIssue).toHaveBeenCalledWith(REPO, 'Created', 'Details');
      expect(created.manualStatus).toBe('none');
      const saved = await store.load('notes-app');
      expect(saved?.map((issue) => issue.id)).toEqual([1, 2]);
    });

    it('should report a created issue that could not be cached', async () => {
      const saveError = new Error('read-only file system');
      mockGitHub.createIssue.mockResolvedValue(makeIssue({ id: 2, number: 2, title: 'Created' }));
      jest
        .spyOn(store, 'save')
        .mockResolvedValueOnce({ ok: false, path: store.issueFilePath('notes-app'), error: saveError });

      const result = await service.createIssue(REPO, 'Created');

      expect(result.issue.id).toBe(2);
      expect(result.saveError).toBe(saveError);
    });

    it('should update title and body but keep the note', async () => {
      await seedCache([makeIssue({ id: 1, number: 4, privateNotes: 'context' })]);
      mockGitHub.updateIssue.mockResolvedValue(makeIssue({ id: 1, number: 4, title: 'Renamed' }));

      const { issue } = await service.editIssue(REPO, 1, { title: 'Renamed' });

      expect(mockGitHub.updateIssue).toHaveBeenCalledWith(REPO, 4, { title: 'Renamed' });
      expect(issue).toMatchObject({ title: 'Renamed', privateNotes: 'context' });
    });
  });

  describe('comments', () => {
    it('should post a comment and refresh the cached comment count', async () => {
      await seedCache([makeIssue({ id: 1, number: 6, comments: 0 })]);
      mockGitHub.createComment.mockResolvedValue({
        id: 50,
        body: 'Looking into it',
        author: { login: 'octo-user', avatarUrl: '' },
        createdAt: '2025-01-12T00:00:00Z',
        updatedAt: '2025-01-12T00:00:00Z',
      });
      mockGitHub.getIssue.mockResolvedValue(makeIssue({ id: 1, number: 6, comments: 1 }));

      const { comment } = await service.addComment(REPO, 6, 'Looking into it');

      expect(comment.id).toBe(50);
      const [cached] = await service.seed(REPO);
      expect(cached.comments).toBe(1);
      expect(projectStatus(cached).category).toBe('yellow');
    });

    it('should skip the re-fetch for an issue that is not cached', async () => {
      mockGitHub.createComment.mockResolvedValue({
        id: 51,
        body: 'Hi',
        author: { login: 'octo-user', avatarUrl: '' },
        createdAt: '2025-01-12T00:00:00Z',
        updatedAt: '2025-01-12T00:00:00Z',
      });

      await service.addComment(REPO, 6, 'Hi');

      expect(mockGitHub.getIssue).not.toHaveBeenCalled();
    });
  });

  describe('repositories', () => {
    it('should cache the fetched repository list', async () => {
      mockGitHub.listRepositories.mockResolvedValue([]);

      const result = await service.listRepositories('octo-user');

      expect(result).toEqual({ repositories: [] });

      expect(mockGitHub.listRepositories).toHaveBeenCalledWith('octo-user');
      await expect(store.loadRepositories()).resolves.toEqual([]);
      await expect(service.seedRepositories()).resolves.toEqual([]);
    });

    it('should report a repository list that could not be cached', async () => {
      const saveError = new Error('disk full');
      mockGitHub.listRepositories.mockResolvedValue([]);
      jest
        .spyOn(store, 'saveRepositories')
        .mockResolvedValueOnce({ ok: false, path: store.repositoriesFilePath, error: saveError });

      const result = await service.listRepositories('octo-user');

      expect(result.saveError).toBe(saveError);
    });
  });

  describe('status lifecycle', () => {
    it('should keep a note through an upstream close', async () => {
      mockGitHub.listIssues.mockResolvedValueOnce([makeIssue({ id: 420, number: 42, state: 'open', comments: 0 })]);
      const first = await service.refresh(REPO);
      expect(projectStatus(first.issues[0]).priority).toBe(0);

      await service.setNote(REPO, 420, 'investigate');

      mockGitHub.listIssues.mockResolvedValueOnce([
        makeIssue({ id: 420, number: 42, state: 'closed', comments: 1, closedAt: '2025-01-12T00:00:00Z' }),
      ]);
      const second = await service.refresh(REPO);

      expect(second.issues[0]).toMatchObject({ state: 'closed', privateNotes: 'investigate', manualStatus: 'none' });
      expect(projectStatus(second.issues[0])).toMatchObject({ category: 'lightGreen', priority: 2 });
    });

    it('should keep a manual dark green status when the issue is reopened elsewhere', async () => {
      await seedCache([makeIssue({ id: 70, number: 7, state: 'closed', manualStatus: 'darkGreen' })]);
      mockGitHub.listIssues.mockResolvedValue([makeIssue({ id: 70, number: 7, state: 'open', comments: 2 })]);

      const { issues } = await service.refresh(REPO);

      expect(issues[0]).toMatchObject({ state: 'open', manualStatus: 'darkGreen' });
      expect(projectStatus(issues[0]).category).toBe('darkGreen');
    });
  });
});

/**
 * Error types surfaced to callers
 */

export type GitHubErrorKind = 'missing-credential' | 'invalid-request' | 'http' | 'decode';

export class GitHubClientError extends Error {
  readonly kind: GitHubErrorKind;
  readonly status?: number;

  constructor(kind: GitHubErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'GitHubClientError';
    this.kind = kind;
    this.status = options.status;
  }

  static missingCredential(): GitHubClientError {
    return new GitHubClientError(
      'missing-credential',
      'No GitHub token configured. Run "issue-desk config --token <token>" or set GITHUB_TOKEN.'
    );
  }

  static http(status: number, detail: string, cause?: unknown): GitHubClientError {
    return new GitHubClientError('http', `GitHub API error: HTTP ${status} (${detail})`, { status, cause });
  }
}

export class IssueNotFoundError extends Error {
  readonly repositoryKey: string;
  readonly issueId: number;

  constructor(repositoryKey: string, issueId: number) {
    super(`Issue ${issueId} is not in the cache for ${repositoryKey}. Refresh the repository first.`);
    this.name = 'IssueNotFoundError';
    this.repositoryKey = repositoryKey;
    this.issueId = issueId;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

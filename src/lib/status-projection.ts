/**
 * Derived status projection: colour category and sort priority for an issue.
 * Never persisted; recomputed on every render.
 */

import { IssueRecord, ManualStatus, SortDirection } from './types';

export type StatusCategory = Exclude<ManualStatus, 'none'>;

export interface StatusProjection {
  category: StatusCategory;
  /** 0 is the highest priority */
  priority: number;
  /** Contrasting text colour for a badge drawn in the category colour */
  textColor: 'white' | 'black';
}

export const CATEGORY_PRIORITY: Record<StatusCategory, number> = {
  red: 0,
  yellow: 1,
  lightGreen: 2,
  darkGreen: 3,
};

const TEXT_COLOR: Record<StatusCategory, StatusProjection['textColor']> = {
  red: 'white',
  yellow: 'black',
  lightGreen: 'black',
  darkGreen: 'white',
};

type ProjectableIssue = Pick<IssueRecord, 'manualStatus' | 'isArchived' | 'state' | 'comments'>;

export function statusCategory(issue: ProjectableIssue): StatusCategory {
  // Manual status overrides everything GitHub says
  if (issue.manualStatus !== 'none') {
    return issue.manualStatus;
  }
  if (issue.isArchived) {
    return 'darkGreen';
  }
  if (issue.state === 'closed') {
    return 'lightGreen';
  }
  return issue.comments === 0 ? 'red' : 'yellow';
}

export function projectStatus(issue: ProjectableIssue): StatusProjection {
  const category = statusCategory(issue);
  return {
    category,
    priority: CATEGORY_PRIORITY[category],
    textColor: TEXT_COLOR[category],
  };
}

/**
 * Order by priority, then by creation time in the given direction
 */
export function compareIssues(a: IssueRecord, b: IssueRecord, direction: SortDirection = 'asc'): number {
  const byPriority = projectStatus(a).priority - projectStatus(b).priority;
  if (byPriority !== 0) {
    return byPriority;
  }

  // Unparseable timestamps compare equal
  const byCreated = Date.parse(a.createdAt) - Date.parse(b.createdAt) || 0;
  return direction === 'asc' ? byCreated : -byCreated;
}

export function sortIssues(issues: readonly IssueRecord[], direction: SortDirection = 'asc'): IssueRecord[] {
  return [...issues].sort((a, b) => compareIssues(a, b, direction));
}

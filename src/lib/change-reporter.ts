/**
 * Summarises upstream changes between a cached issue list and a refreshed one
 */

import chalk from 'chalk';
import { diffLines } from 'diff';
import { IssueRecord, IssueState } from './types';

export interface BodyLineChange {
  kind: 'added' | 'removed';
  line: string;
}

export interface IssueChange {
  number: number;
  title?: { before: string; after: string };
  state?: { before: IssueState; after: IssueState };
  comments?: { before: number; after: number };
  body?: BodyLineChange[];
}

export interface ChangeSummary {
  added: IssueRecord[];
  removed: IssueRecord[];
  changed: IssueChange[];
}

/**
 * Line-level body diff; blank lines are ignored
 */
export function diffBody(before: string | null, after: string | null): BodyLineChange[] {
  const changes: BodyLineChange[] = [];

  for (const part of diffLines(before ?? '', after ?? '')) {
    if (!part.added && !part.removed) continue;

    const kind = part.added ? 'added' : 'removed';
    for (const line of part.value.split('\n')) {
      if (line) changes.push({ kind, line });
    }
  }

  return changes;
}

export function describeChanges(before: readonly IssueRecord[], after: readonly IssueRecord[]): ChangeSummary {
  const beforeById = new Map(before.map((issue) => [issue.id, issue]));
  const afterIds = new Set(after.map((issue) => issue.id));

  const summary: ChangeSummary = {
    added: [],
    removed: before.filter((issue) => !afterIds.has(issue.id)),
    changed: [],
  };

  for (const issue of after) {
    const previous = beforeById.get(issue.id);
    if (!previous) {
      summary.added.push(issue);
      continue;
    }

    const change: IssueChange = { number: issue.number };

    if (previous.title !== issue.title) {
      change.title = { before: previous.title, after: issue.title };
    }
    if (previous.state !== issue.state) {
      change.state = { before: previous.state, after: issue.state };
    }
    if (previous.comments !== issue.comments) {
      change.comments = { before: previous.comments, after: issue.comments };
    }
    if ((previous.body ?? '') !== (issue.body ?? '')) {
      change.body = diffBody(previous.body, issue.body);
    }

    if (change.title || change.state || change.comments || change.body) {
      summary.changed.push(change);
    }
  }

  return summary;
}

export function hasChanges(summary: ChangeSummary): boolean {
  return summary.added.length > 0 || summary.removed.length > 0 || summary.changed.length > 0;
}

/**
 * Render a change summary as coloured lines
 */
export function formatChanges(summary: ChangeSummary): string[] {
  const lines: string[] = [];

  for (const issue of summary.added) {
    lines.push(chalk.green(`+ #${issue.number} ${issue.title}`));
  }

  for (const issue of summary.removed) {
    const note = issue.privateNotes ? ' (private notes dropped)' : '';
    lines.push(chalk.red(`- #${issue.number} ${issue.title}${note}`));
  }

  for (const change of summary.changed) {
    lines.push(chalk.bold(`~ #${change.number}`));

    if (change.title) {
      lines.push(chalk.red(`    title: ${change.title.before}`));
      lines.push(chalk.green(`    title: ${change.title.after}`));
    }
    if (change.state) {
      lines.push(chalk.gray(`    state: ${change.state.before} → ${change.state.after}`));
    }
    if (change.comments) {
      lines.push(chalk.gray(`    comments: ${change.comments.before} → ${change.comments.after}`));
    }
    for (const bodyLine of change.body ?? []) {
      lines.push(
        bodyLine.kind === 'added' ? chalk.green(`  + ${bodyLine.line}`) : chalk.red(`  - ${bodyLine.line}`)
      );
    }
  }

  return lines;
}

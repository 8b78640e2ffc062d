/**
 * Merges freshly fetched issues with locally cached annotations.
 *
 * Upstream attributes always come from the fetched record; local attributes
 * come from the cached record with the same id, or defaults when there is
 * none. Cached records whose id is absent from the fetch are dropped.
 */

import { DEFAULT_LOCAL_ATTRIBUTES } from './field-mapper';
import { IssueRecord, LocalAttributes, UpstreamAttributes } from './types';

export function upstreamOf(record: UpstreamAttributes): UpstreamAttributes {
  return {
    id: record.id,
    number: record.number,
    title: record.title,
    body: record.body,
    state: record.state,
    author: { ...record.author },
    labels: record.labels.map((label) => ({ ...label })),
    comments: record.comments,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    closedAt: record.closedAt,
    htmlUrl: record.htmlUrl,
  };
}

export function localOf(record: LocalAttributes): LocalAttributes {
  return {
    privateNotes: record.privateNotes,
    isArchived: record.isArchived,
    manualStatus: record.manualStatus,
  };
}

/**
 * Combine an upstream half and a local half into one record
 */
export function combine(upstream: UpstreamAttributes, local: LocalAttributes): IssueRecord {
  return {
    ...upstreamOf(upstream),
    ...localOf(local),
  };
}

/**
 * Reconcile a fetched list against the cached list for the same repository.
 *
 * Output has one record per fetched id, in fetched order. A fetched id that
 * repeats keeps only its last occurrence; a cached id that repeats lends the
 * local attributes of its last occurrence.
 */
export function reconcile(fetched: readonly IssueRecord[], cached: readonly IssueRecord[]): IssueRecord[] {
  const localById = new Map<number, LocalAttributes>();
  for (const record of cached) {
    localById.set(record.id, localOf(record));
  }

  const lastIndex = new Map<number, number>();
  fetched.forEach((record, index) => lastIndex.set(record.id, index));

  return fetched
    .filter((record, index) => lastIndex.get(record.id) === index)
    .map((record) => combine(record, localById.get(record.id) ?? DEFAULT_LOCAL_ATTRIBUTES));
}

/**
 * Replace the upstream half of a record, keeping its local attributes
 */
export function withUpstream(record: IssueRecord, fresh: UpstreamAttributes): IssueRecord {
  return combine(fresh, record);
}

/**
 * Replace the upstream attributes of the element matching fresh.id.
 * Returns the list unchanged (as a copy) when no element matches.
 */
export function replaceUpstream(list: readonly IssueRecord[], fresh: UpstreamAttributes): IssueRecord[] {
  return list.map((record) => (record.id === fresh.id ? withUpstream(record, fresh) : record));
}

/**
 * Apply a local attribute change to the element with the given id
 */
export function updateLocal(
  list: readonly IssueRecord[],
  issueId: number,
  changes: Partial<LocalAttributes>
): IssueRecord[] {
  return list.map((record) => (record.id === issueId ? { ...record, ...changes } : record));
}

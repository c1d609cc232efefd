/**
 * Image history: parsing `docker images` output, choosing what to prune and
 * which image a rollback goes back to.
 */

import {
  NoPreviousVersionError,
  PreviousVersionNotFoundError,
  RELEASES_TO_KEEP,
} from '@hoist/shared';
import type { RemoteImageRecord, RollbackPlan } from '@hoist/shared';
import { HISTORY_SEPARATOR } from './commands.js';

// `docker images` prints CreatedAt as "2024-03-01 10:15:42 +0100 CET"
const DOCKER_TIMESTAMP = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}) ([+-]\d{2})(\d{2})/;

export function parseCreatedAt(raw: string): Date {
  const match = DOCKER_TIMESTAMP.exec(raw.trim());
  if (match) {
    const [, date, time, offsetHours, offsetMinutes] = match;
    return new Date(`${date}T${time}${offsetHours}:${offsetMinutes}`);
  }
  return new Date(raw.trim());
}

/** Adds the implicit `:latest` docker assumes for an untagged reference. */
export function normalizeReference(reference: string): string {
  const lastSlash = reference.lastIndexOf('/');
  return reference.indexOf(':', lastSlash + 1) === -1 ? `${reference}:latest` : reference;
}

function sortKey(record: RemoteImageRecord): number {
  const time = record.createdAt.getTime();
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/**
 * Parse `repository:tag___createdAt` lines, newest first. Lines without the
 * separator (ssh warnings merged into the output) and dangling `<none>` images
 * are skipped; equal timestamps keep the daemon's order.
 */
export function parseReleases(output: string): RemoteImageRecord[] {
  const records: RemoteImageRecord[] = [];

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf(HISTORY_SEPARATOR);
    if (separator === -1) continue;
    const reference = trimmed.slice(0, separator);
    const createdAt = trimmed.slice(separator + HISTORY_SEPARATOR.length);

    const colon = reference.lastIndexOf(':');
    if (colon <= 0 || /\s/.test(reference)) continue;
    const repository = reference.slice(0, colon);
    const tag = reference.slice(colon + 1);
    if (tag === '<none>' || repository === '<none>') continue;

    records.push({ reference, repository, tag, createdAt: parseCreatedAt(createdAt) });
  }

  return records.sort((a, b) => sortKey(b) - sortKey(a));
}

/** Everything past the newest `keep` releases. */
export function selectStaleReleases(
  records: readonly RemoteImageRecord[],
  keep: number = RELEASES_TO_KEEP,
): RemoteImageRecord[] {
  return records.length > keep ? records.slice(keep) : [];
}

/**
 * Pick the release created just before the one currently running.
 * `records` must be ordered newest first.
 */
export function resolvePreviousImage(
  records: readonly RemoteImageRecord[],
  currentImage: string,
): RollbackPlan {
  if (records.length < 2) {
    throw new NoPreviousVersionError(records.length);
  }

  const current = normalizeReference(currentImage.trim());
  const index = records.findIndex(record => record.reference === current);
  const previous = index === -1 ? undefined : records[index + 1];

  if (!previous) {
    throw new PreviousVersionNotFoundError(current);
  }

  return { currentImage: current, previousImage: previous.reference };
}

import { MERGE_TOLERANCE_SECONDS } from '@shared/constants';
import { formatCalendarTime, secondsBetween } from './dates';
import { LookupError } from './errors';
import type { TimelineEntry } from './timeline';

function cloneEntry(entry: TimelineEntry): TimelineEntry {
  return { ...entry, roles: [...entry.roles] };
}

/**
 * Merges neighbouring timeline entries that are less than a minute apart.
 * Promotion from attendee to panelist without a disconnect leaves a gap of
 * 0-1 seconds; a quick reconnect leaves a few more.
 *
 * Entries stay in discovery order. After a merge the same index is checked
 * again, so a chain of three or more close entries collapses into one.
 * Overlapping entries (negative gap) are left apart.
 */
export function reconcileTimeline(timeline: readonly TimelineEntry[]): TimelineEntry[] {
  const merged = timeline.map(cloneEntry);
  let i = 0;
  while (i < merged.length - 1) {
    const current = merged[i];
    const next = merged[i + 1];
    const gap = secondsBetween(current.leaveTime, next.joinTime);
    if (gap >= 0 && gap < MERGE_TOLERANCE_SECONDS) {
      current.roles.push(...next.roles);
      current.leaveTime = next.leaveTime;
      current.sessionMinutes += next.sessionMinutes;
      merged.splice(i + 1, 1);
    } else {
      i++;
    }
  }
  return merged;
}

/** Throws when an entry leaves before it joins. */
export function assertChronological(timeline: readonly TimelineEntry[], key?: string): void {
  timeline.forEach((entry, i) => {
    if (secondsBetween(entry.joinTime, entry.leaveTime) < 0) {
      const owner = key === undefined ? '' : ` for ${key}`;
      throw new LookupError(
        `timeline entry ${i + 1}${owner} leaves at ${formatCalendarTime(entry.leaveTime)} ` +
          `before joining at ${formatCalendarTime(entry.joinTime)}`,
      );
    }
  });
}

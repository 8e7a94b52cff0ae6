import { minutesBetween, toEpochSeconds } from './dates';
import type { CpeConfig } from './config';
import { assertChronological, reconcileTimeline } from './reconcile';
import type { Attendee, TimelineEntry } from './timeline';
import type { Timestamps } from './timestamps';

export interface CreditResult {
  credits: number;
  /** Minutes the credit value was computed from, three decimals. */
  qualifyingMinutes: string;
  timeline: TimelineEntry[];
}

export type CreditSettings = Pick<CpeConfig, 'maxCredits' | 'lateJoinPolicy'>;

/** Nearest quarter credit, with the 0.45 bias the CPE lists have always used. */
export function minutesToCredits(minutes: number, maxCredits: number): number {
  const credits = Math.floor((Math.max(minutes, 0) / 60) * 4 + 0.45) / 4;
  return Math.min(credits, maxCredits);
}

/**
 * Credit for one attendee's timeline against the business window.
 * Returns `undefined` for an empty timeline. `key` names the attendee in the
 * error raised for an entry that leaves before it joins.
 */
export function computeCredits(
  timeline: readonly TimelineEntry[],
  timestamps: Timestamps,
  settings: CreditSettings,
  key?: string,
): CreditResult | undefined {
  if (timeline.length === 0) return undefined;

  const reconciled = reconcileTimeline(timeline);
  assertChronological(reconciled, key);
  const businessStart = toEpochSeconds(timestamps.businessStart);
  const businessEnd = toEpochSeconds(timestamps.businessEnd);
  let minutes = 0;

  for (const entry of reconciled) {
    const atStart = toEpochSeconds(entry.joinTime) <= businessStart;
    const atEnd = toEpochSeconds(entry.leaveTime) >= businessEnd;

    if (atStart && atEnd) {
      // one entry covers the whole business window
      return {
        credits: settings.maxCredits,
        qualifyingMinutes: minutesBetween(timestamps.start, timestamps.end).toFixed(3),
        timeline: reconciled,
      };
    }

    if (atStart) {
      minutes += minutesBetween(timestamps.start, entry.leaveTime);
    } else if (atEnd) {
      const tail = minutesBetween(entry.joinTime, timestamps.end);
      // 'reset' keeps the historical behavior: earlier entries are dropped
      minutes = settings.lateJoinPolicy === 'reset' ? tail : minutes + tail;
    } else {
      minutes += minutesBetween(entry.joinTime, entry.leaveTime);
    }
  }

  return {
    credits: minutesToCredits(minutes, settings.maxCredits),
    qualifyingMinutes: minutes.toFixed(3),
    timeline: reconciled,
  };
}

/**
 * Returns a copy of the attendee map with credits filled in. Seed records
 * that preset a credit value are left as they are.
 */
export function applyCredits(
  attendees: ReadonlyMap<string, Attendee>,
  timestamps: Timestamps,
  settings: CreditSettings,
): Map<string, Attendee> {
  const result = new Map<string, Attendee>();
  for (const [key, attendee] of attendees) {
    if (attendee.creditSource === 'seed') {
      result.set(key, { ...attendee, qualifyingMinutes: attendee.qualifyingMinutes ?? '' });
      continue;
    }
    const computed = computeCredits(attendee.timeline, timestamps, settings, key);
    if (!computed) {
      result.set(key, { ...attendee });
      continue;
    }
    result.set(key, {
      ...attendee,
      timeline: computed.timeline,
      credits: computed.credits,
      qualifyingMinutes: computed.qualifyingMinutes,
      creditSource: 'computed',
    });
  }
  return result;
}

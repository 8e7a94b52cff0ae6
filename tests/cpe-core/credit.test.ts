import { describe, it, expect } from 'vitest';
import {
  computeCredits,
  applyCredits,
  minutesToCredits,
  parseDate,
  resolveConfig,
  LookupError,
  resolveTimestamps,
  type Attendee,
  type Role,
  type TimelineEntry,
} from '@core/index';

// scheduled 18:00-20:00, business window 18:10-20:00
const config = resolveConfig({ start: '2026-03-10 18:00:00' });
const timestamps = resolveTimestamps(new Map(), config);
const settings = { maxCredits: 2, lateJoinPolicy: 'reset' as const };

function entry(join: string, leave: string, role: Role = 'attendee'): TimelineEntry {
  return {
    roles: [role],
    joinTime: parseDate(`2026-03-10 ${join}`),
    leaveTime: parseDate(`2026-03-10 ${leave}`),
    sessionMinutes: 0,
  };
}

describe('minutesToCredits', () => {
  it('rounds 97 minutes to 1.5 credits', () => {
    expect(minutesToCredits(97, 2)).toBe(1.5);
  });

  it('caps 239 minutes at the maximum', () => {
    expect(minutesToCredits(239, 2)).toBe(2);
  });

  it('never goes below zero', () => {
    expect(minutesToCredits(0, 2)).toBe(0);
    expect(minutesToCredits(-30, 2)).toBe(0);
  });

  it('rounds up from just under a quarter boundary', () => {
    // 14 minutes -> 0.933 + 0.45 -> 1 quarter
    expect(minutesToCredits(14, 2)).toBe(0.25);
    // 6 minutes -> 0.4 + 0.45 -> 0 quarters
    expect(minutesToCredits(6, 2)).toBe(0);
  });
});

describe('computeCredits', () => {
  it('returns undefined for an empty timeline', () => {
    expect(computeCredits([], timestamps, settings)).toBeUndefined();
  });

  it('gives maximum credit when one entry spans the business window', () => {
    const result = computeCredits(
      [entry('17:00:00', '17:30:00'), entry('18:10:00', '20:00:00')],
      timestamps,
      settings,
    );
    expect(result?.credits).toBe(2);
    expect(result?.qualifyingMinutes).toBe('120.000');
  });

  it('counts from the scheduled start when present at business start', () => {
    const result = computeCredits([entry('18:05:00', '19:37:00')], timestamps, settings);
    expect(result?.qualifyingMinutes).toBe('97.000');
    expect(result?.credits).toBe(1.5);
  });

  it('counts join to leave when present at neither boundary', () => {
    const result = computeCredits([entry('18:30:00', '19:37:00')], timestamps, settings);
    expect(result?.qualifyingMinutes).toBe('67.000');
    expect(result?.credits).toBe(1);
  });

  it('resets the tally for a late join that stays to the end', () => {
    const timeline = [entry('18:30:00', '19:00:00'), entry('19:30:00', '20:00:00')];
    const result = computeCredits(timeline, timestamps, settings);
    expect(result?.qualifyingMinutes).toBe('30.000');
    expect(result?.credits).toBe(0.5);
  });

  it('accumulates a late join under the accumulate policy', () => {
    const timeline = [entry('18:30:00', '19:00:00'), entry('19:30:00', '20:00:00')];
    const result = computeCredits(timeline, timestamps, {
      maxCredits: 2,
      lateJoinPolicy: 'accumulate',
    });
    expect(result?.qualifyingMinutes).toBe('60.000');
    expect(result?.credits).toBe(1);
  });

  it('reconciles reconnects before classifying', () => {
    const timeline = [entry('18:05:00', '18:45:00'), entry('18:45:30', '20:00:00')];
    const result = computeCredits(timeline, timestamps, settings);
    expect(result?.timeline).toHaveLength(1);
    expect(result?.credits).toBe(2);
  });

  it('rejects an entry that leaves before it joins', () => {
    const timeline = [entry('19:00:00', '18:30:00')];
    expect(() => computeCredits(timeline, timestamps, settings, 'x@example.org')).toThrow(
      'timeline entry 1 for x@example.org leaves at 2026-03-10 18:30:00 before joining at 2026-03-10 19:00:00',
    );
    expect(() => computeCredits(timeline, timestamps, settings)).toThrow(LookupError);
  });

  it('treats a join exactly at business start as present at start', () => {
    const result = computeCredits([entry('18:10:00', '19:00:00')], timestamps, settings);
    expect(result?.qualifyingMinutes).toBe('60.000');
  });
});

describe('applyCredits', () => {
  const attendees = new Map<string, Attendee>([
    [
      'host@example.org',
      { key: 'host@example.org', timeline: [], credits: 2, creditSource: 'seed' },
    ],
    ['ghost@example.org', { key: 'ghost@example.org', timeline: [] }],
    [
      'ann@example.org',
      { key: 'ann@example.org', timeline: [entry('18:05:00', '19:37:00')] },
    ],
  ]);

  it('keeps preset seed credits', () => {
    const result = applyCredits(attendees, timestamps, settings);
    expect(result.get('host@example.org')).toMatchObject({
      credits: 2,
      creditSource: 'seed',
      qualifyingMinutes: '',
    });
  });

  it('leaves attendees without a timeline uncredited', () => {
    const result = applyCredits(attendees, timestamps, settings);
    expect(result.get('ghost@example.org')?.credits).toBeUndefined();
  });

  it('computes credits for discovered attendance', () => {
    const result = applyCredits(attendees, timestamps, settings);
    expect(result.get('ann@example.org')).toMatchObject({
      credits: 1.5,
      qualifyingMinutes: '97.000',
      creditSource: 'computed',
    });
    expect(attendees.get('ann@example.org')?.credits).toBeUndefined();
  });
});

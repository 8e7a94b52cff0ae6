import Papa from 'papaparse';
import { CERTIFICATION_DESIGNATIONS, REPORT_HEADERS } from '@shared/constants';
import type { CpeReportRow, SkippedAttendee } from '@shared/types';
import { formatActivityDate } from './dates';
import type { Attendee } from './timeline';
import type { Timestamps } from './timestamps';

export interface AssembledReport {
  rows: CpeReportRow[];
  skipped: SkippedAttendee[];
}

/** A usable certification id has at least one digit. */
export function hasCertification(value: string | undefined): value is string {
  return value !== undefined && /\d/.test(value);
}

/**
 * `"CISSP #12345"` becomes `"12345"`. Text without a recognised designation
 * is kept as entered.
 */
export function normalizeCertification(value: string): string {
  if (CERTIFICATION_DESIGNATIONS.test(value)) {
    return value.replace(/\D+/g, '');
  }
  return value;
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortAttendees(attendees: Iterable<Attendee>): Attendee[] {
  return Array.from(attendees).sort(
    (a, b) => compareOrdinal(a.lastName ?? '', b.lastName ?? '') || compareOrdinal(a.key, b.key),
  );
}

export function assembleReport(
  attendees: ReadonlyMap<string, Attendee>,
  timestamps: Timestamps,
  meetingTitle: string,
): AssembledReport {
  const activityDate = formatActivityDate(timestamps.start);
  const rows: CpeReportRow[] = [];
  const skipped: SkippedAttendee[] = [];

  for (const attendee of sortAttendees(attendees.values())) {
    const firstName = attendee.firstName ?? '';
    const lastName = attendee.lastName ?? '';

    if (!hasCertification(attendee.certification)) {
      skipped.push({ key: attendee.key, firstName, lastName, reason: 'no-certification' });
      continue;
    }
    if (attendee.credits === undefined) {
      skipped.push({ key: attendee.key, firstName, lastName, reason: 'no-attendance' });
      continue;
    }

    rows.push({
      certificationId: normalizeCertification(attendee.certification),
      firstName,
      lastName,
      meetingTitle,
      credits: attendee.credits,
      activityDate,
      qualifyingMinutes: attendee.qualifyingMinutes ?? '',
    });
  }

  return { rows, skipped };
}

export function formatReportCsv(rows: readonly CpeReportRow[]): string {
  return Papa.unparse({
    fields: [...REPORT_HEADERS],
    data: rows.map((r) => [
      r.certificationId,
      r.firstName,
      r.lastName,
      r.meetingTitle,
      String(r.credits),
      r.activityDate,
      r.qualifyingMinutes,
    ]),
  });
}

export function describeSkip(skip: SkippedAttendee): string {
  const reason =
    skip.reason === 'no-certification' ? 'no certification number' : 'no attendance recorded';
  return `skipping ${skip.lastName}, ${skip.firstName}: ${reason}`;
}

import { COLUMNS, ROLE_TABLES, ROLES } from '@shared/constants';
import { parseDate, type CalendarTime } from './dates';
import type { SeedAttendee } from './config';
import { LookupError } from './errors';
import { columnIndex, type Table, type TableCell } from './tables';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Role = (typeof ROLES)[number];

export interface TimelineEntry {
  /** More than one role once reconnects or promotions are merged. */
  roles: Role[];
  joinTime: CalendarTime;
  leaveTime: CalendarTime;
  sessionMinutes: number;
}

export interface Attendee {
  key: string;
  firstName?: string;
  lastName?: string;
  certification?: string;
  /** Discovery order across role tables, not sorted by time. */
  timeline: TimelineEntry[];
  credits?: number;
  qualifyingMinutes?: string;
  creditSource?: 'seed' | 'computed';
}

export function formatRoles(roles: readonly Role[]): string {
  return roles.join('/');
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export function seedAttendees(seeds: Record<string, SeedAttendee> = {}): Map<string, Attendee> {
  const attendees = new Map<string, Attendee>();
  for (const [key, seed] of Object.entries(seeds)) {
    const attendee: Attendee = {
      key,
      firstName: seed.firstName,
      lastName: seed.lastName,
      certification: seed.certification,
      timeline: [],
    };
    if (seed.credits !== undefined) {
      attendee.credits = seed.credits;
      attendee.creditSource = 'seed';
    }
    attendees.set(key, attendee);
  }
  return attendees;
}

function isAffirmative(value: TableCell): boolean {
  return value !== null && value.trim().toLowerCase() === 'yes';
}

function parseMinutes(table: Table, row: number, value: TableCell): number {
  if (value === null) return 0;
  const minutes = Number(value);
  if (!Number.isFinite(minutes)) {
    throw new LookupError(
      `table "${table.name}" row ${row + 1}: "${COLUMNS.sessionMinutes}" is not a number: ${value}`,
    );
  }
  return minutes;
}

function requireTime(table: Table, row: number, column: string, value: TableCell): CalendarTime {
  if (value === null) {
    throw new LookupError(`table "${table.name}" row ${row + 1}: "${column}" is empty`);
  }
  return parseDate(value);
}

function optionalColumn(table: Table, names: readonly string[]): number | undefined {
  for (const name of names) {
    const i = table.index.get(name.trim().toLowerCase());
    if (i !== undefined) return i;
  }
  return undefined;
}

function fillMissing(
  attendee: Attendee,
  field: 'firstName' | 'lastName' | 'certification',
  value: TableCell | undefined,
) {
  if (attendee[field] === undefined && value !== null && value !== undefined) {
    attendee[field] = value;
  }
}

/**
 * Collects every attended row of the host, attendee and panelist tables into
 * per-email timelines. Seed records keep precedence: table values only fill
 * fields still empty, and the first row carrying a value wins. The seed map
 * is not modified.
 */
export function buildAttendees(
  tables: ReadonlyMap<string, Table>,
  seeds: ReadonlyMap<string, Attendee>,
  certificationFields: readonly string[],
): Map<string, Attendee> {
  const attendees = new Map<string, Attendee>();
  for (const [key, seed] of seeds) {
    attendees.set(key, { ...seed, timeline: [...seed.timeline] });
  }

  for (const { table: tableName, role } of ROLE_TABLES) {
    const table = tables.get(tableName);
    if (!table) continue;

    const attendedCol = columnIndex(table, COLUMNS.attended);
    const emailCol = columnIndex(table, COLUMNS.email);
    const joinCol = columnIndex(table, COLUMNS.joinTime);
    const leaveCol = columnIndex(table, COLUMNS.leaveTime);
    const minutesCol = columnIndex(table, COLUMNS.sessionMinutes);
    const firstCol = table.index.get(COLUMNS.firstName);
    const lastCol = table.index.get(COLUMNS.lastName);
    const certCol = optionalColumn(table, certificationFields);

    table.rows.forEach((record, row) => {
      if (!isAffirmative(record[attendedCol])) return;
      const email = record[emailCol];
      if (email === null || email.trim() === '') return;

      // one person can have several rows: reconnects, promotion to panelist
      let attendee = attendees.get(email);
      if (!attendee) {
        attendee = { key: email, timeline: [] };
        attendees.set(email, attendee);
      }
      fillMissing(attendee, 'firstName', firstCol === undefined ? undefined : record[firstCol]);
      fillMissing(attendee, 'lastName', lastCol === undefined ? undefined : record[lastCol]);
      fillMissing(attendee, 'certification', certCol === undefined ? undefined : record[certCol]);

      attendee.timeline.push({
        roles: [role],
        joinTime: requireTime(table, row, COLUMNS.joinTime, record[joinCol]),
        leaveTime: requireTime(table, row, COLUMNS.leaveTime, record[leaveCol]),
        sessionMinutes: parseMinutes(table, row, record[minutesCol]),
      });
    });
  }

  return attendees;
}

export const API_PREFIX = '/api';

export const ROLES = ['host', 'attendee', 'panelist'] as const;

/** Role tables in the order their rows are scanned. */
export const ROLE_TABLES = [
  { table: 'host details', role: 'host' },
  { table: 'attendee details', role: 'attendee' },
  { table: 'panelist details', role: 'panelist' },
] as const;

export const SUMMARY_TABLE = 'attendee report';

export const COLUMNS = {
  attended: 'attended',
  email: 'email',
  firstName: 'first name',
  lastName: 'last name',
  joinTime: 'join time',
  leaveTime: 'leave time',
  sessionMinutes: 'time in session (minutes)',
  actualStart: 'actual start time',
  actualDuration: 'actual duration (minutes)',
} as const;

export const DEFAULT_MAX_CREDITS = 2;
export const DEFAULT_START_GRACE_MINUTES = 10;
export const DEFAULT_CERTIFICATION_FIELDS = ['(isc)2 certification:'] as const;

export const MERGE_TOLERANCE_SECONDS = 60;

export const LATE_JOIN_POLICIES = ['reset', 'accumulate'] as const;

export const CERTIFICATION_DESIGNATIONS = /cissp|csslp|sscp|ccsp|cap|hcispp/i;

export const REPORT_HEADERS = [
  '(ISC)2 Member #',
  'Member First Name',
  'Member Last Name',
  'Title of Meeting',
  '# CPEs',
  'Date of Activity',
  'CPE qualifying minutes',
] as const;

export const SKIP_REASONS = ['no-certification', 'no-attendance'] as const;

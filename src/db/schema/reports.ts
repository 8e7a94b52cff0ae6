import { pgTable, uuid, text, integer, jsonb, timestamp } from 'drizzle-orm/pg-core';
import type { CpeReportRow, SkippedAttendee } from '@shared/types';

export const cpeReports = pgTable('cpe_reports', {
  id: uuid('id').primaryKey().defaultRandom(),
  meetingTitle: text('meeting_title').notNull(),
  activityDate: text('activity_date').notNull(),
  rowCount: integer('row_count').notNull(),
  config: jsonb('config').notNull(),
  rows: jsonb('rows').$type<CpeReportRow[]>().notNull(),
  skipped: jsonb('skipped').$type<SkippedAttendee[]>().notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

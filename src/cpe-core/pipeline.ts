import type { CpeReportRow, SkippedAttendee } from '@shared/types';
import { parseOverride, resolveConfig, type CpeConfig } from './config';
import { applyCredits } from './credit';
import { assembleReport } from './report';
import { parseReport } from './tables';
import { buildAttendees, seedAttendees, type Attendee } from './timeline';
import { resolveTimestamps, type Timestamps } from './timestamps';

export interface CpeReportInput {
  /** Raw export text, several CSV sections concatenated. */
  report: string;
  config?: unknown;
  attendees?: unknown;
}

export interface CpeReportResult {
  config: CpeConfig;
  timestamps: Timestamps;
  titles: string[];
  attendees: Map<string, Attendee>;
  rows: CpeReportRow[];
  skipped: SkippedAttendee[];
}

/**
 * Export text in, CPE rows out:
 * split/parse tables -> timestamps -> timelines -> credits -> ordered rows.
 * Configuration is validated first so a bad option fails before the export
 * is read.
 */
export function generateCpeReport(input: CpeReportInput): CpeReportResult {
  const override = parseOverride({ config: input.config, attendees: input.attendees });
  const config = resolveConfig(override.config);

  const parsed = parseReport(input.report);
  const timestamps = resolveTimestamps(parsed.tables, config, parsed.generated);

  const seeded = seedAttendees(override.attendees);
  const discovered = buildAttendees(parsed.tables, seeded, config.certificationFields);
  const attendees = applyCredits(discovered, timestamps, config);

  const { rows, skipped } = assembleReport(attendees, timestamps, config.title);
  return { config, timestamps, titles: parsed.titles, attendees, rows, skipped };
}

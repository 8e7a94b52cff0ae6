import { COLUMNS, SUMMARY_TABLE } from '@shared/constants';
import { addHours, addMinutes, parseDate, type CalendarTime } from './dates';
import type { CpeConfig } from './config';
import { ConfigError, LookupError } from './errors';
import { fetchCell, type Table } from './tables';

export interface Timestamps {
  /** From the `Report Generated:` line, when the export has one. */
  generated?: CalendarTime;
  streamStart?: CalendarTime;
  streamEnd?: CalendarTime;
  start: CalendarTime;
  end: CalendarTime;
  businessStart: CalendarTime;
  businessEnd: CalendarTime;
}

function readStream(
  tables: ReadonlyMap<string, Table>,
): { streamStart: CalendarTime; streamEnd: CalendarTime } | undefined {
  if (!tables.has(SUMMARY_TABLE)) return undefined;

  const actualStart = fetchCell(tables, SUMMARY_TABLE, 0, COLUMNS.actualStart);
  const duration = fetchCell(tables, SUMMARY_TABLE, 0, COLUMNS.actualDuration);
  if (actualStart === null) {
    throw new LookupError(`"${COLUMNS.actualStart}" is empty in table "${SUMMARY_TABLE}"`);
  }
  const minutes = Number(duration ?? 0);
  if (!Number.isFinite(minutes)) {
    throw new LookupError(
      `"${COLUMNS.actualDuration}" is not a number in table "${SUMMARY_TABLE}": ${duration}`,
    );
  }

  const streamStart = parseDate(actualStart);
  return { streamStart, streamEnd: addMinutes(streamStart, minutes) };
}

/**
 * Works out the meeting's time boundaries.
 *
 * - start: configured, else the stream start from the summary table
 * - businessStart: start + grace period
 * - end: configured, else start + maxCredits hours
 * - businessEnd: configured, else end
 */
export function resolveTimestamps(
  tables: ReadonlyMap<string, Table>,
  config: CpeConfig,
  generated?: CalendarTime,
): Timestamps {
  const stream = readStream(tables);

  let start: CalendarTime;
  if (config.start !== undefined) {
    start = parseDate(config.start);
  } else if (stream) {
    start = stream.streamStart;
  } else {
    throw new ConfigError(
      `no scheduled start configured and no "${SUMMARY_TABLE}" table to take it from`,
    );
  }

  const end = config.end !== undefined ? parseDate(config.end) : addHours(start, config.maxCredits);
  const businessEnd = config.businessEnd !== undefined ? parseDate(config.businessEnd) : end;

  return {
    generated,
    streamStart: stream?.streamStart,
    streamEnd: stream?.streamEnd,
    start,
    end,
    businessStart: addMinutes(start, config.startGracePeriod),
    businessEnd,
  };
}

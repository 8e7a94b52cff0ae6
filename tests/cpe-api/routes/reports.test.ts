import { describe, it, expect, vi, afterEach } from 'vitest';
import { ZodError } from 'zod';
import reportsRouter, { csvFilename, runReportRequest, reportRequestSchema } from '../../../src/cpe-api/routes/reports';
import { statusForError } from '../../../src/cpe-api/middleware/index';
import { ConfigError, TableFormatError } from '@core/errors';

const report = [
  'Attendee Details,',
  'Attended,First Name,Last Name,Email,Join Time,Leave Time,Time in Session (minutes),(ISC)2 Certification:',
  'Yes,Ann,Lee,ann@example.org,"Mar 10, 2026 18:05:00","Mar 10, 2026 19:37:00",92,CISSP 1001',
  'Yes,Ben,Ray,ben@example.org,"Mar 10, 2026 18:05:00","Mar 10, 2026 19:37:00",92,',
].join('\n');

afterEach(() => {
  vi.restoreAllMocks();
});

describe('reports router', () => {
  it('exports a router', () => {
    expect(reportsRouter).toBeDefined();
    expect(reportsRouter.stack).toBeDefined();
  });
});

describe('reportRequestSchema', () => {
  it('requires report text', () => {
    const result = reportRequestSchema.safeParse({ config: { title: 'Q1' } });
    expect(result.success).toBe(false);
  });
});

describe('runReportRequest', () => {
  it('runs the pipeline and logs skipped attendees', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = runReportRequest({
      report,
      config: { start: '2026-03-10 18:00:00', title: 'Q1' },
    });

    expect(result.rows).toEqual([
      {
        certificationId: '1001',
        firstName: 'Ann',
        lastName: 'Lee',
        meetingTitle: 'Q1',
        credits: 1.5,
        activityDate: '03/10/2026',
        qualifyingMinutes: '97.000',
      },
    ]);
    expect(warn).toHaveBeenCalledWith('[REPORT] skipping Ray, Ben: no certification number');
  });

  it('throws a validation error for a missing report', () => {
    expect(() => runReportRequest({})).toThrow(ZodError);
  });
});

describe('csvFilename', () => {
  it('uses the configured output name', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = runReportRequest({
      report,
      config: { start: '2026-03-10 18:00:00', output: 'q1-cpe.csv' },
    }).config;
    expect(csvFilename(config, 'r-1')).toBe('q1-cpe.csv');
  });

  it('falls back to a name built from the report id', () => {
    expect(csvFilename({ maxCredits: 2 }, 'r-1')).toBe('cpe-report-r-1.csv');
    expect(csvFilename(null, 'r-2')).toBe('cpe-report-r-2.csv');
  });
});

describe('statusForError', () => {
  it('maps input and configuration errors to 400', () => {
    expect(statusForError(new ConfigError('bad option'))).toBe(400);
    expect(statusForError(new TableFormatError('t', 1, 'too wide'))).toBe(400);
    expect(statusForError(new ZodError([]))).toBe(400);
  });

  it('maps anything else to 500', () => {
    expect(statusForError(new Error('connection refused'))).toBe(500);
  });
});

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { desc, eq } from 'drizzle-orm';
import { db } from '@db/connection';
import { cpeReports } from '@db/schema/reports';
import { cpeConfigSchema, cpeOverrideSchema } from '@core/config';
import { generateCpeReport, type CpeReportResult } from '@core/pipeline';
import { describeSkip, formatReportCsv } from '@core/report';
import { formatActivityDate } from '@core/dates';

export const reportRequestSchema = cpeOverrideSchema.extend({
  report: z.string().min(1, 'report text is required'),
});

export type ReportRequest = z.infer<typeof reportRequestSchema>;

/** Download name for a stored report: its configured `output`, else one built from the id. */
export function csvFilename(storedConfig: unknown, id: string): string {
  const stored = cpeConfigSchema.partial().safeParse(storedConfig);
  return stored.success && stored.data.output !== undefined
    ? stored.data.output
    : `cpe-report-${id}.csv`;
}

/** Validates the body and runs the pipeline; skipped attendees are logged, not fatal. */
export function runReportRequest(body: unknown): CpeReportResult {
  const request = reportRequestSchema.parse(body);
  const result = generateCpeReport(request);
  for (const skip of result.skipped) {
    console.warn(`[REPORT] ${describeSkip(skip)}`);
  }
  return result;
}

const router = Router();

// POST /reports -- compute and store a CPE report
router.post('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = runReportRequest(req.body);
    const [report] = await db
      .insert(cpeReports)
      .values({
        meetingTitle: result.config.title,
        activityDate: formatActivityDate(result.timestamps.start),
        rowCount: result.rows.length,
        config: result.config,
        rows: result.rows,
        skipped: result.skipped,
      })
      .returning();

    res.status(201).json({
      success: true,
      data: { report, rows: result.rows, skipped: result.skipped },
    });
  } catch (err) {
    next(err);
  }
});

// POST /reports/preview -- compute without storing
router.post('/preview', (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = runReportRequest(req.body);
    res.json({ success: true, data: { rows: result.rows, skipped: result.skipped } });
  } catch (err) {
    next(err);
  }
});

// GET /reports -- list stored reports
router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const rows = await db.select().from(cpeReports).orderBy(desc(cpeReports.createdAt));
    res.json({ success: true, data: rows });
  } catch (err) {
    next(err);
  }
});

// GET /reports/:id/csv -- stored rows as CSV
router.get('/:id/csv', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const [row] = await db.select().from(cpeReports).where(eq(cpeReports.id, req.params.id));
    if (!row) {
      res.status(404).json({ success: false, error: 'Report not found' });
      return;
    }
    res
      .type('text/csv')
      .attachment(csvFilename(row.config, row.id))
      .send(formatReportCsv(row.rows));
  } catch (err) {
    next(err);
  }
});

// GET /reports/:id -- one stored report
router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const [row] = await db.select().from(cpeReports).where(eq(cpeReports.id, req.params.id));
    if (!row) {
      res.status(404).json({ success: false, error: 'Report not found' });
      return;
    }
    res.json({ success: true, data: row });
  } catch (err) {
    next(err);
  }
});

export default router;

import Papa from 'papaparse';
import { parseDate, type CalendarTime } from './dates';
import { LookupError, TableFormatError } from './errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TableCell = string | null;

export interface RawTableGroup {
  title: string;
  lines: string[];
}

export interface SplitResult {
  groups: Map<string, RawTableGroup>;
  /** Section titles in discovery order, each listed once. */
  titles: string[];
  generated?: CalendarTime;
  /** Lines seen before the first section title. */
  discardedLines: number;
}

export interface Table {
  name: string;
  columns: readonly string[];
  rows: readonly (readonly TableCell[])[];
  index: ReadonlyMap<string, number>;
}

export interface ParsedReport {
  tables: Map<string, Table>;
  titles: string[];
  generated?: CalendarTime;
  discardedLines: number;
}

const SECTION_TITLE = /^([^,]+),$/;
const REPORT_GENERATED = /^Report Generated:,"([^"]*)"$/;

// ---------------------------------------------------------------------------
// Splitting
// ---------------------------------------------------------------------------

/**
 * Divides a webinar export into its concatenated CSV sections. CSV readers
 * take one table per file, so the sections are separated on title lines
 * (`Attendee Details,`) before any field parsing happens.
 */
export function splitTables(text: string): SplitResult {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  const groups = new Map<string, RawTableGroup>();
  const titles: string[] = [];
  let generated: CalendarTime | undefined;
  let current: RawTableGroup | undefined;
  let discardedLines = 0;

  for (const line of lines) {
    if (line.trim() === '') continue;

    const title = SECTION_TITLE.exec(line);
    if (title) {
      const name = title[1].trim().toLowerCase();
      current = groups.get(name);
      if (!current) {
        current = { title: name, lines: [] };
        groups.set(name, current);
        titles.push(name);
      }
      continue;
    }

    const stamp = REPORT_GENERATED.exec(line);
    if (stamp) {
      generated = parseDate(stamp[1]);
      continue;
    }

    if (!current) {
      discardedLines++;
      continue;
    }
    current.lines.push(line);
  }

  return { groups, titles, generated, discardedLines };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function buildIndex(columns: readonly string[]): Map<string, number> {
  const index = new Map<string, number>();
  // duplicate headings: the last one wins
  columns.forEach((name, i) => index.set(name, i));
  return index;
}

function alignRow(table: string, rowNumber: number, fields: string[], width: number): TableCell[] {
  const cells: TableCell[] = fields.map((f) => (f === '' ? null : f));
  if (cells.length > width) {
    const overflow = cells.slice(width);
    if (overflow.some((c) => c !== null)) {
      throw new TableFormatError(
        table,
        rowNumber,
        `${fields.length} fields for ${width} columns`,
      );
    }
    return cells.slice(0, width);
  }
  while (cells.length < width) cells.push(null);
  return cells;
}

export function parseTable(group: RawTableGroup): Table {
  const { title } = group;
  if (group.lines.length === 0) {
    return { name: title, columns: [], rows: [], index: new Map() };
  }

  const parsed = Papa.parse<string[]>(group.lines.join('\n'), {
    delimiter: ',',
    skipEmptyLines: true,
  });
  if (parsed.errors.length > 0) {
    const [first] = parsed.errors;
    throw new TableFormatError(title, first.row ?? 0, first.message);
  }

  const [header = [], ...data] = parsed.data;
  const columns = header.map((h) => h.trim().toLowerCase());
  const rows = data.map((fields, i) => alignRow(title, i + 1, fields, columns.length));

  return { name: title, columns, rows, index: buildIndex(columns) };
}

/** Splits and parses a whole export. */
export function parseReport(text: string): ParsedReport {
  const split = splitTables(text);
  const tables = new Map<string, Table>();
  for (const name of split.titles) {
    const group = split.groups.get(name);
    if (group) tables.set(name, parseTable(group));
  }
  return {
    tables,
    titles: split.titles,
    generated: split.generated,
    discardedLines: split.discardedLines,
  };
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

export function requireTable(tables: ReadonlyMap<string, Table>, name: string): Table {
  const table = tables.get(name);
  if (!table) {
    const known = Array.from(tables.keys()).sort().join(', ');
    throw new LookupError(`no such table "${name}" - defined tables: ${known}`);
  }
  return table;
}

export function columnIndex(table: Table, column: string): number {
  const i = table.index.get(column);
  if (i === undefined) {
    throw new LookupError(`no column "${column}" in table "${table.name}"`);
  }
  return i;
}

export function fetchCell(
  tables: ReadonlyMap<string, Table>,
  tableName: string,
  row: number,
  column: string,
): TableCell {
  const table = requireTable(tables, tableName);
  const col = columnIndex(table, column);
  if (!Number.isInteger(row) || row < 0 || row >= table.rows.length) {
    throw new LookupError(
      `no row ${row} in table "${tableName}", max=${table.rows.length - 1}`,
    );
  }
  return table.rows[row][col];
}

import * as fs from 'fs-extra';
import * as path from 'path';
import { parse as parseCsv } from 'csv-parse/sync';
import { parse as json2csv } from 'json2csv';
import { z } from 'zod';
import { Flow, ItemStatus, RunResult, WorkItem } from '../types/work-types';
import { PreconditionError } from './errors';
import { normalizeFileName } from './file-names';
import { getLogger } from './logger';

export const COLUMNS = {
  meetingId: 'Meeting ID',
  destinationRef: 'Vimeo URI',
  fileName: 'File Name',
  downloadStatus: 'zoom_download_status',
  uploadStatus: 'vimeo_upload_status',
  videoUri: 'vimeo_video_uri',
  uploadNote: 'vimeo_upload_note'
} as const;

export const REQUIRED_COLUMNS: readonly string[] = [COLUMNS.meetingId, COLUMNS.destinationRef, COLUMNS.fileName];

// Columns each flow owns; created on write when the worksheet lacks them
export const MANAGED_COLUMNS: Record<Flow, readonly string[]> = {
  download: [COLUMNS.downloadStatus],
  upload: [COLUMNS.uploadStatus, COLUMNS.videoUri, COLUMNS.uploadNote]
};

const STATUS_COLUMN: Record<Flow, string> = {
  download: COLUMNS.downloadStatus,
  upload: COLUMNS.uploadStatus
};

export type WorksheetRow = Record<string, string>;

export interface Worksheet {
  columns: string[]; // Trimmed names rows are keyed by
  headers: string[]; // Header cells exactly as read, written back unchanged
  rows: WorksheetRow[];
}

const RecordsSchema = z.array(z.array(z.string()));

/**
 * Parse CSV text; the first record is the header
 */
export function parseWorksheet(text: string): Worksheet {
  const records = RecordsSchema.parse(parseCsv(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  }));

  const [header, ...body] = records;
  if (!header || header.length === 0) {
    throw new PreconditionError('Worksheet is empty: a header row is required');
  }

  const columns = header.map(column => column.trim());
  const rows = body.map((record, index) => {
    if (record.length > columns.length) {
      getLogger().warning(
        `Worksheet row ${index + 2} has ${record.length} cells but the header has ${columns.length}; ` +
        `cells past the last column are not kept`
      );
    }
    const row: WorksheetRow = {};
    columns.forEach((column, position) => {
      row[column] = record[position] ?? '';
    });
    return row;
  });

  return { columns, headers: [...header], rows };
}

export function validateColumns(sheet: Worksheet): void {
  const missing = REQUIRED_COLUMNS.filter(column => !sheet.columns.includes(column));
  if (missing.length > 0) {
    throw new PreconditionError(
      `Worksheet must contain all required columns: ${REQUIRED_COLUMNS.join(', ')}. ` +
      `Missing: ${missing.join(', ')}. Found: ${sheet.columns.join(', ')}`
    );
  }
}

/**
 * Read and validate the worksheet from disk
 */
export async function readWorksheet(filePath: string): Promise<Worksheet> {
  if (!await fs.pathExists(filePath)) {
    throw new PreconditionError(
      `Worksheet '${filePath}' not found. Create it with columns: ${REQUIRED_COLUMNS.join(', ')}`
    );
  }
  const sheet = parseWorksheet(await fs.readFile(filePath, 'utf-8'));
  validateColumns(sheet);
  return sheet;
}

export function serializeWorksheet(sheet: Worksheet): string {
  // Field objects rather than names: a dotted column name would be read as a path
  return json2csv(sheet.rows, {
    eol: '\n',
    fields: sheet.columns.map((column, index) => ({
      label: sheet.headers[index] ?? column,
      value: (row: WorksheetRow) => row[column] ?? ''
    }))
  }) + '\n';
}

/**
 * Write the full table through a temporary file renamed over the original
 */
export async function writeWorksheet(filePath: string, sheet: Worksheet): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.ensureDir(path.dirname(path.resolve(filePath)));
  await fs.writeFile(tempPath, serializeWorksheet(sheet), 'utf-8');
  await fs.move(tempPath, filePath, { overwrite: true });
}

export function parseStatus(raw: string | undefined): ItemStatus {
  const value = (raw ?? '').trim().toLowerCase();
  // 'uploaded' / 'downloaded' were written by earlier versions of the worksheet
  if (value === 'done' || value === 'uploaded' || value === 'downloaded') return 'done';
  if (value === 'failed') return 'failed';
  return '';
}

/**
 * Build work items for one flow. Rows without a meeting id are dropped and
 * file names are normalized here, once, for every later path computation.
 */
export function toWorkItems(sheet: Worksheet, flow: Flow, downloadDir: string): WorkItem[] {
  const logger = getLogger();
  const items: WorkItem[] = [];
  const owners = new Map<string, string>();

  sheet.rows.forEach((row, index) => {
    const id = (row[COLUMNS.meetingId] ?? '').trim();
    if (!id) {
      logger.warning(`Worksheet row ${index + 2} has no ${COLUMNS.meetingId}; skipping it`);
      return;
    }

    const desiredName = normalizeFileName(row[COLUMNS.fileName], id);
    const localPath = path.join(downloadDir, desiredName);
    const status = parseStatus(row[STATUS_COLUMN[flow]]);

    const owner = owners.get(localPath);
    if (owner !== undefined && owner !== id) {
      logger.warning(`Meeting ID ${id} and Meeting ID ${owner} both map to '${localPath}'; the last download wins`);
    }
    owners.set(localPath, id);

    items.push({
      id,
      desiredName,
      destinationRef: (row[COLUMNS.destinationRef] ?? '').trim(),
      status,
      localPath
    });
  });

  return items;
}

function persistedStatusFor(result: RunResult): ItemStatus {
  return result.outcome === 'failed' ? 'failed' : 'done';
}

/**
 * Merge results back into the worksheet by meeting id. Skipped items and rows
 * without a result keep every value; other rows only see the flow's columns change.
 */
export function applyResults(sheet: Worksheet, results: RunResult[], flow: Flow): Worksheet {
  const columns = [...sheet.columns];
  const headers = [...sheet.headers];
  for (const column of MANAGED_COLUMNS[flow]) {
    if (!columns.includes(column)) {
      columns.push(column);
      headers.push(column);
    }
  }

  const byId = new Map<string, RunResult>();
  for (const result of results) {
    byId.set(result.id, result);
  }

  const rows = sheet.rows.map(original => {
    const row: WorksheetRow = { ...original };
    for (const column of columns) {
      row[column] = row[column] ?? '';
    }

    const result = byId.get((original[COLUMNS.meetingId] ?? '').trim());
    if (!result || result.outcome === 'skipped') {
      return row;
    }

    row[STATUS_COLUMN[flow]] = persistedStatusFor(result);
    if (flow === 'upload') {
      if (result.resolvedRef) {
        row[COLUMNS.videoUri] = result.resolvedRef;
      }
      row[COLUMNS.uploadNote] = result.outcome === 'uploaded' ? '' : result.message;
    }
    return row;
  });

  return { columns, headers, rows };
}

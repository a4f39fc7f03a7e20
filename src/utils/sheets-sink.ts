import { google } from 'googleapis';
import { GoogleAuth } from 'google-auth-library';
import { EntryKind, LogEntry, LogSink } from './logger';

export const SUCCESS_SHEET_NAME = 'Success Log';
export const FAILURE_SHEET_NAME = 'Failure Log';
const HEADER_ROW = ['Timestamp', 'Level', 'Message'];

/**
 * The slice of the Sheets API the log sink needs
 */
export interface SheetRowAppender {
  ensureSheets(sheetNames: string[]): Promise<void>;
  appendRow(sheetName: string, values: string[]): Promise<void>;
}

/**
 * Build an appender backed by the Google Sheets v4 API and a service account key file
 */
export function createSheetsAppender(spreadsheetId: string, keyFile: string): SheetRowAppender {
  const auth = new GoogleAuth({
    keyFile,
    scopes: ['https://www.googleapis.com/auth/spreadsheets']
  });
  const sheets = google.sheets({ version: 'v4', auth });

  return {
    async ensureSheets(sheetNames: string[]): Promise<void> {
      const metadata = await sheets.spreadsheets.get({ spreadsheetId });
      const existing = new Set(
        (metadata.data.sheets ?? []).map(sheet => sheet.properties?.title ?? '')
      );
      const missing = sheetNames.filter(name => !existing.has(name));
      if (missing.length === 0) return;

      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: missing.map(title => ({ addSheet: { properties: { title } } }))
        }
      });
      for (const title of missing) {
        await sheets.spreadsheets.values.append({
          spreadsheetId,
          range: `'${title}'!A1`,
          valueInputOption: 'USER_ENTERED',
          requestBody: { values: [HEADER_ROW] }
        });
      }
    },

    async appendRow(sheetName: string, values: string[]): Promise<void> {
      await sheets.spreadsheets.values.append({
        spreadsheetId,
        range: `'${sheetName}'!A1`,
        valueInputOption: 'USER_ENTERED',
        requestBody: { values: [values] }
      });
    }
  };
}

export function sheetForEntry(kind: EntryKind): string | null {
  switch (kind) {
    case 'SUCCESS':
      return SUCCESS_SHEET_NAME;
    case 'ERROR':
    case 'WARNING':
      return FAILURE_SHEET_NAME;
    default:
      return null;
  }
}

/**
 * Mirrors success and failure log lines into two tabs of a spreadsheet
 */
export class GoogleSheetsLogSink implements LogSink {
  readonly name = 'google-sheets';
  private appender: SheetRowAppender;

  constructor(appender: SheetRowAppender) {
    this.appender = appender;
  }

  async prepare(): Promise<void> {
    await this.appender.ensureSheets([SUCCESS_SHEET_NAME, FAILURE_SHEET_NAME]);
  }

  async write(entry: LogEntry): Promise<void> {
    const sheetName = sheetForEntry(entry.kind);
    if (!sheetName) return;
    await this.appender.appendRow(sheetName, [entry.timestamp, entry.kind, entry.message]);
  }
}

import { describe, it, expect, beforeAll } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import {
  applyResults,
  parseStatus,
  parseWorksheet,
  readWorksheet,
  serializeWorksheet,
  toWorkItems,
  writeWorksheet
} from '../src/utils/worksheet';
import { PreconditionError } from '../src/utils/errors';
import { getLogger } from '../src/utils/logger';
import { RunResult } from '../src/types/work-types';
import { initTestLogger, makeTempDir } from './helpers/fake-http';

const SHEET = [
  'Meeting ID,Vimeo URI,File Name,Host,vimeo_upload_status',
  '111,https://vimeo.com/manage/folders/42,Intro,Ana,',
  '222,/me/projects/9,"Week 2, Q&A.mp4",Ben,done',
  '333,,Closing,Cleo,failed',
  ''
].join('\n');

describe('worksheet', () => {
  beforeAll(async () => {
    await initTestLogger();
  });

  describe('parseWorksheet', () => {
    it('reads the header and every row', () => {
      const sheet = parseWorksheet(SHEET);

      expect(sheet.columns).toEqual(['Meeting ID', 'Vimeo URI', 'File Name', 'Host', 'vimeo_upload_status']);
      expect(sheet.rows).toHaveLength(3);
      expect(sheet.rows[1]).toEqual({
        'Meeting ID': '222',
        'Vimeo URI': '/me/projects/9',
        'File Name': 'Week 2, Q&A.mp4',
        Host: 'Ben',
        vimeo_upload_status: 'done'
      });
    });

    it('fills short rows with empty values', () => {
      const sheet = parseWorksheet('Meeting ID,Vimeo URI,File Name\n444\n');
      expect(sheet.rows[0]).toEqual({ 'Meeting ID': '444', 'Vimeo URI': '', 'File Name': '' });
    });

    it('warns about rows with more cells than the header', async () => {
      await initTestLogger();
      const sheet = parseWorksheet('Meeting ID,Vimeo URI,File Name\n111,,Intro,stray,extra\n222,,Outro\n');
      const failures = (await fs.readFile(getLogger().files.failure, 'utf-8')).trim().split('\n');

      expect(sheet.rows[0]).toEqual({ 'Meeting ID': '111', 'Vimeo URI': '', 'File Name': 'Intro' });
      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatch(
        /\[WARNING\] Worksheet row 2 has 5 cells but the header has 3; cells past the last column are not kept$/
      );
    });

    it('rejects an empty file', () => {
      expect(() => parseWorksheet('')).toThrow(PreconditionError);
    });
  });

  describe('readWorksheet', () => {
    it('rejects a missing file', async () => {
      const dir = await makeTempDir();
      await expect(readWorksheet(path.join(dir, 'missing.csv'))).rejects.toThrow(PreconditionError);
    });

    it('rejects a worksheet without the required columns', async () => {
      const dir = await makeTempDir();
      const file = path.join(dir, 'meetings.csv');
      await fs.writeFile(file, 'Meeting ID,File Name\n111,Intro\n');

      await expect(readWorksheet(file)).rejects.toThrow('Missing: Vimeo URI');
    });
  });

  describe('toWorkItems', () => {
    it('normalizes names and reads the status column of the flow', () => {
      const sheet = parseWorksheet(SHEET);
      const items = toWorkItems(sheet, 'upload', 'downloads');

      expect(items.map(item => item.desiredName)).toEqual(['Intro.mp4', 'Week 2, Q&A.mp4', 'Closing.mp4']);
      expect(items.map(item => item.status)).toEqual(['', 'done', 'failed']);
      expect(items[0]?.localPath).toBe(path.join('downloads', 'Intro.mp4'));
      expect(items[2]?.destinationRef).toBe('');
    });

    it('reads an empty download status when the column is absent', () => {
      const items = toWorkItems(parseWorksheet(SHEET), 'download', 'downloads');
      expect(items.every(item => item.status === '')).toBe(true);
    });

    it('drops rows without a meeting id and names unnamed files after the meeting', () => {
      const sheet = parseWorksheet('Meeting ID,Vimeo URI,File Name\n,/me/projects/1,Orphan\n555,,\n');
      const items = toWorkItems(sheet, 'download', 'downloads');

      expect(items).toHaveLength(1);
      expect(items[0]?.id).toBe('555');
      expect(items[0]?.desiredName).toBe('555.mp4');
    });
  });

  it('reads legacy status values as done', () => {
    expect(parseStatus('uploaded')).toBe('done');
    expect(parseStatus(' DONE ')).toBe('done');
    expect(parseStatus('failed')).toBe('failed');
    expect(parseStatus('in_progress')).toBe('');
    expect(parseStatus(undefined)).toBe('');
  });

  describe('applyResults', () => {
    it('updates only the flow columns of completed rows', () => {
      const sheet = parseWorksheet(SHEET);
      const results: RunResult[] = [
        { id: '111', outcome: 'uploaded', message: 'ok', resolvedRef: '/videos/1' },
        { id: '222', outcome: 'skipped', message: 'already uploaded' },
        { id: '333', outcome: 'partial', message: 'uploaded, folder assignment failed: PUT x returned status 403', resolvedRef: '/videos/3' }
      ];

      const merged = applyResults(sheet, results, 'upload');

      expect(merged.columns).toEqual([
        'Meeting ID', 'Vimeo URI', 'File Name', 'Host', 'vimeo_upload_status', 'vimeo_video_uri', 'vimeo_upload_note'
      ]);
      expect(merged.rows[0]).toEqual({
        'Meeting ID': '111',
        'Vimeo URI': 'https://vimeo.com/manage/folders/42',
        'File Name': 'Intro',
        Host: 'Ana',
        vimeo_upload_status: 'done',
        vimeo_video_uri: '/videos/1',
        vimeo_upload_note: ''
      });
      expect(merged.rows[1]).toEqual({
        'Meeting ID': '222',
        'Vimeo URI': '/me/projects/9',
        'File Name': 'Week 2, Q&A.mp4',
        Host: 'Ben',
        vimeo_upload_status: 'done',
        vimeo_video_uri: '',
        vimeo_upload_note: ''
      });
      expect(merged.rows[2]?.vimeo_upload_status).toBe('done');
      expect(merged.rows[2]?.vimeo_upload_note).toBe('uploaded, folder assignment failed: PUT x returned status 403');
      expect(merged.rows[2]?.['Vimeo URI']).toBe('');
    });

    it('marks failed downloads and appends the download status column', () => {
      const merged = applyResults(parseWorksheet(SHEET), [
        { id: '111', outcome: 'downloaded', message: '' },
        { id: '222', outcome: 'failed', message: 'not found' }
      ], 'download');

      expect(merged.columns[merged.columns.length - 1]).toBe('zoom_download_status');
      expect(merged.rows.map(row => row.zoom_download_status)).toEqual(['done', 'failed', '']);
      expect(merged.rows[1]?.vimeo_upload_status).toBe('done');
    });

    it('updates every row that shares a meeting id', () => {
      const sheet = parseWorksheet('Meeting ID,Vimeo URI,File Name\n111,,A\n111,,B\n');
      const merged = applyResults(sheet, [{ id: '111', outcome: 'downloaded', message: '' }], 'download');

      expect(merged.rows.map(row => row.zoom_download_status)).toEqual(['done', 'done']);
    });
  });

  describe('round trip', () => {
    it('preserves untouched values through write and read', async () => {
      const dir = await makeTempDir();
      const file = path.join(dir, 'meetings.csv');
      await fs.writeFile(file, SHEET);

      const sheet = await readWorksheet(file);
      const merged = applyResults(sheet, [
        { id: '111', outcome: 'uploaded', message: '', resolvedRef: '/videos/1' },
        { id: '222', outcome: 'skipped', message: '' }
      ], 'upload');
      await writeWorksheet(file, merged);
      const reread = await readWorksheet(file);

      expect(reread.columns).toEqual(merged.columns);
      expect(reread.rows).toEqual(merged.rows);
      expect(reread.rows[1]?.['File Name']).toBe('Week 2, Q&A.mp4');
      expect(await fs.pathExists(`${file}.tmp`)).toBe(false);
    });

    it('writes header cells back exactly as they were read', async () => {
      const dir = await makeTempDir();
      const file = path.join(dir, 'meetings.csv');
      await fs.writeFile(file, 'Meeting ID , Vimeo URI,File Name, Notes \n111,,Intro,keep\n');

      const sheet = await readWorksheet(file);
      await writeWorksheet(file, applyResults(sheet, [{ id: '111', outcome: 'downloaded', message: '' }], 'download'));

      expect(sheet.columns).toEqual(['Meeting ID', 'Vimeo URI', 'File Name', 'Notes']);
      expect(await fs.readFile(file, 'utf-8')).toBe(
        '"Meeting ID "," Vimeo URI","File Name"," Notes ","zoom_download_status"\n"111","","Intro","keep","done"\n'
      );
    });

    it('quotes values that need it', () => {
      const text = serializeWorksheet({
        columns: ['Meeting ID', 'File Name'],
        headers: ['Meeting ID', 'File Name'],
        rows: [{ 'Meeting ID': '1', 'File Name': 'Say "hi", all' }]
      });

      expect(text).toBe('"Meeting ID","File Name"\n"1","Say ""hi"", all"\n');
    });
  });
});

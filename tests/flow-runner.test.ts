import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Readable } from 'stream';
import { AppConfig, ConfigLoader } from '../src/config/config-loader';
import { applyOverrides, createRuntime, planFlow, runFlow } from '../src/core/flow-runner';
import { PreconditionError } from '../src/utils/errors';
import { readWorksheet } from '../src/utils/worksheet';
import { FakeResponse, RecordedRequest, createFakeHttp, initTestLogger, makeTempDir, readBody } from './helpers/fake-http';

const SHEET = [
  'Meeting ID,Vimeo URI,File Name,Notes',
  '111,https://vimeo.com/manage/folders/42,Intro,first',
  '222,,Existing.mp4,second',
  ''
].join('\n');

async function respond(request: RecordedRequest): Promise<FakeResponse> {
  const auth = String(request.headers.Authorization ?? '');

  if (request.url === 'https://zoom.test/oauth/token') {
    const accountId = new URLSearchParams(String(request.data)).get('account_id');
    return { status: 200, data: { access_token: `tok-${accountId}` } };
  }
  if (request.url === 'https://api.zoom.test/v2/meetings/111/recordings') {
    return auth === 'Bearer tok-account-B'
      ? { status: 200, data: { recording_files: [{ file_type: 'MP4', file_extension: 'MP4', download_url: 'https://zoom.test/rec/111' }] } }
      : { status: 404, data: { code: 3301 } };
  }
  if (request.url === 'https://zoom.test/rec/111') {
    return { status: 200, data: Readable.from([Buffer.from('intro-video')]) };
  }
  if (request.method === 'POST' && request.url === 'https://api.vimeo.test/me/videos') {
    return { status: 201, data: { uri: '/videos/900', upload: { upload_link: 'https://upload.test/900' } } };
  }
  if (request.method === 'PATCH') {
    const body = await readBody(request.data);
    return { status: 204, headers: { 'upload-offset': String(body.length) } };
  }
  if (request.method === 'PUT') {
    return { status: 204 };
  }
  return { status: 500, data: `unexpected ${request.method} ${request.url}` };
}

describe('flow runner', () => {
  let dir: string;
  let config: AppConfig;

  beforeAll(async () => {
    await initTestLogger();
  });

  beforeEach(async () => {
    dir = await makeTempDir();
    await fs.writeFile(path.join(dir, 'meetings.csv'), SHEET);
    await fs.ensureDir(path.join(dir, 'downloads'));
    await fs.writeFile(path.join(dir, 'downloads', 'Existing.mp4'), 'existing-video');

    const loaded = await new ConfigLoader({
      ZOOM_ACCOUNT_A_ACCOUNT_ID: 'account-A',
      ZOOM_ACCOUNT_A_CLIENT_ID: 'client-A',
      ZOOM_ACCOUNT_A_CLIENT_SECRET: 'test-secret',
      ZOOM_ACCOUNT_B_ACCOUNT_ID: 'account-B',
      ZOOM_ACCOUNT_B_CLIENT_ID: 'client-B',
      ZOOM_ACCOUNT_B_CLIENT_SECRET: 'test-secret',
      ZOOM_OAUTH_URL: 'https://zoom.test/oauth/token',
      ZOOM_API_BASE_URL: 'https://api.zoom.test/v2',
      VIMEO_API_BASE_URL: 'https://api.vimeo.test',
      VIMEO_ACCESS_TOKEN: 'test-vimeo-token'
    }, dir).loadConfig();

    config = applyOverrides(loaded, {
      worksheet: path.join(dir, 'meetings.csv'),
      downloadDir: path.join(dir, 'downloads'),
      logsDir: path.join(dir, 'logs')
    });
  });

  it('downloads missing recordings and records the outcome in the worksheet', async () => {
    const { http, requests } = createFakeHttp(respond);

    const report = await runFlow('download', config, createRuntime(config, http));

    expect(report.summary).toEqual({ total: 2, downloaded: 1, uploaded: 0, partial: 0, skipped: 1, failed: 0 });
    expect(await fs.readFile(path.join(dir, 'downloads', 'Intro.mp4'), 'utf-8')).toBe('intro-video');
    expect(requests.filter(request => request.url.includes('/recordings'))).toHaveLength(2);

    const sheet = await readWorksheet(config.paths.worksheet);
    expect(sheet.columns).toEqual(['Meeting ID', 'Vimeo URI', 'File Name', 'Notes', 'zoom_download_status']);
    expect(sheet.rows.map(row => row.zoom_download_status)).toEqual(['done', '']);
    expect(sheet.rows.map(row => row.Notes)).toEqual(['first', 'second']);
  });

  it('uploads downloaded files and files them into their folder', async () => {
    await fs.writeFile(path.join(dir, 'downloads', 'Intro.mp4'), 'intro-video');
    const { http, requests } = createFakeHttp(respond);

    const report = await runFlow('upload', config, createRuntime(config, http));

    expect(report.summary).toEqual({ total: 2, downloaded: 0, uploaded: 2, partial: 0, skipped: 0, failed: 0 });
    expect(requests.filter(request => request.method === 'PUT').map(request => request.url))
      .toEqual(['https://api.vimeo.test/me/projects/42/videos/900']);

    const sheet = await readWorksheet(config.paths.worksheet);
    expect(sheet.rows.map(row => row.vimeo_upload_status)).toEqual(['done', 'done']);
    expect(sheet.rows.map(row => row.vimeo_video_uri)).toEqual(['/videos/900', '/videos/900']);
    expect(sheet.rows.map(row => row['Vimeo URI'])).toEqual(['https://vimeo.com/manage/folders/42', '']);
  });

  it('skips rows already uploaded on the next run', async () => {
    await fs.writeFile(path.join(dir, 'downloads', 'Intro.mp4'), 'intro-video');
    await runFlow('upload', config, createRuntime(config, createFakeHttp(respond).http));
    const { http, requests } = createFakeHttp(respond);

    const report = await runFlow('upload', config, createRuntime(config, http));

    expect(report.summary.skipped).toBe(2);
    expect(requests).toHaveLength(0);
  });

  it('plans without network access', async () => {
    const { http, requests } = createFakeHttp(respond);

    const report = await planFlow('download', config, createRuntime(config, http));

    expect(report.plans).toEqual([{ id: '111', plan: 'process' }, { id: '222', plan: 'skip' }]);
    expect(report.counts).toEqual({ skip: 1, process: 1, 'missing-file': 0 });
    expect(requests).toHaveLength(0);
  });

  it('refuses to start without the flow credentials', async () => {
    const withoutToken: AppConfig = { ...config, vimeo: { ...config.vimeo, accessToken: null } };

    await expect(runFlow('upload', withoutToken, createRuntime(withoutToken, createFakeHttp(respond).http)))
      .rejects.toThrow(PreconditionError);
  });
});

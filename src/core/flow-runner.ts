import * as fs from 'fs-extra';
import * as path from 'path';
import axios, { AxiosInstance } from 'axios';
import { Flow, ItemPlan, RunResult } from '../types/work-types';
import { VimeoPrivacy } from '../types/api-types';
import { AppConfig, ConfigLoader, requireFlowPrerequisites } from '../config/config-loader';
import { ZoomClient } from '../api/zoom-client';
import { VimeoClient } from '../api/vimeo-client';
import { PreconditionError, errorMessage } from '../utils/errors';
import { LogLevel, getLogger, initializeLogger } from '../utils/logger';
import { GoogleSheetsLogSink, createSheetsAppender } from '../utils/sheets-sink';
import { applyResults, readWorksheet, toWorkItems, writeWorksheet } from '../utils/worksheet';
import { CredentialPool } from './credential-pool';
import { AssetLocator } from './asset-locator';
import { TransferEngine } from './transfer-engine';
import { WorkItemProcessor } from './work-item-processor';
import { RunSummary, runAll, summarize } from './batch-coordinator';

export interface CliOverrides {
  worksheet?: string | undefined;
  downloadDir?: string | undefined;
  logsDir?: string | undefined;
  concurrency?: number | undefined;
  privacy?: VimeoPrivacy | undefined;
  verbose?: boolean | undefined;
}

export interface FlowReport {
  flow: Flow;
  results: RunResult[];
  summary: RunSummary;
  processingTime: string;
}

export interface PlanReport {
  flow: Flow;
  plans: Array<{ id: string; plan: ItemPlan }>;
  counts: Record<ItemPlan, number>;
}

function toLogLevel(level: AppConfig['app']['logLevel']): LogLevel {
  switch (level) {
    case 'error':
      return LogLevel.ERROR;
    case 'verbose':
      return LogLevel.VERBOSE;
    case 'info':
      return LogLevel.INFO;
  }
}

function formatDuration(ms: number): string {
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}`;
}

/**
 * Apply command line overrides on top of the loaded configuration
 */
export function applyOverrides(config: AppConfig, overrides: CliOverrides): AppConfig {
  return {
    ...config,
    vimeo: { ...config.vimeo, privacy: overrides.privacy ?? config.vimeo.privacy },
    app: {
      verbose: overrides.verbose ? true : config.app.verbose,
      logLevel: overrides.verbose ? 'verbose' : config.app.logLevel
    },
    concurrency: {
      download: overrides.concurrency ?? config.concurrency.download,
      upload: overrides.concurrency ?? config.concurrency.upload
    },
    paths: {
      worksheet: overrides.worksheet ?? config.paths.worksheet,
      downloadDir: overrides.downloadDir ?? config.paths.downloadDir,
      logsDir: overrides.logsDir ?? config.paths.logsDir
    }
  };
}

/**
 * Attach the spreadsheet log sink when a spreadsheet is configured
 */
async function attachSheetsSink(config: AppConfig): Promise<void> {
  const { spreadsheetId, serviceAccountFile } = config.sheets;
  if (!spreadsheetId) return;

  const keyFile = path.resolve(serviceAccountFile);
  if (!await fs.pathExists(keyFile)) {
    throw new PreconditionError(`Google service account key file not found: ${keyFile}`);
  }

  const sink = new GoogleSheetsLogSink(createSheetsAppender(spreadsheetId, keyFile));
  try {
    await sink.prepare();
  } catch (error) {
    throw new PreconditionError(`Could not open Google Sheets log spreadsheet ${spreadsheetId}: ${errorMessage(error)}`);
  }
  getLogger().addSink(sink);
  getLogger().info(`Mirroring success and failure logs to spreadsheet ${spreadsheetId}`);
}

/**
 * Load configuration, start the logger and attach optional sinks
 */
export async function bootstrap(overrides: CliOverrides = {}, loader: ConfigLoader = new ConfigLoader()): Promise<AppConfig> {
  const config = applyOverrides(await loader.loadConfig(), overrides);

  initializeLogger({
    verbose: config.app.verbose,
    logLevel: toLogLevel(config.app.logLevel),
    logsDir: config.paths.logsDir
  });

  await attachSheetsSink(config);
  return config;
}

/**
 * Wire clients, pool and engine into a processor for the given configuration
 */
export function createRuntime(config: AppConfig, http: AxiosInstance = axios.create()): WorkItemProcessor {
  const zoom = new ZoomClient(http, {
    oauthUrl: config.zoom.oauthUrl,
    apiBaseUrl: config.zoom.apiBaseUrl,
    timeoutMs: config.http.timeoutMs
  });
  const vimeo = new VimeoClient(http, {
    apiBaseUrl: config.vimeo.apiBaseUrl,
    timeoutMs: config.http.timeoutMs
  });

  const pool = new CredentialPool(config.zoom.accounts, zoom);
  return new WorkItemProcessor(pool, new AssetLocator(zoom), new TransferEngine(zoom, vimeo), {
    vimeoToken: config.vimeo.accessToken,
    privacy: config.vimeo.privacy
  });
}

function logSummary(report: FlowReport, config: AppConfig): void {
  const logger = getLogger();
  const { summary } = report;

  logger.info('=== SUMMARY ===');
  logger.info(`Flow: ${report.flow}`);
  logger.info(`Total items: ${summary.total}`);
  if (report.flow === 'download') {
    logger.info(`Downloaded: ${summary.downloaded}`);
  } else {
    logger.info(`Uploaded: ${summary.uploaded}`);
    logger.info(`Uploaded without folder: ${summary.partial}`);
  }
  logger.info(`Skipped: ${summary.skipped}`);
  logger.info(`Failed: ${summary.failed}`);
  logger.info(`Processing time: ${report.processingTime}`);
  logger.info(`Worksheet: ${config.paths.worksheet}`);
  logger.info(`Success log: ${logger.files.success}`);
  logger.info(`Failure log: ${logger.files.failure}`);
  if (config.app.verbose || config.app.logLevel === 'verbose') {
    logger.info(`Debug log: ${logger.files.debug}`);
  }
  logger.info('=== END SUMMARY ===');
}

/**
 * Run one flow over the whole worksheet: read once, process every item under
 * the flow's concurrency bound, then merge and write the worksheet once.
 */
export async function runFlow(
  flow: Flow,
  config: AppConfig,
  processor: WorkItemProcessor = createRuntime(config)
): Promise<FlowReport> {
  const logger = getLogger();
  requireFlowPrerequisites(config, flow);

  const sheet = await readWorksheet(config.paths.worksheet);
  const items = toWorkItems(sheet, flow, config.paths.downloadDir);
  const concurrency = config.concurrency[flow];
  logger.info(`Starting ${flow} of ${items.length} item(s) from '${config.paths.worksheet}' with concurrency ${concurrency}`);

  const startedAt = Date.now();
  const results = await runAll(items, item => processor.process(item, flow), {
    concurrency,
    onProgress: (completed, total) => logger.progress(completed, total, flow === 'download' ? 'Downloading' : 'Uploading')
  });

  await writeWorksheet(config.paths.worksheet, applyResults(sheet, results, flow));
  logger.verbose(`Wrote ${results.length} result(s) back to '${config.paths.worksheet}'`);

  const report: FlowReport = {
    flow,
    results,
    summary: summarize(results),
    processingTime: formatDuration(Date.now() - startedAt)
  };
  logSummary(report, config);
  return report;
}

/**
 * Report what a run would do without touching the network or the worksheet
 */
export async function planFlow(
  flow: Flow,
  config: AppConfig,
  processor: WorkItemProcessor = createRuntime(config)
): Promise<PlanReport> {
  const logger = getLogger();
  const sheet = await readWorksheet(config.paths.worksheet);
  const items = toWorkItems(sheet, flow, config.paths.downloadDir);

  const counts: Record<ItemPlan, number> = { skip: 0, process: 0, 'missing-file': 0 };
  const plans: PlanReport['plans'] = [];
  for (const item of items) {
    const plan = await processor.plan(item, flow);
    counts[plan]++;
    plans.push({ id: item.id, plan });
    logger.info(`[DRY RUN] Meeting ID ${item.id} (${item.desiredName}): ${plan}`);
  }

  logger.info('=== DRY RUN SUMMARY ===');
  logger.info(`Would process: ${counts.process}`);
  logger.info(`Would skip: ${counts.skip}`);
  if (flow === 'upload') {
    logger.info(`Missing local file: ${counts['missing-file']}`);
  }
  logger.info('=== END DRY RUN SUMMARY ===');

  return { flow, plans, counts };
}

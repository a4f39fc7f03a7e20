#!/usr/bin/env tsx

import { Command } from 'commander';
import { VimeoPrivacy } from '../src/types/api-types';
import { bootstrap, planFlow, runFlow } from '../src/core/flow-runner';
import { FlowCliOptions, exitWithError, finish, parsePositiveInt, parsePrivacy } from './cli-helpers';

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('upload-recordings')
    .description('Upload downloaded recordings to Vimeo and file them into the folder named in the worksheet')
    .option('-w, --worksheet <file>', 'Worksheet CSV (defaults to WORKSHEET_PATH)')
    .option('-d, --download-dir <dir>', 'Directory the recordings were saved to (defaults to DOWNLOAD_DIR)')
    .option('--logs-dir <dir>', 'Directory for success/failure/debug logs (defaults to LOGS_DIR)')
    .option('-c, --concurrency <number>', 'Uploads running at once', parsePositiveInt)
    .option('--privacy <view>', 'Vimeo privacy.view for new videos (defaults to VIMEO_PRIVACY)', parsePrivacy)
    .option('--dry-run', 'Show which files would be uploaded without calling any API')
    .option('--verbose', 'Enable verbose logging')
    .parse();

  const options = program.opts<FlowCliOptions & { privacy?: VimeoPrivacy }>();

  try {
    const config = await bootstrap(options);
    if (options.dryRun) {
      await planFlow('upload', config);
      await finish(0);
      return;
    }
    const report = await runFlow('upload', config);
    await finish(report.summary.failed);
  } catch (error) {
    await exitWithError('Upload run failed', error);
  }
}

if (require.main === module) {
  main().catch(error => exitWithError('Unhandled error', error));
}

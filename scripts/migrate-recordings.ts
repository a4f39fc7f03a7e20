#!/usr/bin/env tsx

import { Command } from 'commander';
import { VimeoPrivacy } from '../src/types/api-types';
import { requireFlowPrerequisites } from '../src/config/config-loader';
import { bootstrap, createRuntime, planFlow, runFlow } from '../src/core/flow-runner';
import { FlowCliOptions, exitWithError, finish, parsePositiveInt, parsePrivacy } from './cli-helpers';

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('migrate-recordings')
    .description('Download every recording in the worksheet from Zoom, then upload the files to Vimeo')
    .option('-w, --worksheet <file>', 'Worksheet CSV (defaults to WORKSHEET_PATH)')
    .option('-d, --download-dir <dir>', 'Directory recordings are saved to (defaults to DOWNLOAD_DIR)')
    .option('--logs-dir <dir>', 'Directory for success/failure/debug logs (defaults to LOGS_DIR)')
    .option('-c, --concurrency <number>', 'Transfers running at once in each stage', parsePositiveInt)
    .option('--privacy <view>', 'Vimeo privacy.view for new videos (defaults to VIMEO_PRIVACY)', parsePrivacy)
    .option('--dry-run', 'Show what each stage would do without calling any API')
    .option('--verbose', 'Enable verbose logging')
    .parse();

  const options = program.opts<FlowCliOptions & { privacy?: VimeoPrivacy }>();

  try {
    const config = await bootstrap(options);
    // Both stages need their credentials before anything is downloaded
    requireFlowPrerequisites(config, 'download');
    requireFlowPrerequisites(config, 'upload');

    const processor = createRuntime(config);
    if (options.dryRun) {
      await planFlow('download', config, processor);
      await planFlow('upload', config, processor);
      await finish(0);
      return;
    }

    const downloads = await runFlow('download', config, processor);
    const uploads = await runFlow('upload', config, processor);
    await finish(downloads.summary.failed + uploads.summary.failed);
  } catch (error) {
    await exitWithError('Migration failed', error);
  }
}

if (require.main === module) {
  main().catch(error => exitWithError('Unhandled error', error));
}

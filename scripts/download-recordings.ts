#!/usr/bin/env tsx

import { Command } from 'commander';
import { bootstrap, planFlow, runFlow } from '../src/core/flow-runner';
import { FlowCliOptions, exitWithError, finish, parsePositiveInt } from './cli-helpers';

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('download-recordings')
    .description('Download Zoom cloud recordings listed in the worksheet, trying each configured account in turn')
    .option('-w, --worksheet <file>', 'Worksheet CSV (defaults to WORKSHEET_PATH)')
    .option('-d, --download-dir <dir>', 'Directory recordings are saved to (defaults to DOWNLOAD_DIR)')
    .option('--logs-dir <dir>', 'Directory for success/failure/debug logs (defaults to LOGS_DIR)')
    .option('-c, --concurrency <number>', 'Downloads running at once', parsePositiveInt)
    .option('--dry-run', 'Show which meetings would be downloaded without calling any API')
    .option('--verbose', 'Enable verbose logging')
    .parse();

  const options = program.opts<FlowCliOptions>();

  try {
    const config = await bootstrap(options);
    if (options.dryRun) {
      await planFlow('download', config);
      await finish(0);
      return;
    }
    const report = await runFlow('download', config);
    await finish(report.summary.failed);
  } catch (error) {
    await exitWithError('Download run failed', error);
  }
}

if (require.main === module) {
  main().catch(error => exitWithError('Unhandled error', error));
}

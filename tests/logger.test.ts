import { describe, it, expect, beforeEach } from 'vitest';
import * as fs from 'fs-extra';
import { LogEntry, LogLevel, LogSink, Logger, initializeLogger } from '../src/utils/logger';
import { makeTempDir } from './helpers/fake-http';

async function readLines(file: string): Promise<string[]> {
  if (!await fs.pathExists(file)) return [];
  return (await fs.readFile(file, 'utf-8')).split('\n').filter(line => line !== '');
}

describe('Logger', () => {
  let logsDir: string;

  beforeEach(async () => {
    logsDir = await makeTempDir('recording-migrator-logs-');
  });

  function createLogger(level: LogLevel = LogLevel.INFO, verbose: boolean = false): Logger {
    return initializeLogger({ verbose, logLevel: level, logsDir, quiet: true });
  }

  it('routes entries to the success and failure logs', async () => {
    const logger = createLogger();

    logger.success('Meeting ID 1: downloaded');
    logger.warning('Meeting ID 2: not found on Account_A');
    logger.error('Meeting ID 3: failed', new Error('boom'));
    logger.info('starting');

    const success = await readLines(logger.files.success);
    const failure = await readLines(logger.files.failure);

    expect(success).toHaveLength(1);
    expect(success[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[SUCCESS\] Meeting ID 1: downloaded$/);
    expect(failure[0]).toMatch(/\[WARNING\] Meeting ID 2: not found on Account_A$/);
    expect(failure[1]).toMatch(/\[ERROR\] Meeting ID 3: failed: boom$/);
    expect(failure[2]).toBe('Error: boom');
    expect(await fs.pathExists(logger.files.debug)).toBe(false);
  });

  it('writes every entry to the debug log when verbose', async () => {
    const logger = createLogger(LogLevel.VERBOSE, true);

    logger.info('starting');
    logger.verbose('details');
    logger.success('done');

    const debug = await readLines(logger.files.debug);
    expect(debug.map(line => line.replace(/^\[[^\]]+\] /, ''))).toEqual([
      '[INFO] starting',
      '[VERBOSE] details',
      '[SUCCESS] done'
    ]);
  });

  it('drops entries below the configured level', async () => {
    const logger = createLogger(LogLevel.ERROR);

    logger.success('hidden');
    logger.error('shown');

    expect(await readLines(logger.files.success)).toEqual([]);
    expect(await readLines(logger.files.failure)).toHaveLength(1);
  });

  it('forwards entries to extra sinks and survives sink failures', async () => {
    const logger = createLogger();
    const received: LogEntry[] = [];
    const collecting: LogSink = {
      name: 'collecting',
      write: async entry => {
        received.push(entry);
      }
    };
    const broken: LogSink = {
      name: 'broken',
      write: async () => {
        throw new Error('quota exceeded');
      }
    };
    logger.addSink(broken);
    logger.addSink(collecting);

    logger.success('uploaded');
    logger.warning('no folder');
    await logger.flush();

    expect(received.map(entry => [entry.kind, entry.message])).toEqual([
      ['SUCCESS', 'uploaded'],
      ['WARNING', 'no folder']
    ]);
  });
});

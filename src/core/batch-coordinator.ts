import pLimit from 'p-limit';
import { RunOutcome, RunResult, WorkItem } from '../types/work-types';
import { errorMessage, toError } from '../utils/errors';
import { getLogger } from '../utils/logger';

export const DEFAULT_CONCURRENCY = {
  download: 5,
  upload: 3
} as const;

export interface RunAllOptions {
  concurrency: number;
  onProgress?: ((completed: number, total: number, result: RunResult) => void) | undefined;
}

export type ItemHandler = (item: WorkItem) => Promise<RunResult>;

export type RunSummary = Record<RunOutcome, number> & { total: number };

/**
 * Run every item through `handler` with at most `concurrency` in flight.
 * Results come back in input order; a handler that throws yields a failed
 * result for its item and leaves the others untouched.
 */
export async function runAll(items: WorkItem[], handler: ItemHandler, options: RunAllOptions): Promise<RunResult[]> {
  const limit = pLimit(Math.max(1, options.concurrency));
  let completed = 0;

  const guarded = async (item: WorkItem): Promise<RunResult> => {
    let result: RunResult;
    try {
      result = await handler(item);
    } catch (error) {
      getLogger().error(`Meeting ID ${item.id}: unhandled exception`, toError(error));
      result = { id: item.id, outcome: 'failed', message: `Unhandled exception: ${errorMessage(error)}` };
    }
    completed++;
    options.onProgress?.(completed, items.length, result);
    return result;
  };

  return Promise.all(items.map(item => limit(() => guarded(item))));
}

export function summarize(results: RunResult[]): RunSummary {
  const summary: RunSummary = {
    total: results.length,
    downloaded: 0,
    uploaded: 0,
    partial: 0,
    skipped: 0,
    failed: 0
  };
  for (const result of results) {
    summary[result.outcome]++;
  }
  return summary;
}

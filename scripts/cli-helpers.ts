import { InvalidArgumentError } from 'commander';
import { VimeoPrivacy } from '../src/types/api-types';
import { PreconditionError, toError } from '../src/utils/errors';
import { Logger, getLogger } from '../src/utils/logger';

const PRIVACY_VALUES: readonly VimeoPrivacy[] = ['anybody', 'nobody', 'unlisted', 'password', 'disable'];

export interface FlowCliOptions {
  worksheet?: string;
  downloadDir?: string;
  logsDir?: string;
  concurrency?: number;
  verbose?: boolean;
  dryRun?: boolean;
}

export function parsePositiveInt(value: string): number {
  if (!/^[1-9]\d*$/.test(value)) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parseInt(value, 10);
}

export function parsePrivacy(value: string): VimeoPrivacy {
  const match = PRIVACY_VALUES.find(privacy => privacy === value);
  if (!match) {
    throw new InvalidArgumentError(`Must be one of: ${PRIVACY_VALUES.join(', ')}.`);
  }
  return match;
}

function currentLogger(): Logger | null {
  try {
    return getLogger();
  } catch {
    return null;
  }
}

/**
 * Report a fatal error once and exit. Configuration problems can happen
 * before the logger exists, so they fall back to the console.
 */
export async function exitWithError(context: string, error: unknown): Promise<never> {
  const logger = currentLogger();
  const cause = toError(error);
  const message = error instanceof PreconditionError ? cause.message : `${context}: ${cause.message}`;

  if (logger) {
    logger.error(message, error instanceof PreconditionError ? undefined : cause);
    await logger.flush();
  } else {
    console.error(message);
  }
  process.exit(1);
}

/**
 * Wait for pending log sink writes, then exit with 1 when any item failed
 */
export async function finish(failed: number): Promise<void> {
  await getLogger().flush();
  if (failed > 0) {
    process.exit(1);
  }
}

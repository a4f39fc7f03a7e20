import { ZodError } from 'zod';
import {
  AccessToken,
  LocateResult,
  LookupResult,
  WorkItem
} from '../types/work-types';
import { ZoomRecordingFile } from '../types/api-types';
import { HttpStatusError, errorMessage } from '../utils/errors';
import { getLogger, logVerbose } from '../utils/logger';
import { CredentialPool } from './credential-pool';

export interface RecordingLookup {
  listRecordingFiles(meetingId: string, token: AccessToken): Promise<ZoomRecordingFile[]>;
}

/**
 * Pick the download URL of a meeting: the MP4 video when present, otherwise
 * the first file that can be downloaded at all.
 */
export function selectRecordingFile(files: ZoomRecordingFile[]): string | null {
  const preferred = files.find(file => file.file_type === 'MP4' && file.file_extension === 'MP4' && file.download_url);
  if (preferred?.download_url) {
    return preferred.download_url;
  }
  const fallback = files.find(file => file.download_url);
  return fallback?.download_url ?? null;
}

/**
 * Query one account for a meeting's download URL, classifying every failure
 */
export async function lookupRecording(
  source: RecordingLookup,
  meetingId: string,
  token: AccessToken
): Promise<LookupResult<string>> {
  try {
    const files = await source.listRecordingFiles(meetingId, token);
    const url = selectRecordingFile(files);
    if (!url) {
      return { success: false, reason: 'not_found', error: 'no downloadable recording file' };
    }
    return { success: true, value: url };
  } catch (error) {
    if (error instanceof HttpStatusError) {
      if (error.status === 401) {
        return { success: false, reason: 'unauthorized', error: error.message };
      }
      if (error.status === 404) {
        return { success: false, reason: 'not_found', error: error.message };
      }
      return { success: false, reason: 'http_error', error: error.message };
    }
    if (error instanceof ZodError) {
      return { success: false, reason: 'invalid_response', error: `unexpected recordings payload: ${error.message}` };
    }
    return { success: false, reason: 'network_error', error: errorMessage(error) };
  }
}

export class AssetLocator {
  private source: RecordingLookup;

  constructor(source: RecordingLookup) {
    this.source = source;
  }

  /**
   * Probe the pool in order until one account returns a downloadable file.
   * A miss on one account says nothing about the others, so every failure
   * moves on to the next account and no account is asked twice.
   */
  async locate(item: WorkItem, pool: CredentialPool): Promise<LocateResult> {
    const logger = getLogger();
    let attempts = 0;

    for (const account of pool) {
      attempts++;
      const tokenResult = await pool.tokenFor(account);
      if (!tokenResult.success) {
        logger.warning(`${tokenResult.error} (Meeting ID ${item.id})`);
        continue;
      }

      const lookup = await lookupRecording(this.source, item.id, tokenResult.token);
      if (lookup.success) {
        logVerbose(`Meeting ID ${item.id} found on account '${account.name}'`);
        return { found: true, url: lookup.value, accountUsed: account.name, token: tokenResult.token };
      }

      switch (lookup.reason) {
        case 'not_found':
          logger.warning(`Meeting ID ${item.id} not found or no recordings for account '${account.name}': ${lookup.error}`);
          break;
        case 'unauthorized':
          logger.warning(`Unauthorized access for Meeting ID ${item.id} using account '${account.name}'. Access token might be expired or invalid: ${lookup.error}`);
          break;
        default:
          logger.error(`Lookup error for Meeting ID ${item.id} with account '${account.name}' (${lookup.reason}): ${lookup.error}`);
      }
    }

    return { found: false, attempts };
  }
}

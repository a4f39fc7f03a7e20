import * as fs from 'fs-extra';
import { Flow, ItemPlan, RunResult, WorkItem } from '../types/work-types';
import { VimeoPrivacy } from '../types/api-types';
import { getLogger } from '../utils/logger';
import { CredentialPool } from './credential-pool';
import { AssetLocator } from './asset-locator';
import { TransferEngine } from './transfer-engine';
import { describeDestination, resolve } from './uri-resolver';

export interface PublishOptions {
  vimeoToken: string | null;
  privacy: VimeoPrivacy;
}

/**
 * Drives one work item through its flow and always returns a single result.
 * Nothing here retries: a failed item is picked up again on the next run.
 */
export class WorkItemProcessor {
  private pool: CredentialPool;
  private locator: AssetLocator;
  private engine: TransferEngine;
  private publishOptions: PublishOptions;

  constructor(pool: CredentialPool, locator: AssetLocator, engine: TransferEngine, publishOptions: PublishOptions) {
    this.pool = pool;
    this.locator = locator;
    this.engine = engine;
    this.publishOptions = publishOptions;
  }

  /**
   * What `process` would do, decided from local state only
   */
  async plan(item: WorkItem, flow: Flow): Promise<ItemPlan> {
    if (flow === 'upload' && item.status === 'done') {
      return 'skip';
    }
    const exists = await fs.pathExists(item.localPath);
    if (flow === 'download') {
      return exists ? 'skip' : 'process';
    }
    return exists ? 'process' : 'missing-file';
  }

  async process(item: WorkItem, flow: Flow): Promise<RunResult> {
    return flow === 'download' ? this.download(item) : this.publish(item);
  }

  async download(item: WorkItem): Promise<RunResult> {
    const logger = getLogger();

    if (await this.plan(item, 'download') === 'skip') {
      const message = `File '${item.desiredName}' already exists, skipping download`;
      logger.success(`Meeting ID ${item.id}: ${message}`);
      return { id: item.id, outcome: 'skipped', message };
    }

    const located = await this.locator.locate(item, this.pool);
    if (!located.found) {
      const message = `Recording not found in any of ${located.attempts} configured account(s)`;
      logger.error(`Meeting ID ${item.id}: ${message}`);
      return { id: item.id, outcome: 'failed', message };
    }

    const transfer = await this.engine.fetch(located.url, located.token, item.localPath);
    if (!transfer.success) {
      const message = `Download failed using account '${located.accountUsed}': ${transfer.error}`;
      logger.error(`Meeting ID ${item.id}: ${message}`);
      return { id: item.id, outcome: 'failed', message, accountUsed: located.accountUsed };
    }

    const message = `Downloaded '${item.desiredName}' (${transfer.bytes} bytes) using account '${located.accountUsed}'`;
    logger.success(`Meeting ID ${item.id}: ${message}`);
    return { id: item.id, outcome: 'downloaded', message, accountUsed: located.accountUsed };
  }

  async publish(item: WorkItem): Promise<RunResult> {
    const logger = getLogger();

    const plan = await this.plan(item, 'upload');
    if (plan === 'skip') {
      const message = `'${item.desiredName}' already uploaded, skipping`;
      logger.success(`Meeting ID ${item.id}: ${message}`);
      if (!await fs.pathExists(item.localPath)) {
        logger.warning(`Meeting ID ${item.id}: marked uploaded but local file ${item.localPath} no longer exists`);
      }
      return { id: item.id, outcome: 'skipped', message };
    }
    if (plan === 'missing-file') {
      const message = `local file not found: ${item.localPath}`;
      logger.error(`Meeting ID ${item.id}: ${message}`);
      return { id: item.id, outcome: 'failed', message };
    }

    const token = this.publishOptions.vimeoToken;
    if (!token) {
      const message = 'VIMEO_ACCESS_TOKEN is not configured';
      logger.error(`Meeting ID ${item.id}: ${message}`);
      return { id: item.id, outcome: 'failed', message };
    }

    const descriptor = resolve(item.destinationRef);
    if (!descriptor && item.destinationRef) {
      logger.warning(`Meeting ID ${item.id}: could not resolve a folder from '${item.destinationRef}', uploading to the account root`);
    }

    const uploaded = await this.engine.push(item.localPath, token, {
      name: item.desiredName,
      privacy: this.publishOptions.privacy
    });
    if (!uploaded.success) {
      logger.error(`Meeting ID ${item.id}: ${uploaded.error}`);
      return { id: item.id, outcome: 'failed', message: uploaded.error };
    }

    if (!descriptor) {
      const message = `Uploaded '${item.desiredName}' as ${uploaded.uri} (no folder)`;
      logger.success(`Meeting ID ${item.id}: ${message}`);
      return { id: item.id, outcome: 'uploaded', message, resolvedRef: uploaded.uri };
    }

    const assigned = await this.engine.assignToContainer(uploaded.videoId, descriptor, token);
    if (!assigned.success) {
      const message = `uploaded, folder assignment failed: ${assigned.error}`;
      logger.warning(`Meeting ID ${item.id}: ${message} (video ${uploaded.uri})`);
      return { id: item.id, outcome: 'partial', message, resolvedRef: uploaded.uri };
    }

    const message = `Uploaded '${item.desiredName}' as ${uploaded.uri} into ${describeDestination(descriptor)}`;
    logger.success(`Meeting ID ${item.id}: ${message}`);
    return { id: item.id, outcome: 'uploaded', message, resolvedRef: uploaded.uri };
  }
}

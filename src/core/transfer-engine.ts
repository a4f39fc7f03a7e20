import * as fs from 'fs-extra';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  AccessToken,
  AssignResult,
  DestinationDescriptor,
  TransferResult,
  UploadResult
} from '../types/work-types';
import { VideoMetadata, VimeoUploadTicket } from '../types/api-types';
import { errorMessage } from '../utils/errors';
import { getLogger, logVerbose } from '../utils/logger';
import { parseVideoId } from './uri-resolver';

// Write buffer for downloads and read buffer for uploads
export const TRANSFER_CHUNK_SIZE = 64 * 1024;
export const PARTIAL_SUFFIX = '.part';

export interface DownloadSource {
  openDownloadStream(url: string, token: AccessToken): Promise<Readable>;
}

export interface VideoHost {
  createUpload(token: AccessToken, size: number, metadata: VideoMetadata): Promise<VimeoUploadTicket>;
  sendUpload(uploadLink: string, body: Readable, size: number): Promise<number>;
  placeVideo(apiPath: string, token: AccessToken): Promise<number>;
}

/**
 * API path that files a video into a folder or album. An explicit user or team
 * scope is used when the worksheet reference named one, the token owner otherwise.
 */
export function containerPlacementPath(descriptor: DestinationDescriptor, videoId: string): string {
  const { containerId, ownerScope } = descriptor;
  const container = `${descriptor.containerKind === 'album' ? 'albums' : 'projects'}/${containerId}/videos/${videoId}`;
  switch (ownerScope.kind) {
    case 'user':
      return `/users/${ownerScope.id}/${container}`;
    case 'team':
      return `/teams/${ownerScope.id}/${container}`;
    case 'none':
      return `/me/${container}`;
  }
}

export class TransferEngine {
  private source: DownloadSource;
  private host: VideoHost;
  private chunkSize: number;

  constructor(source: DownloadSource, host: VideoHost, chunkSize: number = TRANSFER_CHUNK_SIZE) {
    this.source = source;
    this.host = host;
    this.chunkSize = chunkSize;
  }

  /**
   * Stream a download to `destinationPath`. Bytes land in a ".part" sibling
   * that is renamed only once the body is complete, so the final path never
   * holds a truncated file.
   */
  async fetch(url: string, token: AccessToken, destinationPath: string): Promise<TransferResult> {
    const partPath = `${destinationPath}${PARTIAL_SUFFIX}`;

    try {
      await fs.ensureDir(path.dirname(destinationPath));
      const body = await this.source.openDownloadStream(url, token);
      const writer = fs.createWriteStream(partPath, { highWaterMark: this.chunkSize });
      await pipeline(body, writer);

      const { size } = await fs.stat(partPath);
      await fs.move(partPath, destinationPath, { overwrite: true });
      logVerbose(`Saved ${size} bytes to '${destinationPath}'`);
      return { success: true, bytes: size };
    } catch (error) {
      await this.discardPartial(partPath);
      return { success: false, error: errorMessage(error) };
    }
  }

  private async discardPartial(partPath: string): Promise<void> {
    try {
      await fs.remove(partPath);
    } catch (removeError) {
      getLogger().warning(`Could not remove partial download '${partPath}': ${errorMessage(removeError)}`);
    }
  }

  /**
   * Upload a local file with the tus approach and return the created video
   */
  async push(filePath: string, token: AccessToken, metadata: VideoMetadata): Promise<UploadResult> {
    try {
      const { size } = await fs.stat(filePath);
      const ticket = await this.host.createUpload(token, size, metadata);
      const videoId = parseVideoId(ticket.uri);
      if (!videoId) {
        return { success: false, error: `Upload returned an unrecognised video URI: ${ticket.uri}` };
      }

      const body = fs.createReadStream(filePath, { highWaterMark: this.chunkSize });
      let offset: number;
      try {
        offset = await this.host.sendUpload(ticket.upload.upload_link, body, size);
      } finally {
        body.destroy();
      }

      if (offset !== size) {
        return { success: false, error: `Upload incomplete: server acknowledged ${offset} of ${size} bytes for ${ticket.uri}` };
      }
      return { success: true, uri: ticket.uri, videoId };
    } catch (error) {
      return { success: false, error: `Vimeo upload failed: ${errorMessage(error)}` };
    }
  }

  /**
   * File an uploaded video into a folder. Only a 204 counts as placed.
   */
  async assignToContainer(videoId: string, descriptor: DestinationDescriptor, token: AccessToken): Promise<AssignResult> {
    const apiPath = containerPlacementPath(descriptor, videoId);
    try {
      const status = await this.host.placeVideo(apiPath, token);
      if (status === 204) {
        return { success: true };
      }
      return { success: false, status, error: `PUT ${apiPath} returned status ${status}` };
    } catch (error) {
      return { success: false, error: `PUT ${apiPath} failed: ${errorMessage(error)}` };
    }
  }
}

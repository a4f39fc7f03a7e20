import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { AccessToken } from '../types/work-types';
import {
  VideoMetadata,
  VimeoNamedResource,
  VimeoPageSchema,
  VimeoTokenInfo,
  VimeoTokenInfoSchema,
  VimeoUploadTicket,
  VimeoUploadTicketSchema,
  VimeoUser,
  VimeoUserSchema
} from '../types/api-types';
import { HttpStatusError, errorMessage } from '../utils/errors';
import { logVerbose } from '../utils/logger';

export interface VimeoClientOptions {
  apiBaseUrl: string;
  timeoutMs: number;
}

export const DEFAULT_VIMEO_OPTIONS: VimeoClientOptions = {
  apiBaseUrl: 'https://api.vimeo.com',
  timeoutMs: 60000
};

const VIMEO_ACCEPT = 'application/vnd.vimeo.*+json;version=3.4';
const TUS_VERSION = '1.0.0';
const PAGE_SIZE = 100;

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class VimeoClient {
  private http: AxiosInstance;
  private options: VimeoClientOptions;

  constructor(http: AxiosInstance = axios.create(), options: VimeoClientOptions = DEFAULT_VIMEO_OPTIONS) {
    this.http = http;
    this.options = options;
  }

  private url(apiPath: string): string {
    return `${this.options.apiBaseUrl}${apiPath.startsWith('/') ? '' : '/'}${apiPath}`;
  }

  private headers(token: AccessToken): Record<string, string> {
    return {
      Authorization: `bearer ${token}`,
      Accept: VIMEO_ACCEPT
    };
  }

  private async executeApiCall<T>(operation: string, apiCall: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    logVerbose(`Executing ${operation}`);
    try {
      const result = await apiCall();
      logVerbose(`${operation} completed in ${Date.now() - startedAt}ms`);
      return result;
    } catch (error) {
      logVerbose(`${operation} failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async getJson(apiPath: string, token: AccessToken, operation: string): Promise<unknown> {
    const response = await this.http.get<unknown>(this.url(apiPath), {
      headers: this.headers(token),
      timeout: this.options.timeoutMs,
      validateStatus: () => true
    });
    if (!isSuccess(response.status)) {
      throw new HttpStatusError(operation, response.status, response.data);
    }
    return response.data;
  }

  /**
   * Create a video resource and a tus upload ticket for a file of `size` bytes
   */
  async createUpload(token: AccessToken, size: number, metadata: VideoMetadata): Promise<VimeoUploadTicket> {
    return this.executeApiCall(`upload creation (${metadata.name})`, async () => {
      const response = await this.http.post<unknown>(this.url('/me/videos'), {
        upload: { approach: 'tus', size: String(size) },
        name: metadata.name,
        privacy: { view: metadata.privacy }
      }, {
        headers: { ...this.headers(token), 'Content-Type': 'application/json' },
        timeout: this.options.timeoutMs,
        validateStatus: () => true
      });

      if (!isSuccess(response.status)) {
        throw new HttpStatusError('Upload creation', response.status, response.data);
      }
      return VimeoUploadTicketSchema.parse(response.data);
    });
  }

  /**
   * Stream the file body to a tus upload link; resolves with the offset the server acknowledged
   */
  async sendUpload(uploadLink: string, body: Readable, size: number): Promise<number> {
    return this.executeApiCall('upload transfer', async () => {
      const response = await this.http.patch<unknown>(uploadLink, body, {
        headers: {
          'Tus-Resumable': TUS_VERSION,
          'Upload-Offset': '0',
          'Content-Type': 'application/offset+octet-stream',
          'Content-Length': String(size),
          Accept: VIMEO_ACCEPT
        },
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        timeout: this.options.timeoutMs,
        validateStatus: () => true
      });

      if (!isSuccess(response.status)) {
        throw new HttpStatusError('Upload transfer', response.status, response.data);
      }

      const offset = Number(response.headers['upload-offset']);
      if (!Number.isFinite(offset)) {
        throw new Error('Upload transfer response carried no Upload-Offset header');
      }
      return offset;
    });
  }

  /**
   * PUT a video into a folder; returns the raw status (204 means placed)
   */
  async placeVideo(apiPath: string, token: AccessToken): Promise<number> {
    return this.executeApiCall(`folder placement (${apiPath})`, async () => {
      const response = await this.http.put<unknown>(this.url(apiPath), undefined, {
        headers: this.headers(token),
        timeout: this.options.timeoutMs,
        validateStatus: () => true
      });
      if (response.status !== 204) {
        logVerbose(`Folder placement returned ${response.status}: ${JSON.stringify(response.data ?? '')}`);
      }
      return response.status;
    });
  }

  async verifyToken(token: AccessToken): Promise<VimeoTokenInfo> {
    return this.executeApiCall('token verification', async () =>
      VimeoTokenInfoSchema.parse(await this.getJson('/oauth/verify', token, 'Token verification'))
    );
  }

  async getCurrentUser(token: AccessToken): Promise<VimeoUser> {
    return this.executeApiCall('current user lookup', async () =>
      VimeoUserSchema.parse(await this.getJson('/me', token, 'Current user lookup'))
    );
  }

  async listTeams(token: AccessToken): Promise<VimeoNamedResource[]> {
    return this.getAllPages('/me/teams', token, 'Team listing');
  }

  async listTeamFolders(teamId: string, token: AccessToken): Promise<VimeoNamedResource[]> {
    return this.getAllPages(`/teams/${teamId}/projects`, token, `Folder listing for team ${teamId}`);
  }

  async listPersonalFolders(token: AccessToken): Promise<VimeoNamedResource[]> {
    return this.getAllPages('/me/projects', token, 'Personal folder listing');
  }

  async listAlbums(token: AccessToken): Promise<VimeoNamedResource[]> {
    return this.getAllPages('/me/albums', token, 'Album listing');
  }

  /**
   * Follow page/per_page paging until the response has no next page
   */
  private async getAllPages(apiPath: string, token: AccessToken, operation: string): Promise<VimeoNamedResource[]> {
    return this.executeApiCall(operation, async () => {
      const items: VimeoNamedResource[] = [];
      for (let page = 1; ; page++) {
        const separator = apiPath.includes('?') ? '&' : '?';
        const raw = await this.getJson(`${apiPath}${separator}page=${page}&per_page=${PAGE_SIZE}`, token, operation);
        const parsed = VimeoPageSchema.parse(raw);
        items.push(...parsed.data);
        if (!parsed.paging?.next) {
          return items;
        }
      }
    });
  }
}

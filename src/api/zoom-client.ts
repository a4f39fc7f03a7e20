import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { AccessToken, AccountCredential } from '../types/work-types';
import {
  ZoomRecordingFile,
  ZoomRecordingsResponseSchema,
  ZoomTokenResponseSchema
} from '../types/api-types';
import { HttpStatusError, errorMessage } from '../utils/errors';
import { logVerbose } from '../utils/logger';

export interface ZoomClientOptions {
  oauthUrl: string;
  apiBaseUrl: string;
  timeoutMs: number;
}

export const DEFAULT_ZOOM_OPTIONS: ZoomClientOptions = {
  oauthUrl: 'https://zoom.us/oauth/token',
  apiBaseUrl: 'https://api.zoom.us/v2',
  timeoutMs: 60000
};

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Meeting UUIDs that start with "/" or contain "//" must be encoded twice
 */
export function encodeMeetingId(meetingId: string): string {
  const once = encodeURIComponent(meetingId);
  return meetingId.startsWith('/') || meetingId.includes('//') ? encodeURIComponent(once) : once;
}

/**
 * Thin wrapper over the Zoom REST API: server-to-server token exchange,
 * recording lookup and authenticated streaming download. Unexpected statuses
 * surface as HttpStatusError; classifying them is left to the caller.
 */
export class ZoomClient {
  private http: AxiosInstance;
  private options: ZoomClientOptions;

  constructor(http: AxiosInstance = axios.create(), options: ZoomClientOptions = DEFAULT_ZOOM_OPTIONS) {
    this.http = http;
    this.options = options;
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

  /**
   * Exchange an account's client id/secret for a short-lived bearer token
   */
  async requestAccessToken(credential: AccountCredential): Promise<AccessToken> {
    return this.executeApiCall(`token exchange (${credential.name})`, async () => {
      const basic = Buffer.from(`${credential.clientId}:${credential.clientSecret}`, 'utf-8').toString('base64');
      const body = new URLSearchParams({
        grant_type: 'account_credentials',
        account_id: credential.accountId
      });

      const response = await this.http.post<unknown>(this.options.oauthUrl, body.toString(), {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: `Basic ${basic}`
        },
        timeout: this.options.timeoutMs,
        validateStatus: () => true
      });

      if (!isSuccess(response.status)) {
        throw new HttpStatusError('Token exchange', response.status, response.data);
      }

      const parsed = ZoomTokenResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new Error('Token exchange response did not contain an access_token');
      }
      return parsed.data.access_token;
    });
  }

  /**
   * List the recording files of one meeting
   */
  async listRecordingFiles(meetingId: string, token: AccessToken): Promise<ZoomRecordingFile[]> {
    return this.executeApiCall(`recordings lookup (${meetingId})`, async () => {
      const url = `${this.options.apiBaseUrl}/meetings/${encodeMeetingId(meetingId)}/recordings`;
      const response = await this.http.get<unknown>(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json'
        },
        timeout: this.options.timeoutMs,
        validateStatus: () => true
      });

      if (!isSuccess(response.status)) {
        throw new HttpStatusError('Recordings lookup', response.status, response.data);
      }

      return ZoomRecordingsResponseSchema.parse(response.data).recording_files ?? [];
    });
  }

  /**
   * Open the body of a recording download URL as a stream
   */
  async openDownloadStream(url: string, token: AccessToken): Promise<Readable> {
    return this.executeApiCall('recording download', async () => {
      const response = await this.http.get<Readable>(url, {
        headers: { Authorization: `Bearer ${token}` },
        responseType: 'stream',
        timeout: this.options.timeoutMs,
        validateStatus: () => true
      });

      if (!isSuccess(response.status)) {
        response.data.destroy();
        throw new HttpStatusError('Recording download', response.status, '');
      }
      return response.data;
    });
  }
}

import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import { AccountCredential, Flow } from '../types/work-types';
import { VimeoPrivacy } from '../types/api-types';
import { PreconditionError } from '../utils/errors';
import { logVerbose } from '../utils/logger';

// Letters A..Z: the credential pool never holds more than 26 accounts
export const MAX_ACCOUNTS = 26;

const positiveInt = (fallback: string) =>
  z.string()
    .regex(/^[1-9]\d*$/, 'must be a positive integer')
    .transform(val => parseInt(val, 10))
    .default(fallback);

// Environment variables schema
const EnvSchema = z.object({
  // Zoom (source provider)
  ZOOM_ACCOUNTS_FILE: z.string().optional(),
  ZOOM_OAUTH_URL: z.string().url('Invalid Zoom OAuth URL').default('https://zoom.us/oauth/token'),
  ZOOM_API_BASE_URL: z.string().url('Invalid Zoom API URL').default('https://api.zoom.us/v2'),

  // Vimeo (destination provider)
  VIMEO_ACCESS_TOKEN: z.string().optional(),
  VIMEO_API_BASE_URL: z.string().url('Invalid Vimeo API URL').default('https://api.vimeo.com'),
  VIMEO_PRIVACY: z.enum(['anybody', 'nobody', 'unlisted', 'password', 'disable']).default('anybody'),

  // Application Settings
  VERBOSE: z.string().transform(val => val === 'true').default('false'),
  LOG_LEVEL: z.enum(['error', 'info', 'verbose']).default('info'),

  // Concurrency and transport
  DOWNLOAD_CONCURRENCY: positiveInt('5'),
  UPLOAD_CONCURRENCY: positiveInt('3'),
  REQUEST_TIMEOUT_MS: positiveInt('60000'),

  // File Paths
  WORKSHEET_PATH: z.string().min(1).default('meetings.csv'),
  DOWNLOAD_DIR: z.string().min(1).default('zoom_downloads'),
  LOGS_DIR: z.string().min(1).default('logs/'),

  // Optional Google Sheets log sink
  GOOGLE_SHEETS_SPREADSHEET_ID: z.string().optional(),
  GOOGLE_SERVICE_ACCOUNT_FILE: z.string().default('service_account_credentials.json')
});

type Env = z.infer<typeof EnvSchema>;

const AccountFileSchema = z.array(z.object({
  name: z.string().min(1).optional(),
  accountId: z.string().min(1, 'accountId is required'),
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required')
})).max(MAX_ACCOUNTS, `At most ${MAX_ACCOUNTS} accounts are supported`);

// Configuration types
export interface AppConfig {
  zoom: {
    accounts: readonly AccountCredential[];
    oauthUrl: string;
    apiBaseUrl: string;
  };
  vimeo: {
    accessToken: string | null;
    apiBaseUrl: string;
    privacy: VimeoPrivacy;
  };
  app: {
    verbose: boolean;
    logLevel: 'error' | 'info' | 'verbose';
  };
  concurrency: {
    download: number;
    upload: number;
  };
  http: {
    timeoutMs: number;
  };
  paths: {
    worksheet: string;
    downloadDir: string;
    logsDir: string;
  };
  sheets: {
    spreadsheetId: string | null;
    serviceAccountFile: string;
  };
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function formatZodError(error: z.ZodError): string {
  return error.errors.map(err => `${err.path.join('.') || '(root)'}: ${err.message}`).join(', ');
}

/**
 * Read numbered credentials (ZOOM_ACCOUNT_A_*, ZOOM_ACCOUNT_B_*, ...) in letter
 * order, stopping at the first letter without a complete set.
 */
export function readAccountsFromEnv(env: NodeJS.ProcessEnv): AccountCredential[] {
  const accounts: AccountCredential[] = [];

  for (let i = 0; i < MAX_ACCOUNTS; i++) {
    const letter = String.fromCharCode(65 + i);
    const prefix = `ZOOM_ACCOUNT_${letter}`;
    const accountId = nonEmpty(env[`${prefix}_ACCOUNT_ID`]);
    const clientId = nonEmpty(env[`${prefix}_CLIENT_ID`]);
    // Older .env files spell the secret suffix in lower case
    const clientSecret = nonEmpty(env[`${prefix}_CLIENT_SECRET`] ?? env[`${prefix}_CLIENT_secret`]);

    if (!accountId || !clientId || !clientSecret) break;

    accounts.push(Object.freeze({
      name: `Account_${letter}`,
      accountId,
      clientId,
      clientSecret
    }));
  }

  return accounts;
}

export class ConfigLoader {
  private config: AppConfig | null = null;
  private env: NodeJS.ProcessEnv;
  private cwd: string;

  constructor(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()) {
    this.env = env;
    this.cwd = cwd;
  }

  /**
   * Load and validate all configuration
   */
  async loadConfig(): Promise<AppConfig> {
    if (this.config) {
      return this.config;
    }

    const env = await this.loadEnvironmentVariables();
    const accounts = await this.loadAccounts(env);

    this.config = {
      zoom: {
        accounts: Object.freeze(accounts),
        oauthUrl: env.ZOOM_OAUTH_URL,
        apiBaseUrl: env.ZOOM_API_BASE_URL
      },
      vimeo: {
        accessToken: nonEmpty(env.VIMEO_ACCESS_TOKEN),
        apiBaseUrl: env.VIMEO_API_BASE_URL,
        privacy: env.VIMEO_PRIVACY
      },
      app: {
        verbose: env.VERBOSE,
        logLevel: env.LOG_LEVEL
      },
      concurrency: {
        download: env.DOWNLOAD_CONCURRENCY,
        upload: env.UPLOAD_CONCURRENCY
      },
      http: {
        timeoutMs: env.REQUEST_TIMEOUT_MS
      },
      paths: {
        worksheet: env.WORKSHEET_PATH,
        downloadDir: env.DOWNLOAD_DIR,
        logsDir: env.LOGS_DIR
      },
      sheets: {
        spreadsheetId: nonEmpty(env.GOOGLE_SHEETS_SPREADSHEET_ID),
        serviceAccountFile: env.GOOGLE_SERVICE_ACCOUNT_FILE
      }
    };

    logVerbose(`Configuration loaded: ${accounts.length} Zoom account(s)`);
    return this.config;
  }

  /**
   * Load and validate environment variables
   */
  private async loadEnvironmentVariables(): Promise<Env> {
    // Load .env file if it exists
    const envPath = path.resolve(this.cwd, '.env');
    if (await fs.pathExists(envPath)) {
      // Values already present in the environment win over the file
      const fileValues = dotenv.parse(await fs.readFile(envPath));
      for (const [key, value] of Object.entries(fileValues)) {
        if (this.env[key] === undefined) {
          this.env[key] = value;
        }
      }
    }

    const parsed = EnvSchema.safeParse(this.env);
    if (!parsed.success) {
      throw new PreconditionError(`Missing or invalid environment variables: ${formatZodError(parsed.error)}`);
    }
    return parsed.data;
  }

  /**
   * Load the ordered account list from ZOOM_ACCOUNTS_FILE, or from numbered variables
   */
  private async loadAccounts(env: Env): Promise<AccountCredential[]> {
    const accountsFile = nonEmpty(env.ZOOM_ACCOUNTS_FILE);
    if (!accountsFile) {
      return readAccountsFromEnv(this.env);
    }

    const filePath = path.resolve(this.cwd, accountsFile);
    if (!await fs.pathExists(filePath)) {
      throw new PreconditionError(`Zoom accounts file not found: ${filePath}`);
    }

    const raw: unknown = await fs.readJson(filePath);
    const parsed = AccountFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PreconditionError(`Invalid Zoom accounts file: ${formatZodError(parsed.error)}`);
    }

    return parsed.data.map((entry, index) => Object.freeze({
      name: entry.name ?? `Account_${String.fromCharCode(65 + index)}`,
      accountId: entry.accountId,
      clientId: entry.clientId,
      clientSecret: entry.clientSecret
    }));
  }

  /**
   * Get current configuration
   */
  getConfig(): AppConfig | null {
    return this.config;
  }
}

/**
 * Fail before any work starts when a flow lacks its credentials
 */
export function requireFlowPrerequisites(config: AppConfig, flow: Flow): void {
  if (flow === 'download' && config.zoom.accounts.length === 0) {
    throw new PreconditionError(
      'No Zoom account credentials found. Set ZOOM_ACCOUNT_A_ACCOUNT_ID, ZOOM_ACCOUNT_A_CLIENT_ID and ' +
      'ZOOM_ACCOUNT_A_CLIENT_SECRET (then _B_, _C_, ...) or point ZOOM_ACCOUNTS_FILE at a JSON list.'
    );
  }
  if (flow === 'upload' && !config.vimeo.accessToken) {
    throw new PreconditionError('Vimeo access token not found. Please set VIMEO_ACCESS_TOKEN.');
  }
}

// Convenience function to load configuration
export async function loadConfig(): Promise<AppConfig> {
  const loader = new ConfigLoader();
  return await loader.loadConfig();
}

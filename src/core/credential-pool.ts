import { AccessToken, AccountCredential, TokenResult } from '../types/work-types';
import { errorMessage } from '../utils/errors';
import { logVerbose } from '../utils/logger';

export interface TokenIssuer {
  requestAccessToken(credential: AccountCredential): Promise<AccessToken>;
}

/**
 * Ordered, read-only set of source accounts. Iteration always follows the
 * configured order; tokens are requested fresh on every call and never kept.
 */
export class CredentialPool implements Iterable<AccountCredential> {
  private readonly accounts: readonly AccountCredential[];
  private readonly issuer: TokenIssuer;

  constructor(accounts: readonly AccountCredential[], issuer: TokenIssuer) {
    this.accounts = Object.freeze([...accounts]);
    this.issuer = issuer;
  }

  get size(): number {
    return this.accounts.length;
  }

  get names(): string[] {
    return this.accounts.map(account => account.name);
  }

  [Symbol.iterator](): Iterator<AccountCredential> {
    return this.accounts[Symbol.iterator]();
  }

  /**
   * Request a bearer token for one account. Never rejects: failures come back
   * as `{ success: false }` and the caller moves on.
   */
  async tokenFor(credential: AccountCredential): Promise<TokenResult> {
    try {
      const token = await this.issuer.requestAccessToken(credential);
      logVerbose(`Obtained access token for account '${credential.name}'`);
      return { success: true, token };
    } catch (error) {
      return {
        success: false,
        error: `Failed to get access token for account '${credential.name}': ${errorMessage(error)}`
      };
    }
  }
}

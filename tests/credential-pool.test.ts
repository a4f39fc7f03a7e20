import { describe, it, expect, beforeAll, vi } from 'vitest';
import { CredentialPool, TokenIssuer } from '../src/core/credential-pool';
import { AccountCredential } from '../src/types/work-types';
import { initTestLogger } from './helpers/fake-http';

function account(letter: string): AccountCredential {
  return {
    name: `Account_${letter}`,
    accountId: `account-${letter}`,
    clientId: `client-${letter}`,
    clientSecret: 'test-secret'
  };
}

describe('CredentialPool', () => {
  beforeAll(async () => {
    await initTestLogger();
  });

  it('iterates accounts in configured order', () => {
    const issuer: TokenIssuer = { requestAccessToken: vi.fn() };
    const pool = new CredentialPool([account('A'), account('B'), account('C')], issuer);

    expect(pool.size).toBe(3);
    expect(pool.names).toEqual(['Account_A', 'Account_B', 'Account_C']);
    expect([...pool].map(entry => entry.accountId)).toEqual(['account-A', 'account-B', 'account-C']);
  });

  it('is not affected by later changes to the source array', () => {
    const source = [account('A')];
    const pool = new CredentialPool(source, { requestAccessToken: vi.fn() });
    source.push(account('B'));

    expect(pool.size).toBe(1);
  });

  it('returns a token on success', async () => {
    const issuer: TokenIssuer = { requestAccessToken: vi.fn(async () => 'test-token') };
    const pool = new CredentialPool([account('A')], issuer);

    await expect(pool.tokenFor(account('A'))).resolves.toEqual({ success: true, token: 'test-token' });
  });

  it('turns issuer errors into a failure result', async () => {
    const issuer: TokenIssuer = {
      requestAccessToken: vi.fn(async () => {
        throw new Error('invalid_client');
      })
    };
    const pool = new CredentialPool([account('B')], issuer);

    await expect(pool.tokenFor(account('B'))).resolves.toEqual({
      success: false,
      error: "Failed to get access token for account 'Account_B': invalid_client"
    });
  });

  it('requests a fresh token on every call', async () => {
    const requestAccessToken = vi.fn(async () => 'test-token');
    const pool = new CredentialPool([account('A')], { requestAccessToken });

    await pool.tokenFor(account('A'));
    await pool.tokenFor(account('A'));

    expect(requestAccessToken).toHaveBeenCalledTimes(2);
  });
});

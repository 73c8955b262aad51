/**
 * Unit tests for Google OAuth helpers and error mapping.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  getAuthenticatedClient,
  getErrorStatus,
  isAuthFailure,
  isRetryableError,
  readClientSecrets,
  toProviderError,
} from '../../../src/domains/google-core/providers/auth.js';
import { extractAuthorizationCode, runConsentFlow } from '../../../src/domains/google-core/providers/consent.js';
import { AuthError, ConfigurationError, TransientProviderError } from '../../../src/utils/errors.js';
import { createTestLogger } from '../../helpers/logger.js';

const SECRETS = {
  installed: {
    client_id: 'test-client-id',
    client_secret: 'test-secret',
    redirect_uris: ['http://localhost:8888/'],
  },
};

describe('Google auth files', () => {
  let dir: string;
  let credentialsPath: string;
  let tokenPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'inbox-drafter-auth-'));
    credentialsPath = join(dir, 'credentials.json');
    tokenPath = join(dir, 'token.json');
    writeFileSync(credentialsPath, JSON.stringify(SECRETS));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads installed-app client secrets', () => {
    expect(readClientSecrets(credentialsPath)).toEqual({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      redirectUris: ['http://localhost:8888/'],
    });
  });

  it('reads web-app client secrets', () => {
    writeFileSync(credentialsPath, JSON.stringify({ web: { client_id: 'web-id', client_secret: 'test-secret' } }));

    expect(readClientSecrets(credentialsPath)).toEqual({ clientId: 'web-id', clientSecret: 'test-secret', redirectUris: [] });
  });

  it('rejects unusable client secrets', () => {
    writeFileSync(credentialsPath, JSON.stringify({ other: {} }));
    expect(() => readClientSecrets(credentialsPath)).toThrow(ConfigurationError);

    writeFileSync(credentialsPath, 'not json');
    expect(() => readClientSecrets(credentialsPath)).toThrow(ConfigurationError);
  });

  it('requires a token file', () => {
    expect(() => getAuthenticatedClient(credentialsPath, tokenPath, createTestLogger())).toThrow(AuthError);
  });

  it('rejects a token without access or refresh token', () => {
    writeFileSync(tokenPath, JSON.stringify({ scope: 'https://www.googleapis.com/auth/gmail.modify' }));

    expect(() => getAuthenticatedClient(credentialsPath, tokenPath, createTestLogger())).toThrow(/malformed/);
  });

  it('loads stored credentials and persists refreshed tokens', () => {
    writeFileSync(tokenPath, JSON.stringify({ access_token: 'old-access', refresh_token: 'test-refresh', expiry_date: 1 }));
    const logger = createTestLogger();

    const client = getAuthenticatedClient(credentialsPath, tokenPath, logger);
    expect(client.credentials.refresh_token).toBe('test-refresh');

    client.emit('tokens', { access_token: 'new-access', expiry_date: 2 });

    const stored: unknown = JSON.parse(readFileSync(tokenPath, 'utf-8'));
    expect(stored).toMatchObject({ access_token: 'new-access', refresh_token: 'test-refresh', expiry_date: 2 });
    expect(logger.eventsNamed('google_token_refreshed')).toHaveLength(1);
  });

  it('requests offline gmail access and refuses an empty code', async () => {
    let authUrl = '';

    await expect(runConsentFlow({
      credentialsPath,
      tokenPath,
      redirectUri: 'http://localhost:8888/',
      promptForCode: async (url) => {
        authUrl = url;
        return '   ';
      },
    }, createTestLogger())).rejects.toBeInstanceOf(AuthError);

    const params = new URL(authUrl).searchParams;
    expect(params.get('access_type')).toBe('offline');
    expect(params.get('scope')).toBe('https://www.googleapis.com/auth/gmail.modify');
    expect(params.get('redirect_uri')).toBe('http://localhost:8888/');
  });
});

describe('extractAuthorizationCode', () => {
  it('accepts a bare code', () => {
    expect(extractAuthorizationCode('  4/0Abc-code \n')).toBe('4/0Abc-code');
  });

  it('pulls the code out of a redirect URL', () => {
    expect(extractAuthorizationCode('http://localhost:8888/?code=4%2F0Abc&scope=gmail')).toBe('4/0Abc');
  });
});

describe('Google error mapping', () => {
  const withStatus = (status: number, message = 'failed') => Object.assign(new Error(message), { code: status });

  it('reads the status from gaxios-shaped errors', () => {
    expect(getErrorStatus(withStatus(403))).toBe(403);
    expect(getErrorStatus({ status: 429 })).toBe(429);
    expect(getErrorStatus({ response: { status: 502 } })).toBe(502);
    expect(getErrorStatus({ code: 'ECONNRESET' })).toBeUndefined();
    expect(getErrorStatus('boom')).toBeUndefined();
  });

  it('retries only rate limits and server errors', () => {
    expect(isRetryableError(withStatus(429))).toBe(true);
    expect(isRetryableError(withStatus(500))).toBe(true);
    expect(isRetryableError(withStatus(400))).toBe(false);
    expect(isRetryableError(new Error('socket hang up'))).toBe(false);
  });

  it('recognizes revoked or insufficient credentials', () => {
    expect(isAuthFailure(withStatus(401))).toBe(true);
    expect(isAuthFailure(new Error('invalid_grant'))).toBe(true);
    expect(isAuthFailure(withStatus(403, 'Request had insufficient authentication scopes.'))).toBe(true);
    expect(isAuthFailure(withStatus(403, 'Rate Limit Exceeded'))).toBe(false);
  });

  it('maps failures into the error taxonomy', () => {
    const auth = toProviderError(new Error('invalid_grant'), 'messages.list');
    expect(auth).toBeInstanceOf(AuthError);
    expect(auth.message).toBe('Gmail messages.list rejected the credentials: invalid_grant');

    const transient = toProviderError(withStatus(500, 'Backend Error'), 'drafts.create');
    expect(transient).toBeInstanceOf(TransientProviderError);
    expect(transient).toMatchObject({ status: 500, context: { operation: 'drafts.create' } });
  });
});

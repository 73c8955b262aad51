/**
 * @fileoverview Shared Google OAuth utilities.
 *
 * Builds the OAuth2 client from the client-secrets file and the stored token,
 * writes refreshed tokens back, and provides the retry and error-mapping
 * helpers every Gmail call goes through.
 */

import { readFileSync, writeFileSync } from 'fs';
import { google, Auth } from 'googleapis';
import { AuthError, ConfigurationError, TransientProviderError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';

/** Gmail scope needed to read mail, edit labels and create drafts. */
export const GMAIL_SCOPES = ['https://www.googleapis.com/auth/gmail.modify'];

/** Retry configuration for Google API calls. */
const MAX_RETRIES = 2;
const RETRY_DELAY_MS = 1000;

export type ClientSecrets = {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
};

/**
 * Read a Google client-secrets file (`installed` or `web` application type).
 */
export function readClientSecrets(path: string): ClientSecrets {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError([
      `GOOGLE_CREDENTIALS_PATH ${path} is unreadable: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  if (!parsed || typeof parsed !== 'object') {
    throw new ConfigurationError([`GOOGLE_CREDENTIALS_PATH ${path} is not a JSON object`]);
  }

  const section = 'installed' in parsed ? parsed.installed : 'web' in parsed ? parsed.web : undefined;
  if (!section || typeof section !== 'object') {
    throw new ConfigurationError([`GOOGLE_CREDENTIALS_PATH ${path} has no "installed" or "web" section`]);
  }

  const clientId = 'client_id' in section ? section.client_id : undefined;
  const clientSecret = 'client_secret' in section ? section.client_secret : undefined;
  const redirectUris = 'redirect_uris' in section ? section.redirect_uris : undefined;
  if (typeof clientId !== 'string' || typeof clientSecret !== 'string') {
    throw new ConfigurationError([`GOOGLE_CREDENTIALS_PATH ${path} is missing client_id or client_secret`]);
  }

  return {
    clientId,
    clientSecret,
    redirectUris: Array.isArray(redirectUris)
      ? redirectUris.filter((uri): uri is string => typeof uri === 'string')
      : [],
  };
}

/**
 * Create a bare OAuth2 client (no credentials set).
 */
export function createOAuth2Client(secrets: ClientSecrets, redirectUri?: string): Auth.OAuth2Client {
  return new google.auth.OAuth2(
    secrets.clientId,
    secrets.clientSecret,
    redirectUri ?? secrets.redirectUris[0]
  );
}

function readToken(tokenPath: string): Auth.Credentials {
  let raw: string;
  try {
    raw = readFileSync(tokenPath, 'utf-8');
  } catch {
    throw new AuthError(
      `No Google token at ${tokenPath}; run the authorize command first`,
      'google',
      { tokenPath }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = null;
  }
  const token = toCredentials(parsed);
  if (!token) {
    throw new AuthError(`Google token at ${tokenPath} is malformed; run the authorize command again`, 'google', { tokenPath });
  }
  return token;
}

function toCredentials(value: unknown): Auth.Credentials | null {
  if (!value || typeof value !== 'object') return null;

  const str = (key: string): string | undefined => {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
  };
  const expiry: unknown = Reflect.get(value, 'expiry_date');

  const credentials: Auth.Credentials = {
    access_token: str('access_token'),
    refresh_token: str('refresh_token'),
    scope: str('scope'),
    token_type: str('token_type'),
    id_token: str('id_token'),
    expiry_date: typeof expiry === 'number' ? expiry : undefined,
  };
  return credentials.access_token || credentials.refresh_token ? credentials : null;
}

/**
 * Get an OAuth2 client carrying the stored user token.
 * Tokens refreshed by the client are written back to the token file.
 *
 * @throws AuthError if the token file is missing or malformed
 */
export function getAuthenticatedClient(
  credentialsPath: string,
  tokenPath: string,
  logger: AppLogger
): Auth.OAuth2Client {
  const secrets = readClientSecrets(credentialsPath);
  const stored = readToken(tokenPath);

  const client = createOAuth2Client(secrets);
  client.setCredentials(stored);

  let current = stored;
  client.on('tokens', (tokens) => {
    // Google omits refresh_token on refresh; keep the stored one
    current = { ...current, ...tokens, refresh_token: tokens.refresh_token ?? current.refresh_token };
    try {
      writeFileSync(tokenPath, JSON.stringify(current, null, 2), { mode: 0o600 });
      logger.info('google_token_refreshed', { path: tokenPath });
    } catch (error) {
      logger.warn('google_token_persist_failed', {
        path: tokenPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return client;
}

/**
 * Read the HTTP status from a Gaxios error (or anything shaped like one).
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;

  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error) {
    const code = Number(error.code);
    if (Number.isInteger(code) && code >= 100 && code < 600) return code;
  }
  if ('response' in error && error.response && typeof error.response === 'object'
    && 'status' in error.response && typeof error.response.status === 'number') {
    return error.response.status;
  }
  return undefined;
}

/**
 * Check if an error is retryable (429 or 5xx).
 */
export function isRetryableError(error: unknown): boolean {
  const status = getErrorStatus(error);
  return status === 429 || (status !== undefined && status >= 500 && status < 600);
}

/**
 * Check if an error means the stored credentials are unusable.
 */
export function isAuthFailure(error: unknown): boolean {
  if (getErrorStatus(error) === 401) return true;
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('invalid_grant') ||
         message.includes('No refresh token') ||
         message.includes('insufficient authentication scopes') ||
         message.includes('Insufficient Permission');
}

/**
 * Convert a Google API failure into the pipeline error taxonomy.
 */
export function toProviderError(error: unknown, operation: string): AuthError | TransientProviderError {
  if (error instanceof AuthError || error instanceof TransientProviderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (isAuthFailure(error)) {
    return new AuthError(`Gmail ${operation} rejected the credentials: ${message}`, 'google', { operation });
  }
  return new TransientProviderError(`Gmail ${operation} failed: ${message}`, getErrorStatus(error), { operation });
}

/**
 * Sleep for a specified duration (used between retries).
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 *
 * Retries on 429/5xx errors with a linearly growing delay.
 * Auth failures are never retried.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  logger: AppLogger,
  operation: string,
  retryDelayMs = RETRY_DELAY_MS
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt < MAX_RETRIES && isRetryableError(error)) {
        logger.warn('google_api_retry', {
          operation,
          attempt: attempt + 1,
          maxRetries: MAX_RETRIES,
          status: getErrorStatus(error),
        });
        await sleep(retryDelayMs * (attempt + 1));
      } else {
        throw error;
      }
    }
  }
  throw lastError;
}

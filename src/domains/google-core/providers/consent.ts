/**
 * @fileoverview One-time Google consent flow.
 *
 * Flow:
 * 1. Print the consent URL (offline access, gmail.modify scope)
 * 2. The user approves and copies the `code` parameter from the redirect
 * 3. The code is exchanged for tokens, which are written to the token file
 *
 * Only run interactively; the scheduled pipelines read the token file.
 */

import { writeFileSync } from 'fs';
import { createInterface } from 'readline/promises';
import { AuthError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { GMAIL_SCOPES, createOAuth2Client, readClientSecrets } from './auth.js';

export type ConsentOptions = {
  credentialsPath: string;
  tokenPath: string;
  redirectUri: string;
  /** Reads the authorization code; defaults to prompting on stdin. */
  promptForCode?: (authUrl: string) => Promise<string>;
};

async function promptOnTerminal(authUrl: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    process.stdout.write(`Authorize this app by visiting:\n\n  ${authUrl}\n\n`);
    return await rl.question('Enter the authorization code: ');
  } finally {
    rl.close();
  }
}

/**
 * Accept either the bare code or the full redirect URL the browser landed on.
 */
export function extractAuthorizationCode(input: string): string {
  const trimmed = input.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    const code = new URL(trimmed).searchParams.get('code');
    if (code) return code;
  }
  return trimmed;
}

export async function runConsentFlow(options: ConsentOptions, logger: AppLogger): Promise<void> {
  const secrets = readClientSecrets(options.credentialsPath);
  const client = createOAuth2Client(secrets, options.redirectUri);

  const authUrl = client.generateAuthUrl({
    access_type: 'offline',
    prompt: 'consent',
    scope: GMAIL_SCOPES,
  });

  const prompt = options.promptForCode ?? promptOnTerminal;
  const code = extractAuthorizationCode(await prompt(authUrl));
  if (!code) {
    throw new AuthError('No authorization code entered', 'google');
  }

  const { tokens } = await client.getToken(code);
  if (!tokens.refresh_token) {
    logger.warn('google_consent_no_refresh_token', {
      hint: 'Revoke the app at myaccount.google.com/permissions and authorize again',
    });
  }

  writeFileSync(options.tokenPath, JSON.stringify(tokens, null, 2), { mode: 0o600 });
  logger.info('google_consent_completed', { path: options.tokenPath });
}

/**
 * @fileoverview Gmail mailbox provider.
 *
 * Implements MailboxProvider on the Gmail v1 API. Every call goes through
 * withRetry (429/5xx) and failures surface as AuthError or
 * TransientProviderError.
 */

import { google, gmail_v1, Auth } from 'googleapis';
import { toProviderError, withRetry } from '../../google-core/providers/auth.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { TransientProviderError } from '../../../utils/errors.js';
import { buildRawReply } from '../service/mime.js';
import { toMailMessage } from '../service/parse.js';
import type { DraftInput, MailMessage, MailboxProvider, MessageFilter } from '../types.js';

const DRAFT_LABEL = 'DRAFT';
const UNREAD_LABEL = 'UNREAD';

/**
 * Translate a MessageFilter into Gmail search syntax.
 * Labels are passed separately as `labelIds`.
 */
export function buildSearchQuery(filter: MessageFilter): string {
  const terms: string[] = [];
  if (filter.inInbox) terms.push('in:inbox');
  if (filter.unreadOnly) terms.push('is:unread');
  if (filter.after !== undefined && filter.after > 0) {
    terms.push(`after:${Math.floor(filter.after / 1000)}`);
  }
  return terms.join(' ');
}

export class GmailMailbox implements MailboxProvider {
  constructor(
    private readonly gmail: gmail_v1.Gmail,
    private readonly logger: AppLogger,
    private readonly retryDelayMs?: number
  ) {}

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, this.logger, operation, this.retryDelayMs);
    } catch (error) {
      throw toProviderError(error, operation);
    }
  }

  async *listMessages(filter: MessageFilter): AsyncIterable<MailMessage> {
    const q = buildSearchQuery(filter);
    let pageToken: string | undefined;

    do {
      const response = await this.call('messages.list', () => this.gmail.users.messages.list({
        userId: 'me',
        q: q || undefined,
        labelIds: filter.labelIds,
        pageToken,
      }));

      for (const ref of response.data.messages ?? []) {
        if (!ref.id) continue; // boundary: skip references without an id
        const message = await this.getListedMessage(ref.id);
        if (message) yield message;
      }

      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);
  }

  /** A message deleted between list and get (404) is skipped. */
  private async getListedMessage(id: string): Promise<MailMessage | null> {
    try {
      return await this.getMessage(id);
    } catch (error) {
      if (error instanceof TransientProviderError && error.status === 404) {
        this.logger.warn('message_vanished', { messageId: id });
        return null;
      }
      throw error;
    }
  }

  async getMessage(id: string): Promise<MailMessage> {
    const response = await this.call('messages.get', () => this.gmail.users.messages.get({
      userId: 'me',
      id,
      format: 'full',
    }));
    return toMailMessage(response.data);
  }

  async getThread(threadId: string): Promise<MailMessage[]> {
    const response = await this.call('threads.get', () => this.gmail.users.threads.get({
      userId: 'me',
      id: threadId,
      format: 'full',
    }));

    return (response.data.messages ?? [])
      .filter((msg) => msg.id && !msg.labelIds?.includes(DRAFT_LABEL))
      .map(toMailMessage)
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  async hasExistingDraft(threadId: string): Promise<boolean> {
    const response = await this.call('threads.get', () => this.gmail.users.threads.get({
      userId: 'me',
      id: threadId,
      format: 'minimal',
    }));
    return (response.data.messages ?? []).some((msg) => msg.labelIds?.includes(DRAFT_LABEL) ?? false);
  }

  async createDraft(input: DraftInput): Promise<string> {
    const response = await this.call('drafts.create', () => this.gmail.users.drafts.create({
      userId: 'me',
      requestBody: {
        message: {
          threadId: input.threadId,
          raw: buildRawReply(input),
        },
      },
    }));

    // Boundary: require draft id from API response
    if (!response.data.id) {
      throw new TransientProviderError('Gmail drafts.create returned a draft without an id', undefined, {
        threadId: input.threadId,
      });
    }
    return response.data.id;
  }

  async removeLabel(messageId: string, labelId: string): Promise<void> {
    await this.call('messages.modify', () => this.gmail.users.messages.modify({
      userId: 'me',
      id: messageId,
      requestBody: { removeLabelIds: [labelId] },
    }));
  }

  async markRead(messageId: string): Promise<void> {
    await this.removeLabel(messageId, UNREAD_LABEL);
  }
}

export function createGmailMailbox(auth: Auth.OAuth2Client, logger: AppLogger): GmailMailbox {
  return new GmailMailbox(google.gmail({ version: 'v1', auth }), logger);
}

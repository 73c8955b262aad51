/**
 * @fileoverview Candidate selection.
 *
 * Each run re-queries the mailbox from scratch. The provider-side query is
 * bounded one second below the watermark (search works in whole seconds);
 * the exact comparison happens here.
 */

import type { MailMessage, MailboxProvider, MessageFilter } from '../../mailbox/types.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import type { Watermark } from '../types.js';
import { isPastWatermark } from './watermark.js';

function queryLowerBound(watermark: Watermark | null): number | undefined {
  if (!watermark || watermark.timestamp <= 0) return undefined;
  return Math.max(watermark.timestamp - 1000, 0);
}

async function* pastWatermark(
  messages: AsyncIterable<MailMessage>,
  watermark: Watermark | null
): AsyncIterable<MailMessage> {
  for await (const message of messages) {
    if (isPastWatermark({ timestamp: message.timestamp, messageId: message.id }, watermark)) {
      yield message;
    }
  }
}

/**
 * Sent mail carrying the indexing label, newer than the watermark.
 */
export function selectIndexCandidates(
  mailbox: MailboxProvider,
  labelId: string,
  watermark: Watermark | null
): AsyncIterable<MailMessage> {
  const filter: MessageFilter = { labelIds: [labelId], after: queryLowerBound(watermark) };
  return pastWatermark(mailbox.listMessages(filter), watermark);
}

export type ReplySelectOptions = {
  unreadOnly: boolean;
};

/**
 * Inbox mail whose thread has no draft yet.
 *
 * The draft check is what prevents duplicate drafts; the watermark only
 * keeps the query small.
 */
export async function* selectReplyCandidates(
  mailbox: MailboxProvider,
  watermark: Watermark | null,
  options: ReplySelectOptions,
  logger: AppLogger
): AsyncIterable<MailMessage> {
  const filter: MessageFilter = {
    inInbox: true,
    unreadOnly: options.unreadOnly,
    after: queryLowerBound(watermark),
  };

  for await (const message of pastWatermark(mailbox.listMessages(filter), watermark)) {
    if (await mailbox.hasExistingDraft(message.threadId)) {
      logger.debug('candidate_has_draft', { messageId: message.id, threadId: message.threadId });
      continue;
    }
    yield message;
  }
}
